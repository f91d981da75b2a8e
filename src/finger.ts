import type { Finger, FingerAssignment, Half } from "./types.ts"

export const FINGERS: readonly Finger[] = ["pinky", "ring", "middle", "index", "thumb"]

const HALVES: readonly Half[] = ["left", "right"]

/**
 * Orders assignments the way they sit on the board, read left to right:
 * left pinky … left thumb, then right thumb … right pinky.
 */
export function compareFingerAssignments(a: FingerAssignment, b: FingerAssignment): number {
  if (a.half !== b.half) {
    return HALVES.indexOf(a.half) - HALVES.indexOf(b.half)
  }
  const order = FINGERS.indexOf(a.finger) - FINGERS.indexOf(b.finger)
  return a.half === "left" ? order : -order
}

export function fingerAssignmentKey(assignment: FingerAssignment): string {
  return `${assignment.half}:${assignment.finger}`
}

export function sameFinger(a: FingerAssignment, b: FingerAssignment): boolean {
  return a.finger === b.finger && a.half === b.half
}

export function formatFingerAssignment(assignment: FingerAssignment): string {
  return `${assignment.finger} (${assignment.half})`
}

// Digits used by the finger_assignments grid
export function parseFingerDigit(digit: number): Finger | null {
  return FINGERS[digit] ?? null
}

export function uniqueSortedFingers(assignments: Iterable<FingerAssignment>): FingerAssignment[] {
  const unique = new Map<string, FingerAssignment>()
  for (const assignment of assignments) {
    const key = fingerAssignmentKey(assignment)
    if (!unique.has(key)) {
      unique.set(key, assignment)
    }
  }
  return Array.from(unique.values()).sort(compareFingerAssignments)
}
