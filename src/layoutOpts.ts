import { z } from "zod"
import { KeylogError } from "./errors.ts"
import { parseFingerDigit } from "./finger.ts"
import type { FingerAssignment, PhysicalPos } from "./types.ts"

// The render fields (colors, legend, outputs, layers) share this file and are read by renderOpts.ts.
export const LayoutOptsSchema = z
  .object({
    physical_layout: z.array(z.string()).min(1),
    finger_assignments: z.array(z.string()).min(1),
  })
  .passthrough()

export type LayoutOptsSpec = z.infer<typeof LayoutOptsSchema>

export type GridEntry = PhysicalPos & {
  value: number
}

export type LayoutOpts = {
  id: string
  physicalLayout: GridEntry[]
  fingerAssignments: GridEntry[]
}

const HALF_SEPARATOR = "    "

export function parseLayoutOpts(id: string, text: string): LayoutOpts {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new KeylogError(`Layout options ${id} are not valid JSON: ${error}`, "INVALID_LAYOUT")
  }

  const result = LayoutOptsSchema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new KeylogError(`Invalid layout options ${id}: ${issues.join("; ")}`, "INVALID_LAYOUT")
  }

  const physicalLayout = convertPhysicalLayout(result.data.physical_layout)
  const fingerAssignments = convertPhysicalLayout(result.data.finger_assignments)
  if (fingerAssignments.length < physicalLayout.length) {
    throw new KeylogError(
      `finger_assignments has ${fingerAssignments.length} keys but physical_layout has ${physicalLayout.length}`,
      "INVALID_LAYOUT",
    )
  }

  return { id, physicalLayout, fingerAssignments }
}

/**
 * Turns a digit grid into positions in reading order. Each line is split on four
 * spaces into a left and a right half; every non-space character is one key and
 * columns keep counting across spaces and into the right half.
 */
export function convertPhysicalLayout(lines: readonly string[]): GridEntry[] {
  const entries: GridEntry[] = []

  for (const [row, rawLine] of lines.entries()) {
    const halves = rawLine.trimEnd().split(HALF_SEPARATOR)
    if (halves.length > 2) {
      throw new KeylogError(`Layout row ${row} has more than two halves: '${rawLine}'`, "INVALID_LAYOUT")
    }

    let col = 0
    for (const [index, part] of halves.entries()) {
      const half = index === 0 ? "left" : "right"
      for (const char of part) {
        if (char !== " ") {
          if (!/^\d$/.test(char)) {
            throw new KeylogError(`Layout grids may only contain digits, found '${char}'`, "INVALID_LAYOUT")
          }
          entries.push({ col, row, half, value: Number(char) })
        }
        col++
      }
    }
  }

  return entries
}

export function fingerAt(opts: LayoutOpts, index: number): FingerAssignment {
  const entry = opts.fingerAssignments[index]
  if (!entry) {
    throw new KeylogError(`No finger assignment for key index ${index}`, "INVALID_LAYOUT")
  }
  const finger = parseFingerDigit(entry.value)
  if (!finger) {
    throw new KeylogError(`Finger value ${entry.value} unknown`, "INVALID_LAYOUT")
  }
  return { finger, half: entry.half }
}

export function physicalPosAt(opts: LayoutOpts, index: number): GridEntry {
  const entry = opts.physicalLayout[index]
  if (!entry) {
    throw new KeylogError(`No physical position for key index ${index}`, "INVALID_LAYOUT")
  }
  return entry
}
