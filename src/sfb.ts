import { SFB_FIRST_WIDTH, SFB_SECOND_WIDTH, SFB_SEPARATOR } from "./consts.ts"
import { fingerAssignmentKey, uniqueSortedFingers } from "./finger.ts"
import { comboFingers, isComboComboSfb, isComboKeySfb, isKeySfb } from "./layout.ts"
import type { FingerAssignment, Key, LogicalEvent, Sfb, SfbStats } from "./types.ts"

export type SfbFingerBucket = {
  finger: FingerAssignment
  sfbs: Map<string, SfbStats>
}

export function isEntrySfb(current: LogicalEvent, next: LogicalEvent): boolean {
  switch (current.kind) {
    case "single":
      return next.kind === "single"
        ? isKeySfb(current.key, next.key)
        : isComboKeySfb(next.combo, current.key)
    case "combo":
      return next.kind === "combo"
        ? isComboComboSfb(current.combo, next.combo)
        : isComboKeySfb(current.combo, next.key)
    default:
      return assertNever(current)
  }
}

function eventKeys(event: LogicalEvent): readonly Key[] {
  switch (event.kind) {
    case "combo":
      return event.combo.keys
    case "single":
      return [event.key]
    default:
      return assertNever(event)
  }
}

function eventFingers(event: LogicalEvent): FingerAssignment[] {
  switch (event.kind) {
    case "combo":
      return comboFingers(event.combo)
    case "single":
      return [event.key.finger]
    default:
      return assertNever(event)
  }
}

export function createSfb(current: LogicalEvent, next: LogicalEvent): Sfb | null {
  if (!isEntrySfb(current, next)) return null

  if (current.kind === "single" && next.kind === "single") {
    return {
      kind: "single",
      firstKey: current.key,
      secondKey: next.key,
      finger: current.key.finger,
    }
  }

  return {
    kind: "combo",
    firstKeys: eventKeys(current),
    secondKeys: eventKeys(next),
    fingers: uniqueSortedFingers([...eventFingers(current), ...eventFingers(next)]),
  }
}

export function firstIds(sfb: Sfb): string {
  switch (sfb.kind) {
    case "single":
      return sfb.firstKey.id
    case "combo":
      return sfb.firstKeys.map((key) => key.id).join(",")
    default:
      return assertNever(sfb)
  }
}

export function secondIds(sfb: Sfb): string {
  switch (sfb.kind) {
    case "single":
      return sfb.secondKey.id
    case "combo":
      return sfb.secondKeys.map((key) => key.id).join(",")
    default:
      return assertNever(sfb)
  }
}

/** Aggregation key of an SFB; `A → B` and `B → A` are different identities. */
export function sfbId(sfb: Sfb): string {
  return `${firstIds(sfb).padStart(SFB_FIRST_WIDTH)}${SFB_SEPARATOR}${secondIds(sfb).padEnd(SFB_SECOND_WIDTH)}`
}

export function sfbFingers(sfb: Sfb): FingerAssignment[] {
  switch (sfb.kind) {
    case "single":
      return [sfb.finger]
    case "combo":
      return sfb.fingers
    default:
      return assertNever(sfb)
  }
}

export function sfbKeyIds(sfb: Sfb): string[] {
  switch (sfb.kind) {
    case "single":
      return [sfb.firstKey.id, sfb.secondKey.id]
    case "combo":
      return [...sfb.firstKeys, ...sfb.secondKeys].map((key) => key.id)
    default:
      return assertNever(sfb)
  }
}

export function hasCombo(sfb: Sfb): boolean {
  return sfb.kind === "combo"
}

// Every adjacent pair of events that forces one finger to move
export function detectSfbs(events: readonly LogicalEvent[]): Sfb[] {
  const sfbs: Sfb[] = []
  for (let i = 0; i + 1 < events.length; i++) {
    const sfb = createSfb(events[i], events[i + 1])
    if (sfb) {
      sfbs.push(sfb)
    }
  }
  return sfbs
}

export function aggregateSfbs(series: readonly Sfb[]): Map<string, SfbStats> {
  const byId = new Map<string, SfbStats>()
  for (const sfb of series) {
    const id = sfbId(sfb)
    const existing = byId.get(id)
    if (existing) {
      existing.presses++
    } else {
      byId.set(id, { presses: 1, sfb })
    }
  }
  return byId
}

/** Files every identity under each finger it touches; combo SFBs can land in several buckets. */
export function indexSfbsByFinger(byId: ReadonlyMap<string, SfbStats>): Map<string, SfbFingerBucket> {
  const byFinger = new Map<string, SfbFingerBucket>()

  for (const [id, stats] of byId) {
    for (const finger of sfbFingers(stats.sfb)) {
      const fingerKey = fingerAssignmentKey(finger)
      let bucket = byFinger.get(fingerKey)
      if (!bucket) {
        bucket = { finger, sfbs: new Map() }
        byFinger.set(fingerKey, bucket)
      }

      bucket.sfbs.set(id, { presses: stats.presses, sfb: stats.sfb })
    }
  }

  return byFinger
}

export function compareSfbStats(a: SfbStats, b: SfbStats): number {
  return a.presses - b.presses
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}
