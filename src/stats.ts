import { compareFingerAssignments, fingerAssignmentKey } from "./finger.ts"
import type { LayoutModel } from "./layout.ts"
import { readKeylog } from "./log.ts"
import { resolveEvents } from "./resolver.ts"
import { aggregateSfbs, compareSfbStats, detectSfbs, hasCombo, indexSfbsByFinger, sfbKeyIds } from "./sfb.ts"
import type {
  FingerAssignment,
  FingerCount,
  KeylogStats,
  LogicalEvent,
  ResolveOptions,
  SfbStats,
} from "./types.ts"

export type KeyTotal = {
  id: string
  presses: number
}

export function computeKeylogStats(events: readonly LogicalEvent[]): KeylogStats {
  const outputFrequency = new Map<string, number>()
  const fingers = new Map<string, FingerCount>()

  const countFinger = (finger: FingerAssignment) => {
    const key = fingerAssignmentKey(finger)
    const entry = fingers.get(key)
    if (entry) {
      entry.count++
    } else {
      fingers.set(key, { finger, count: 1 })
    }
  }

  for (const event of events) {
    const label = event.kind === "combo" ? event.combo.output : event.key.id
    outputFrequency.set(label, (outputFrequency.get(label) ?? 0) + 1)

    if (event.kind === "combo") {
      for (const key of event.combo.keys) {
        countFinger(key.finger)
      }
    } else {
      countFinger(event.key.finger)
    }
  }

  const fingerFrequency = Array.from(fingers.values()).sort((a, b) =>
    compareFingerAssignments(a.finger, b.finger),
  )

  let totalKeyPresses = 0
  let totalLeft = 0
  let totalRight = 0
  for (const { finger, count } of fingerFrequency) {
    totalKeyPresses += count
    if (finger.half === "left") {
      totalLeft += count
    } else {
      totalRight += count
    }
  }

  const series = detectSfbs(events)
  const sfbsById = aggregateSfbs(series)
  const sfbs = Array.from(sfbsById.values()).sort(compareSfbStats)

  return {
    outputFrequency,
    fingerFrequency,
    totalEvents: events.length,
    totalKeyPresses,
    totalLeft,
    totalRight,
    totalSfbEvents: series.length,
    sfbs,
    sfbsByFinger: indexSfbsByFinger(sfbsById),
    sfbsById,
  }
}

function passesComboFilter(stats: SfbStats, includeCombos: boolean): boolean {
  return includeCombos || !hasCombo(stats.sfb)
}

/** Highest counts first. */
export function topSfbs(stats: KeylogStats, count: number, includeCombos: boolean): SfbStats[] {
  const result: SfbStats[] = []
  for (let i = stats.sfbs.length - 1; i >= 0 && result.length < count; i--) {
    const entry = stats.sfbs[i]
    if (passesComboFilter(entry, includeCombos)) {
      result.push(entry)
    }
  }
  return result
}

/**
 * Per-finger SFB presses in board order. Every finger of the index is listed, so a
 * finger whose SFBs all involve combos reads 0 when combos are excluded.
 */
export function sfbFrequencyByFinger(stats: KeylogStats, includeCombos: boolean): FingerCount[] {
  const result: FingerCount[] = []
  for (const { finger, sfbs } of stats.sfbsByFinger.values()) {
    let count = 0
    for (const entry of sfbs.values()) {
      if (passesComboFilter(entry, includeCombos)) {
        count += entry.presses
      }
    }
    result.push({ finger, count })
  }
  return result.sort((a, b) => compareFingerAssignments(a.finger, b.finger))
}

// Share of all events that start an SFB, in percent
export function sfbPercentage(stats: KeylogStats, includeCombos: boolean): number {
  if (stats.totalEvents === 0) return 0
  const presses = stats.sfbs
    .filter((entry) => passesComboFilter(entry, includeCombos))
    .reduce((acc, entry) => acc + entry.presses, 0)
  return (presses / stats.totalEvents) * 100
}

export function topSfbsByKey(stats: KeylogStats, count: number, includeCombos: boolean): KeyTotal[] {
  const totals = new Map<string, number>()
  for (const entry of stats.sfbs) {
    if (!passesComboFilter(entry, includeCombos)) continue
    for (const id of new Set(sfbKeyIds(entry.sfb))) {
      totals.set(id, (totals.get(id) ?? 0) + entry.presses)
    }
  }

  return Array.from(totals, ([id, presses]) => ({ id, presses }))
    .sort((a, b) => b.presses - a.presses || a.id.localeCompare(b.id))
    .slice(0, count)
}

export function fingerCount(counts: readonly FingerCount[], finger: FingerAssignment): number | undefined {
  const key = fingerAssignmentKey(finger)
  return counts.find((entry) => fingerAssignmentKey(entry.finger) === key)?.count
}

export type StatsFromFile = {
  stats: KeylogStats
  records: number
  skipped: number
}

export async function statsFromFile(
  layout: LayoutModel,
  logPath: string,
  options?: ResolveOptions,
): Promise<StatsFromFile> {
  const records = await readKeylog(logPath)
  const { events, skipped } = resolveEvents(records, layout, options)
  return { stats: computeKeylogStats(events), records: records.length, skipped }
}
