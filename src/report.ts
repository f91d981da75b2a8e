import { firstIds, secondIds, sfbId } from "./sfb.ts"
import {
  sfbFrequencyByFinger,
  sfbPercentage,
  topSfbs,
  topSfbsByKey,
} from "./stats.ts"
import type { Finger, FingerCount, Half, KeylogStats } from "./types.ts"

export type FingerShare = {
  finger: Finger
  half: Half
  count: number
  percent: number
}

export type SfbEntry = {
  id: string
  first: string
  second: string
  presses: number
  percent: number
  combo: boolean
}

export type SfbSection = {
  includeCombos: boolean
  fingers: FingerShare[]
  totalPercent: number
  top: SfbEntry[]
  topByKey: { id: string; presses: number; percent: number }[]
}

export type StatsReport = {
  logPath: string
  records: number
  skipped: number
  events: number
  keyPresses: number
  sfbEvents: number
  outputs: { label: string; count: number }[]
  fingers: FingerShare[]
  leftPercent: number
  rightPercent: number
  sfbs: SfbSection[]
}

export type ReportInput = {
  logPath: string
  records: number
  skipped: number
  stats: KeylogStats
  top: number
}

export function percentOf(value: number, total: number): number {
  return total === 0 ? 0 : (value / total) * 100
}

function toShares(counts: readonly FingerCount[], total: number): FingerShare[] {
  return counts.map(({ finger, count }) => ({
    finger: finger.finger,
    half: finger.half,
    count,
    percent: percentOf(count, total),
  }))
}

function buildSfbSection(stats: KeylogStats, top: number, includeCombos: boolean): SfbSection {
  return {
    includeCombos,
    fingers: toShares(sfbFrequencyByFinger(stats, includeCombos), stats.totalEvents),
    totalPercent: sfbPercentage(stats, includeCombos),
    top: topSfbs(stats, top, includeCombos).map((entry) => ({
      id: sfbId(entry.sfb),
      first: firstIds(entry.sfb),
      second: secondIds(entry.sfb),
      presses: entry.presses,
      percent: percentOf(entry.presses, stats.totalEvents),
      combo: entry.sfb.kind === "combo",
    })),
    topByKey: topSfbsByKey(stats, top, includeCombos).map(({ id, presses }) => ({
      id,
      presses,
      percent: percentOf(presses, stats.totalEvents),
    })),
  }
}

export function buildReport({ logPath, records, skipped, stats, top }: ReportInput): StatsReport {
  const outputs = Array.from(stats.outputFrequency, ([label, count]) => ({ label, count })).sort(
    (a, b) => a.count - b.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0),
  )

  return {
    logPath,
    records,
    skipped,
    events: stats.totalEvents,
    keyPresses: stats.totalKeyPresses,
    sfbEvents: stats.totalSfbEvents,
    outputs,
    fingers: toShares(stats.fingerFrequency, stats.totalKeyPresses),
    leftPercent: percentOf(stats.totalLeft, stats.totalKeyPresses),
    rightPercent: percentOf(stats.totalRight, stats.totalKeyPresses),
    sfbs: [buildSfbSection(stats, top, false), buildSfbSection(stats, top, true)],
  }
}

function formatPercent(value: number, digits = 2): string {
  return `${value.toFixed(digits).padStart(7)}%`
}

function fingerTable(shares: readonly FingerShare[]): string[] {
  const names = shares.map((share) => share.finger.padStart(8)).join("")
  const values = shares.map((share) => formatPercent(share.percent)).join("")
  return [names, values]
}

export function formatHumanReport(report: StatsReport): string[] {
  const lines: string[] = []

  lines.push("=== Keylog Stats ===")
  lines.push(`Log: ${report.logPath}`)
  lines.push(`Records read: ${report.records}`)
  if (report.skipped > 0) {
    lines.push(`Records skipped: ${report.skipped}`)
  }
  lines.push(`Events: ${report.events}`)
  lines.push(`Key presses: ${report.keyPresses}`)
  lines.push(`SFB events: ${report.sfbEvents}`)

  lines.push("")
  for (const { label, count } of report.outputs) {
    lines.push(`${label.padStart(10)}: ${count}`)
  }

  lines.push("")
  lines.push(...fingerTable(report.fingers))
  lines.push("")
  lines.push(`    left: ${formatPercent(report.leftPercent)}`)
  lines.push(`   right: ${formatPercent(report.rightPercent)}`)

  for (const section of report.sfbs) {
    lines.push("")
    lines.push(`  sfbs (${section.includeCombos ? "with" : "without"} combos)`)
    lines.push(...fingerTable(section.fingers))
    lines.push("")
    lines.push(`  total: ${formatPercent(section.totalPercent, 3)}`)

    lines.push("  top sfbs:")
    if (section.top.length === 0) {
      lines.push("   none")
    }
    for (const entry of section.top) {
      lines.push(`   ${entry.id.padEnd(46)} ${entry.percent.toFixed(2)}%`)
    }

    lines.push("")
    lines.push("  top sfbs by key:")
    if (section.topByKey.length === 0) {
      lines.push("   none")
    }
    for (const entry of section.topByKey) {
      lines.push(`   ${entry.id.padEnd(46)} ${entry.percent.toFixed(2)}%`)
    }
  }

  return lines
}
