import { beforeAll, describe, expect, it } from "vitest"
import type { LayoutModel } from "../src/layout.ts"
import { detectSfbs, firstIds, secondIds } from "../src/sfb.ts"
import {
  computeKeylogStats,
  fingerCount,
  sfbFrequencyByFinger,
  sfbPercentage,
  statsFromFile,
  topSfbs,
  topSfbsByKey,
} from "../src/stats.ts"
import type { KeylogStats } from "../src/types.ts"
import { baseKey, keylogPath, loadFixtureLayout, single } from "./helpers.ts"

let layout: LayoutModel
let stats: KeylogStats

beforeAll(async () => {
  layout = await loadFixtureLayout()
  const result = await statsFromFile(layout, keylogPath)
  stats = result.stats
})

const pairs = (entries: KeylogStats["sfbs"]) =>
  entries.map((entry) => [firstIds(entry.sfb), secondIds(entry.sfb), entry.presses])

describe("computeKeylogStats", () => {
  it("counts events, presses and hands", () => {
    expect(stats.totalEvents).toBe(17)
    expect(stats.totalKeyPresses).toBe(26)
    expect(stats.totalLeft).toBe(14)
    expect(stats.totalRight).toBe(12)
    expect(stats.totalLeft + stats.totalRight).toBe(stats.totalKeyPresses)
    expect(stats.totalSfbEvents).toBe(8)
  })

  it("counts outputs by key id or combo output", () => {
    expect(stats.outputFrequency.get("KC_S")).toBe(4)
    expect(stats.outputFrequency.get("KC_C")).toBe(2)
    expect(stats.outputFrequency.get("COLN_SYM")).toBe(2)
    expect(stats.outputFrequency.get("<=")).toBe(1)
    expect(stats.outputFrequency.size).toBe(12)
  })

  it("lists finger usage in board order", () => {
    expect(stats.fingerFrequency.map(({ finger, count }) => [finger.half, finger.finger, count])).toEqual([
      ["left", "ring", 7],
      ["left", "middle", 2],
      ["left", "index", 3],
      ["left", "thumb", 2],
      ["right", "thumb", 2],
      ["right", "index", 5],
      ["right", "middle", 3],
      ["right", "ring", 1],
      ["right", "pinky", 1],
    ])
    expect(fingerCount(stats.fingerFrequency, { finger: "pinky", half: "left" })).toBeUndefined()
  })

  it("sorts aggregated SFBs by ascending count", () => {
    expect(pairs(stats.sfbs)).toEqual([
      ["KC_J", "KC_C", 1],
      ["KC_S", "KC_C", 1],
      ["KC_L", "KC_W", 1],
      ["KC_W", "KC_N,KC_A", 1],
      ["KC_N,KC_A", "KC_E,KC_L,KC_LPRN,KC_RPRN,KC_UNDS", 1],
      ["KC_E,KC_L,KC_LPRN,KC_RPRN,KC_UNDS", "KC_N,KC_A", 1],
      ["KC_C", "KC_S", 2],
    ])
    const total = stats.sfbs.reduce((acc, entry) => acc + entry.presses, 0)
    expect(total).toBe(stats.totalSfbEvents)
    expect(stats.sfbsById.size).toBe(stats.sfbs.length)
  })

  it("handles an empty log", () => {
    const empty = computeKeylogStats([])
    expect(empty.totalEvents).toBe(0)
    expect(empty.totalKeyPresses).toBe(0)
    expect(empty.sfbs).toEqual([])
    expect(sfbPercentage(empty, true)).toBe(0)
    expect(topSfbs(empty, 5, true)).toEqual([])
  })

  it("finds no SFBs when hands alternate", () => {
    const events = ["KC_C", "KC_W", "KC_S", "KC_L", "KC_C"].map((id) => single(baseKey(layout, id)))
    const alternating = computeKeylogStats(events)
    expect(alternating.totalSfbEvents).toBe(0)
    expect(detectSfbs(events)).toEqual([])
  })
})

describe("topSfbs", () => {
  it("returns the most frequent single-key SFBs first", () => {
    expect(pairs(topSfbs(stats, 3, false))).toEqual([
      ["KC_C", "KC_S", 2],
      ["KC_L", "KC_W", 1],
      ["KC_S", "KC_C", 1],
    ])
  })

  it("includes combo SFBs on request", () => {
    expect(pairs(topSfbs(stats, 2, true))).toEqual([
      ["KC_C", "KC_S", 2],
      ["KC_E,KC_L,KC_LPRN,KC_RPRN,KC_UNDS", "KC_N,KC_A", 1],
    ])
  })

  it("returns everything when asked for more than exists", () => {
    expect(topSfbs(stats, 100, false).length).toBe(4)
    expect(topSfbs(stats, 0, true)).toEqual([])
  })
})

describe("sfbFrequencyByFinger", () => {
  const summary = (includeCombos: boolean) =>
    sfbFrequencyByFinger(stats, includeCombos).map(({ finger, count }) => [finger.half, finger.finger, count])

  it("sums single-key SFBs per finger and keeps combo-only fingers at zero", () => {
    expect(summary(false)).toEqual([
      ["left", "ring", 4],
      ["right", "thumb", 0],
      ["right", "index", 1],
      ["right", "middle", 0],
      ["right", "ring", 0],
      ["right", "pinky", 0],
    ])
    expect(sfbFrequencyByFinger(stats, false).length).toBe(stats.sfbsByFinger.size)
  })

  it("leaves out fingers no SFB touches", () => {
    const fingers = sfbFrequencyByFinger(stats, true).map(({ finger }) => `${finger.half}:${finger.finger}`)
    expect(fingers).not.toContain("left:pinky")
    expect(fingers).not.toContain("left:middle")
  })

  it("credits combo SFBs to every finger they touch", () => {
    expect(summary(true)).toEqual([
      ["left", "ring", 4],
      ["right", "thumb", 2],
      ["right", "index", 4],
      ["right", "middle", 3],
      ["right", "ring", 2],
      ["right", "pinky", 2],
    ])
  })
})

describe("sfbPercentage", () => {
  it("relates SFB presses to all events", () => {
    expect(sfbPercentage(stats, false)).toBeCloseTo((5 / 17) * 100, 10)
    expect(sfbPercentage(stats, true)).toBeCloseTo((8 / 17) * 100, 10)
  })
})

describe("topSfbsByKey", () => {
  it("totals SFB presses per key", () => {
    expect(topSfbsByKey(stats, 10, false)).toEqual([
      { id: "KC_C", presses: 4 },
      { id: "KC_S", presses: 3 },
      { id: "KC_J", presses: 1 },
      { id: "KC_L", presses: 1 },
      { id: "KC_W", presses: 1 },
    ])
  })

  it("counts combo keys when combos are included", () => {
    expect(topSfbsByKey(stats, 3, true)).toEqual([
      { id: "KC_C", presses: 4 },
      { id: "KC_A", presses: 3 },
      { id: "KC_L", presses: 3 },
    ])
  })
})

describe("statsFromFile", () => {
  it("reports how many records were read", async () => {
    const result = await statsFromFile(layout, keylogPath)
    expect(result.records).toBe(17)
    expect(result.skipped).toBe(0)
  })
})
