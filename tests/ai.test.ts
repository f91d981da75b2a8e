import { afterEach, beforeAll, describe, expect, it, vi } from "vitest"
import { buildPrompt, parseSuggestions, requestLayoutSuggestions } from "../src/ai.ts"
import { analyzeKeylog } from "../src/command.ts"
import { buildReport, type StatsReport } from "../src/report.ts"
import { computeKeylogStats } from "../src/stats.ts"
import { keylogPath, layoutOptsPath, qmkRoot } from "./helpers.ts"

let report: StatsReport

beforeAll(async () => {
  report = await analyzeKeylog({
    qmkRoot,
    keyboard: "splitkb",
    keymap: "default",
    layoutOpts: layoutOptsPath,
    logPath: keylogPath,
    top: 5,
    onLayoutMismatch: "fail",
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe("buildPrompt", () => {
  it("lists the most frequent SFBs and finger load", () => {
    const prompt = buildPrompt(report, 2).split("\n")

    expect(prompt).toContain("Events: 17, key presses: 26, SFB events: 8")
    expect(prompt).toContain("1. KC_C → KC_S count=2 share=11.76%")
    expect(prompt).toContain(
      "2. KC_E,KC_L,KC_LPRN,KC_RPRN,KC_UNDS → KC_N,KC_A count=1 share=5.88% (involves a combo)",
    )
    expect(prompt).not.toContain("3. KC_N,KC_A → KC_E,KC_L,KC_LPRN,KC_RPRN,KC_UNDS count=1 share=5.88% (involves a combo)")
    expect(prompt).toContain("ring (left): 26.92%")
  })
})

describe("parseSuggestions", () => {
  it("keeps complete suggestions from the reply", () => {
    const reply = `Here you go:
[
  { "sfb": "KC_C → KC_S", "change": "Swap KC_S and KC_T", "rationale": "Moves load to the middle finger." },
  { "sfb": "KC_L → KC_W" },
  { "sfb": "KC_J → KC_C", "change": "Move KC_J to the thumb cluster" }
]`

    expect(parseSuggestions(reply)).toEqual([
      { sfb: "KC_C → KC_S", change: "Swap KC_S and KC_T", rationale: "Moves load to the middle finger." },
      { sfb: "KC_J → KC_C", change: "Move KC_J to the thumb cluster", rationale: "" },
    ])
  })

  it("reads the array from a fenced reply with bracketed notes after it", () => {
    const reply = [
      "```json",
      '[{ "sfb": "KC_T → KC_H", "change": "Move KC_H to the right index" }]',
      "```",
      "See [1] for the reasoning.",
    ].join("\n")

    expect(parseSuggestions(reply)).toEqual([
      { sfb: "KC_T → KC_H", change: "Move KC_H to the right index", rationale: "" },
    ])
  })

  it("returns nothing without a JSON array", () => {
    expect(parseSuggestions("No changes needed.")).toEqual([])
  })

  it("warns about broken JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    expect(parseSuggestions("[not json]")).toEqual([])
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe("requestLayoutSuggestions", () => {
  it("doesn't ask the model when there are no SFBs", async () => {
    const empty = buildReport({ logPath: "keylog.csv", records: 0, skipped: 0, stats: computeKeylogStats([]), top: 5 })

    await expect(requestLayoutSuggestions({ report: empty })).resolves.toEqual({
      suggestions: [],
      raw: "No same-finger bigrams available for suggestion.",
    })
  })
})
