import { generateText } from "ai"
import { openai } from "@ai-sdk/openai"
import { APP_NAME, DEFAULT_MODEL } from "./consts.ts"
import { formatFingerAssignment } from "./finger.ts"
import type { StatsReport } from "./report.ts"
import type { LayoutSuggestion, SuggestionResponse } from "./types.ts"

type SuggestionParams = {
  report: StatsReport
  model?: string
  temperature?: number
  topN?: number
}

export async function requestLayoutSuggestions({
  report,
  model = DEFAULT_MODEL,
  temperature = 0.1,
  topN = 5,
}: SuggestionParams): Promise<SuggestionResponse> {
  const sfbs = report.sfbs.find((section) => section.includeCombos)?.top ?? []
  if (sfbs.length === 0) {
    return { suggestions: [], raw: "No same-finger bigrams available for suggestion." }
  }

  const prompt = buildPrompt(report, topN)

  const { text } = await generateText({
    model: openai(model),
    temperature,
    maxOutputTokens: 800,
    system:
      "You are an HCI-focused keyboard layout mentor who reduces same-finger bigrams. " +
      "You must output strict JSON. Only move keys or combos that appear in the provided statistics. " +
      "Prefer small changes: swapping two keys or adding a combo for a frequent bigram. " +
      "Never move thumb keys to finger columns.",
    prompt,
  })

  return {
    suggestions: parseSuggestions(text),
    raw: text,
  }
}

export function buildPrompt(report: StatsReport, topN: number): string {
  const section = report.sfbs.find((entry) => entry.includeCombos)
  const sfbLines = (section?.top ?? [])
    .slice(0, topN)
    .map(
      (entry, index) =>
        `${index + 1}. ${entry.first} → ${entry.second} count=${entry.presses} share=${entry.percent.toFixed(2)}%${
          entry.combo ? " (involves a combo)" : ""
        }`,
    )
    .join("\n")

  const fingerLines = report.fingers
    .map((share) => `${formatFingerAssignment(share)}: ${share.percent.toFixed(2)}%`)
    .join("\n")

  return [
    "Analyse the following keylog statistics from a split keyboard and propose layout changes that reduce same-finger bigrams.",
    "",
    `Events: ${report.events}, key presses: ${report.keyPresses}, SFB events: ${report.sfbEvents}`,
    "",
    "Most frequent same-finger bigrams (first → second):",
    sfbLines,
    "",
    "Finger load:",
    fingerLines || "(no key presses)",
    "",
    "Respond with a JSON array of objects using this shape:",
    `[
  {
    "sfb": "SE_C → SE_S",
    "change": "Swap SE_S and SE_T",
    "rationale": "Explain which finger is relieved and what the change costs."
  }
]`,
    "",
    "Constraints:",
    "- Reference one of the listed bigrams in 'sfb'.",
    "- Keep fingers below 15% load where possible; do not overload the pinkies.",
    "- If no safe suggestion exists, return an empty JSON array [].",
  ].join("\n")
}

export function parseSuggestions(text: string): LayoutSuggestion[] {
  const jsonText = suggestionArrayText(text)
  if (!jsonText) return []

  let parsed: unknown
  try {
    parsed = JSON.parse(jsonText)
  } catch (error) {
    console.warn(`[${APP_NAME}] Failed to parse model suggestions: ${error}`)
    return []
  }
  if (!Array.isArray(parsed)) return []

  return parsed
    .map((entry: unknown) => sanitizeSuggestion(entry))
    .filter((entry): entry is LayoutSuggestion => entry !== null)
}

// Replies come bare or inside a ```json fence; either way the payload is the outermost array.
function suggestionArrayText(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/)
  const body = fenced ? fenced[1] : text
  const open = body.indexOf("[")
  const close = body.lastIndexOf("]")
  return open !== -1 && close > open ? body.slice(open, close + 1) : null
}

function sanitizeSuggestion(value: unknown): LayoutSuggestion | null {
  if (!value || typeof value !== "object") return null
  const sfb = "sfb" in value && typeof value.sfb === "string" ? value.sfb : null
  const change = "change" in value && typeof value.change === "string" ? value.change : null
  const rationale = "rationale" in value && typeof value.rationale === "string" ? value.rationale : ""

  if (!sfb || !change) return null

  return { sfb, change, rationale }
}
