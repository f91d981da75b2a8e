import { define } from "gunshi"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import { requestLayoutSuggestions } from "./ai.ts"
import { APP_NAME, DEFAULT_MODEL } from "./consts.ts"
import { type QmkPaths, loadLayoutModel } from "./layout.ts"
import { groupCombos, renderLayout, writeRenderedFiles } from "./render.ts"
import { loadRenderOpts } from "./renderOpts.ts"
import { buildReport, formatHumanReport, type StatsReport } from "./report.ts"
import { statsFromFile } from "./stats.ts"
import type { MismatchPolicy, SuggestionResponse } from "./types.ts"

const OUTPUT_FORMATS = ["human", "json"] as const
const MISMATCH_POLICIES = ["fail", "skip"] as const satisfies readonly MismatchPolicy[]

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

type Env = Record<string, string | undefined>

export type AnalyzeOptions = {
  qmkRoot: string
  keyboard: string
  keymap: string
  layoutOpts: string
  logPath: string
  top: number
  onLayoutMismatch: MismatchPolicy
}

type OutputPayload = {
  report: StatsReport
  suggestions: SuggestionResponse | null
  format: OutputFormat
}

/** `$KEYLOG_STATS_LOG`, else `keylog.csv` under the XDG data directory. */
export function defaultKeylogPath(env: Env = process.env): string {
  if (env.KEYLOG_STATS_LOG) return env.KEYLOG_STATS_LOG
  const dataHome = env.XDG_DATA_HOME || join(env.HOME || homedir(), ".local", "share")
  return join(dataHome, APP_NAME, "keylog.csv")
}

export async function analyzeKeylog(options: AnalyzeOptions): Promise<StatsReport> {
  const layout = await loadLayoutModel(
    {
      qmkRoot: expandPath(options.qmkRoot),
      keyboard: options.keyboard,
      keymap: options.keymap,
    },
    expandPath(options.layoutOpts),
  )

  const logPath = expandPath(options.logPath)
  const { stats, records, skipped } = await statsFromFile(layout, logPath, {
    onLayoutMismatch: options.onLayoutMismatch,
  })

  return buildReport({ logPath, records, skipped, stats, top: options.top })
}

// Flags both commands need to build the layout model
const layoutArgs = {
  "qmk-root": {
    type: "string",
    description: "Path to the qmk_firmware checkout (defaults to $KEYLOG_STATS_QMK_ROOT)",
  },
  keyboard: {
    type: "string",
    description: "Keyboard directory under keyboards/, e.g. crkbd/rev1",
  },
  keymap: {
    type: "string",
    description: "Keymap name",
    default: "default",
  },
  "layout-opts": {
    type: "string",
    description: "JSON file with physical_layout and finger_assignments grids",
  },
} as const

function layoutInputs(values: Record<string, unknown>): { paths: QmkPaths; layoutOpts: string } {
  const qmkRoot = stringValue(values["qmk-root"]) ?? process.env.KEYLOG_STATS_QMK_ROOT
  const keyboard = stringValue(values.keyboard)
  const layoutOpts = stringValue(values["layout-opts"])
  if (!qmkRoot) throw new Error("Missing --qmk-root (or KEYLOG_STATS_QMK_ROOT)")
  if (!keyboard) throw new Error("Missing --keyboard")
  if (!layoutOpts) throw new Error("Missing --layout-opts")
  return { paths: { qmkRoot, keyboard, keymap: stringValue(values.keymap) ?? "default" }, layoutOpts }
}

export const command = define({
  name: "stats",
  description: "Finger usage and same-finger bigram statistics from a QMK keylog.",
  args: {
    ...layoutArgs,
    log: {
      type: "string",
      description: "Path to the keylog CSV",
      default: defaultKeylogPath(),
    },
    top: {
      type: "number",
      description: "Number of SFBs to list",
      default: 10,
    },
    format: {
      type: "string",
      description: "Output format (human|json)",
      default: "human",
    },
    "on-mismatch": {
      type: "string",
      description: "What to do with records the layout can't resolve (fail|skip)",
      default: "fail",
    },
    "skip-ai": {
      type: "boolean",
      description: "Skip AI layout suggestions",
      default: false,
    },
    model: {
      type: "string",
      description: "Model identifier",
      default: DEFAULT_MODEL,
    },
    temperature: {
      type: "number",
      description: "Model temperature",
      default: 0.1,
    },
  },
  run: async (ctx) => {
    const values = ctx.values
    const format = parseFormat(stringValue(values.format))
    const { paths, layoutOpts } = layoutInputs(values)

    const logPath = stringValue(values.log) ?? defaultKeylogPath()
    if (format === "human") {
      console.log(`[${APP_NAME}] Analyzing log at ${expandPath(logPath)} ...`)
    }

    const top = numberValue(values.top) ?? 10
    const report = await analyzeKeylog({
      ...paths,
      layoutOpts,
      logPath,
      top,
      onLayoutMismatch: parsePolicy(stringValue(values["on-mismatch"])),
    })

    let suggestions: SuggestionResponse | null = null
    const skipAi = values["skip-ai"] === true

    if (!skipAi && process.env.OPENAI_API_KEY) {
      try {
        suggestions = await requestLayoutSuggestions({
          report,
          model: stringValue(values.model) ?? DEFAULT_MODEL,
          temperature: numberValue(values.temperature) ?? 0.1,
          topN: top,
        })
      } catch (error) {
        console.error(`[${APP_NAME}] Failed to request layout suggestions: ${error}`)
      }
    } else if (!skipAi) {
      console.warn(`[${APP_NAME}] OPENAI_API_KEY not found. Skipping AI suggestions.`)
    }

    emitOutput({ report, suggestions, format })
  },
})

export const renderCommand = define({
  name: "render",
  description: "Draw the keymap layers, legend and combos as SVG files.",
  args: {
    ...layoutArgs,
    output: {
      type: "string",
      short: "o",
      description: "Directory the SVG files are written to",
    },
  },
  run: async (ctx) => {
    const values = ctx.values
    const { paths, layoutOpts } = layoutInputs(values)
    const output = stringValue(values.output)
    if (!output) throw new Error("Missing --output")

    const layoutOptsPath = expandPath(layoutOpts)
    const [layout, opts] = await Promise.all([
      loadLayoutModel({ ...paths, qmkRoot: expandPath(paths.qmkRoot) }, layoutOptsPath),
      loadRenderOpts(layoutOptsPath),
    ])

    const written = await writeRenderedFiles(expandPath(output), renderLayout(layout, opts))
    for (const path of written) {
      console.log(`[${APP_NAME}] Wrote ${path}`)
    }

    if (opts.outputs.combos) {
      const groups = groupCombos(layout.combos, opts)
      const separate = [...groups.separate.values()].reduce((sum, combos) => sum + combos.length, 0)
      console.log(
        `[${APP_NAME}] Combos: ${groups.neighbours.length} neighbours, ${groups.midTriples.length} mid triples, ` +
          `${separate} on separate keys, ${groups.others.length} other (${layout.combos.length} total)`,
      )
    }
  },
})

export const subCommands = new Map([["render", renderCommand]])

export function emitOutput(payload: OutputPayload) {
  if (payload.format === "json") {
    console.log(JSON.stringify({ ...payload.report, ai: payload.suggestions }, null, 2))
    return
  }

  console.log(formatHumanReport(payload.report).join("\n"))

  if (payload.suggestions?.suggestions.length) {
    console.log("\nAI Suggestions:")
    payload.suggestions.suggestions.forEach((suggestion, index) => {
      console.log(`${index + 1}. ${suggestion.sfb}: ${suggestion.change}`)
      if (suggestion.rationale) {
        console.log(`   rationale: ${suggestion.rationale}`)
      }
    })
  } else if (payload.suggestions) {
    console.log("\nAI Suggestions: none (model returned empty set).")
  } else {
    console.log("\nAI Suggestions: skipped.")
  }
}

// `~` and `~/...` expand to the home directory; `~user` is left alone
export function expandPath(path: string, home: string = homedir()): string {
  if (path === "~") return home
  if (path.startsWith("~/")) return resolve(home, path.slice(2))
  return resolve(path)
}

function parseChoice<T extends string>(
  label: string,
  choices: readonly T[],
  input: string | undefined,
  fallback: T,
): T {
  if (!input) return fallback
  const value = input.toLowerCase()
  const choice = choices.find((entry) => entry === value)
  if (choice === undefined) {
    throw new Error(`Unknown ${label} '${input}' (expected ${choices.join(" or ")})`)
  }
  return choice
}

export function parseFormat(input: string | undefined): OutputFormat {
  return parseChoice("format", OUTPUT_FORMATS, input, "human")
}

export function parsePolicy(input: string | undefined): MismatchPolicy {
  return parseChoice("mismatch policy", MISMATCH_POLICIES, input, "fail")
}

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined
}

function numberValue(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined
}
