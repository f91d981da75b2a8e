import { z } from "zod"
import { KeylogError } from "./errors.ts"
import type { LayerDef } from "./types.ts"

const KeySpecSchema = z
  .object({
    matrix: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
    x: z.number(),
    y: z.number(),
  })
  .passthrough()

const LayoutSpecSchema = z
  .object({
    layout: z.array(KeySpecSchema),
  })
  .passthrough()

export const KeyboardSpecSchema = z
  .object({
    layouts: z.record(LayoutSpecSchema),
    layout_aliases: z.record(z.string()).optional(),
  })
  .passthrough()

export type KeySpec = z.infer<typeof KeySpecSchema>
export type LayoutSpec = z.infer<typeof LayoutSpecSchema>
export type KeyboardSpec = z.infer<typeof KeyboardSpecSchema>

export type ComboDef = {
  id: string
  output: string
  keys: string[]
}

/**
 * Extracts layers from keymap.c and combo definitions from combos.def.
 *
 * Each parser owns its patterns, so separate parsers never share match state.
 */
export class KeymapSourceParser {
  private readonly keymaps =
    /const\s+uint16_t\s+PROGMEM\s+keymaps\[\]\[\w+\]\[\w+\]\s*=\s*\{([\s\S]+?)^\s*\};/m
  private readonly layer = /\[(\w+)\]\s*=\s*(\w+)\(([\s\S]+?)^\s*\),?\s*$/gm
  private readonly comment = /\/\/[^\n]*|\/\*[\s\S]*?\*\//g
  private readonly comboLine = /^\s*(COMB|SUBS)\((.+)\)\s*$/
  private readonly quoted = /^"([^"]+)"$/

  parseLayers(src: string): LayerDef[] {
    const keymaps = src.match(this.keymaps)
    if (!keymaps) return []

    const body = keymaps[1].trim()
    const layers: LayerDef[] = []
    for (const match of body.matchAll(this.layer)) {
      const [, layerId, layoutId, rawKeys] = match
      const keys = rawKeys
        .replace(this.comment, "")
        .split(",")
        .map((key) => key.trim())
        .filter((key) => key.length > 0)
      layers.push({ layerId, layoutId, keys })
    }
    return layers
  }

  parseCombos(src: string): ComboDef[] {
    const combos: ComboDef[] = []

    for (const line of src.split(/\r?\n/)) {
      const spec = line.match(this.comboLine)
      if (!spec) continue

      const [, kind, rawArgs] = spec
      const args = rawArgs.split(",").map((arg) => arg.trim())
      if (args.length < 3) {
        throw new KeylogError(`Combo definition needs an id, an output and keys: '${line.trim()}'`, "INVALID_LAYOUT")
      }

      const [id, rawOutput, ...keys] = args
      let output = rawOutput
      if (kind === "SUBS") {
        const quoted = rawOutput.match(this.quoted)
        if (quoted) {
          output = quoted[1]
        }
      }
      combos.push({ id, output, keys })
    }

    return combos
  }
}

export function parseLayersFromSource(src: string, parser = new KeymapSourceParser()): LayerDef[] {
  return parser.parseLayers(src)
}

export function parseCombosFromSource(src: string, parser = new KeymapSourceParser()): ComboDef[] {
  return parser.parseCombos(src)
}

export function parseKeyboardSpec(text: string, source = "keyboard.json"): KeyboardSpec {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new KeylogError(`${source} is not valid JSON: ${error}`, "INVALID_LAYOUT")
  }

  const result = KeyboardSpecSchema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new KeylogError(`Invalid ${source}: ${issues.join("; ")}`, "INVALID_LAYOUT")
  }
  return result.data
}

export function getLayoutSpec(spec: KeyboardSpec, id: string): LayoutSpec | null {
  const seen = new Set<string>()
  let current = id

  while (!seen.has(current)) {
    seen.add(current)
    const layout = spec.layouts[current]
    if (layout) return layout

    const alias = spec.layout_aliases?.[current]
    if (!alias) return null
    current = alias
  }

  return null
}
