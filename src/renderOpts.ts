import { basename, extname } from "node:path"
import { z } from "zod"
import { KeylogError } from "./errors.ts"
import { readTextFile } from "./fs.ts"
import keyTitles from "./keyTitles.json"

const COLOR_PATTERN = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/

const KeyStyleSchema = z.object({
  keys: z.array(z.string()),
  title: z.string().optional(),
  hold_title: z.string().optional(),
  class: z.string().optional(),
})

const LegendSchema = z.object({
  class: z.string(),
  title: z.string(),
})

const RenderOutputsSchema = z.object({
  effort: z.boolean().default(false),
  layers: z.boolean().default(true),
  legend: z.boolean().default(true),
  combos: z.boolean().default(true),
  combo_keys_with_separate_imgs: z.array(z.string()).default([]),
  combo_highlight_groups: z.record(z.array(z.string())).default({}),
  combo_background_layer_class: z.string().default("combo-background"),
  active_class_in_separate_layer: z.string().default("combo-active"),
})

// The render fields live in the same file as the layout grids, which are read elsewhere.
export const RenderOptsSchema = z
  .object({
    layers: z.record(z.array(KeyStyleSchema)).default({}),
    legend: z.array(LegendSchema).default([]),
    colors: z.record(z.string().regex(COLOR_PATTERN, "Expected a #rgb or #rrggbb color")).default({}),
    outputs: RenderOutputsSchema.default({}),
  })
  .passthrough()

export type LegendEntry = z.infer<typeof LegendSchema>
export type RenderOutputs = z.infer<typeof RenderOutputsSchema>

export type KeyStyle = {
  id: string
  title: string
  holdTitle: string | null
  class: string
}

type PartialKeyStyle = {
  title?: string
  holdTitle?: string
  class?: string
}

export const FALLBACK_COLOR = "#e5c494"

const DEFAULT_LAYER = "default"

const KEY_TITLES: Record<string, string> = keyTitles

const BASIC_KEY = /^(SE|KC)_(\w|\d+|F\d+)$/

export function keyIdToTitle(id: string): string {
  const basic = id.match(BASIC_KEY)
  if (basic) return basic[2]
  return KEY_TITLES[id] ?? id
}

export class RenderOpts {
  readonly id: string
  readonly legend: readonly LegendEntry[]
  readonly outputs: RenderOutputs
  private readonly colors: Record<string, string>
  private readonly defaultKeys = new Map<string, PartialKeyStyle>()
  private readonly layerKeys = new Map<string, Map<string, PartialKeyStyle>>()

  constructor(id: string, spec: z.infer<typeof RenderOptsSchema>) {
    this.id = id
    this.legend = spec.legend
    this.outputs = spec.outputs
    this.colors = spec.colors

    for (const [layerId, styles] of Object.entries(spec.layers)) {
      let target = this.defaultKeys
      if (layerId !== DEFAULT_LAYER) {
        target = this.layerKeys.get(layerId) ?? new Map<string, PartialKeyStyle>()
        this.layerKeys.set(layerId, target)
      }
      for (const style of styles) {
        for (const key of style.keys) {
          target.set(key, { title: style.title, holdTitle: style.hold_title, class: style.class })
        }
      }
    }
  }

  /** Style of a key on a layer: built-in title, then the `default` entries, then the layer's own. */
  get(layerId: string, keyId: string): KeyStyle {
    const style: KeyStyle = { id: keyId, title: keyIdToTitle(keyId), holdTitle: null, class: "default" }
    for (const partial of [this.defaultKeys.get(keyId), this.layerKeys.get(layerId)?.get(keyId)]) {
      if (!partial) continue
      if (partial.title !== undefined) style.title = partial.title
      if (partial.holdTitle !== undefined) style.holdTitle = partial.holdTitle
      if (partial.class !== undefined) style.class = partial.class
    }
    return style
  }

  colorOf(className: string): string {
    return this.colors[className] ?? FALLBACK_COLOR
  }
}

export function parseRenderOpts(id: string, text: string): RenderOpts {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new KeylogError(`Render options ${id} are not valid JSON: ${error}`, "INVALID_LAYOUT")
  }

  const result = RenderOptsSchema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new KeylogError(`Invalid render options ${id}: ${issues.join("; ")}`, "INVALID_LAYOUT")
  }
  return new RenderOpts(id, result.data)
}

export async function loadRenderOpts(path: string): Promise<RenderOpts> {
  return parseRenderOpts(basename(path, extname(path)), await readTextFile(path))
}
