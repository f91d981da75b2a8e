import { join } from "node:path"
import { KeylogError } from "./errors.ts"
import { writeTextFile } from "./fs.ts"
import { type LayoutModel, isHorizontalNeighbour, isMidTriple, isVerticalNeighbour } from "./layout.ts"
import type { RenderOpts } from "./renderOpts.ts"
import type { Combo, Key, Layer } from "./types.ts"

const KEY_SIDE = 54
const KEYMAP_BORDER = 10
const LEGEND_COLUMNS = 4
const LEGEND_KEY_WIDTH = 4 * KEY_SIDE

const COMBO_KEY_HEIGHT = 16
const COMBO_TEXT_HEIGHT = 8
const COMBO_CHAR_WIDTH = 5
const COMBO_TEXT_PADDING = 10

export type RenderedFile = {
  name: string
  svg: string
}

type Border = {
  left: number
  right: number
  top: number
  bottom: number
}

export type KeyBox = {
  x: number
  y: number
  width: number
  height: number
  rx: number
  className: string
  outerColor: string
  title: string
  holdTitle: string | null
  textHeight: number
  border: Border
}

export type ComboGroups = {
  neighbours: Combo[]
  midTriples: Combo[]
  separate: Map<string, Combo[]>
  others: Combo[]
}

type LayerKeyOptions = {
  baseClass?: string
  classOverrides?: ReadonlyMap<string, string>
  blankClass?: string
  idOverrides?: ReadonlyMap<string, string>
}

const KEYCAP_BORDER: Border = { left: 6, right: 6, top: 4, bottom: 8 }
const COMBO_BORDER: Border = { left: 1.5, right: 1.5, top: 1, bottom: 2.5 }

const KEYCAP_STYLE = [
  ".keycap .border { stroke: black; stroke-width: 1; }",
  ".keycap .inner.border { stroke: rgba(0,0,0,.1); }",
  ".keycap { font-family: sans-serif; font-size: 11px; }",
  ".keycap .sub { font-size: 9px; }",
]

const COMBO_STYLE = [
  ...KEYCAP_STYLE,
  ".combo-output { font-family: sans-serif; font-size: 16px; }",
  `.combos .keycap { font-size: ${COMBO_TEXT_HEIGHT}px; }`,
]

const XML_ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
}

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPE_MAP[char] ?? char)
}

function fmt(value: number): string {
  return String(Math.round(value * 100) / 100)
}

/**
 * Raises the HSV value of a `#rgb`/`#rrggbb` color by `amount` (0..1). Hue and
 * saturation stay put, so every channel is scaled by the same factor.
 */
export function lightenColor(color: string, amount: number): string {
  const match = color.match(/^#([0-9a-f]{3}|[0-9a-f]{6})$/i)
  if (!match) {
    throw new KeylogError(`Invalid color '${color}'`, "INVALID_LAYOUT")
  }
  const hex = match[1].length === 3 ? Array.from(match[1], (char) => char + char).join("") : match[1]
  const channels = [0, 2, 4].map((offset) => Number.parseInt(hex.slice(offset, offset + 2), 16) / 255)

  const value = Math.max(...channels)
  const next = Math.min(value + amount, 1)
  const scaled = value === 0 ? channels.map(() => next) : channels.map((channel) => (channel * next) / value)

  return `#${scaled.map((channel) => Math.round(channel * 255).toString(16).padStart(2, "0")).join("")}`
}

export function renderKey(box: KeyBox): string {
  const innerX = box.x + box.border.left
  const innerY = box.y + box.border.top
  const innerWidth = box.width - (box.border.left + box.border.right)
  const innerHeight = box.height - (box.border.top + box.border.bottom)
  const innerColor = lightenColor(box.outerColor, 0.1)

  const lines = [
    `    <g class="keycap ${escapeXml(box.className)}">`,
    `      <rect x="${fmt(box.x)}" y="${fmt(box.y)}" width="${fmt(box.width)}" height="${fmt(box.height)}" rx="${fmt(box.rx)}" fill="${box.outerColor}" class="outer border"/>`,
    `      <rect x="${fmt(innerX)}" y="${fmt(innerY)}" width="${fmt(innerWidth)}" height="${fmt(innerHeight)}" rx="${fmt(box.rx)}" fill="${innerColor}" class="inner border"/>`,
  ]

  const textX = innerX + innerWidth / 2
  const text = box.title === "" ? [] : box.title.split(/\r?\n/)
  if (text.length > 0) {
    const textY = innerY + innerHeight / 2 - ((text.length - 1) * box.textHeight) / 2
    lines.push(
      `      <text x="${fmt(textX)}" y="${fmt(textY)}" text-anchor="middle" dominant-baseline="middle" class="main">`,
    )
    text.forEach((line, index) => {
      const dy = index === 0 ? 0 : box.textHeight
      lines.push(`        <tspan x="${fmt(textX)}" dy="${fmt(dy)}">${escapeXml(line)}</tspan>`)
    })
    lines.push("      </text>")
  }

  if (box.holdTitle !== null) {
    lines.push(
      `      <text x="${fmt(textX)}" y="${fmt(innerY + innerHeight + 6.2)}" text-anchor="middle" class="sub">${escapeXml(box.holdTitle)}</text>`,
    )
  }

  lines.push("    </g>")
  return lines.join("\n")
}

function svgDocument(width: number, height: number, style: readonly string[], body: readonly string[]): string {
  return [
    `<svg width="${fmt(width)}px" height="${fmt(height)}px" viewBox="0 0 ${fmt(width)} ${fmt(height)}" xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink">`,
    '  <style type="text/css">',
    ...style.map((rule) => `    ${rule}`),
    "  </style>",
    ...body,
    "</svg>",
    "",
  ].join("\n")
}

function layerSize(keys: readonly Key[]): { width: number; height: number } {
  let width = 0
  let height = 0
  for (const key of keys) {
    width = Math.max(width, (1 + key.x) * KEY_SIDE)
    height = Math.max(height, (1 + key.y) * KEY_SIDE)
  }
  return { width: width + KEYMAP_BORDER * 2, height: height + KEYMAP_BORDER * 2 }
}

function keycapBox(key: Key, className: string, outerColor: string, title: string, holdTitle: string | null): KeyBox {
  return {
    x: KEYMAP_BORDER + key.x * KEY_SIDE,
    y: KEYMAP_BORDER + key.y * KEY_SIDE,
    width: KEY_SIDE,
    height: KEY_SIDE,
    rx: 5,
    className,
    outerColor,
    title,
    holdTitle,
    textHeight: 11,
    border: KEYCAP_BORDER,
  }
}

function layerKeys(layer: Layer, opts: RenderOpts, options: LayerKeyOptions = {}): string[] {
  return layer.keys.map((key) => {
    const id = options.idOverrides?.get(key.id) ?? key.id
    const style = opts.get(layer.id, id)
    const className = options.classOverrides?.get(id) ?? options.baseClass ?? style.class
    const blank = className === options.blankClass
    return renderKey(
      keycapBox(key, className, opts.colorOf(className), blank ? "" : style.title, blank ? null : style.holdTitle),
    )
  })
}

export function renderLayer(layer: Layer, opts: RenderOpts): string {
  const { width, height } = layerSize(layer.keys)
  return svgDocument(width, height, KEYCAP_STYLE, layerKeys(layer, opts))
}

// Each key shows its effort digit, colored by an `effort-N` class
export function renderEffort(layer: Layer, opts: RenderOpts): string {
  const { width, height } = layerSize(layer.keys)
  const keys = layer.keys.map((key) => {
    const className = `effort-${key.effort}`
    return renderKey(keycapBox(key, className, opts.colorOf(className), String(key.effort), null))
  })
  return svgDocument(width, height, KEYCAP_STYLE, keys)
}

export function renderLegend(opts: RenderOpts): string | null {
  const count = opts.legend.length
  if (count === 0) return null

  const columns = Math.min(count, LEGEND_COLUMNS)
  const rows = Math.ceil(count / columns)
  const entries = opts.legend.map((entry, index) =>
    renderKey({
      x: KEYMAP_BORDER + (index % columns) * LEGEND_KEY_WIDTH,
      y: KEYMAP_BORDER + Math.floor(index / columns) * KEY_SIDE,
      width: LEGEND_KEY_WIDTH,
      height: KEY_SIDE,
      rx: 5,
      className: entry.class,
      outerColor: opts.colorOf(entry.class),
      title: entry.title,
      holdTitle: null,
      textHeight: 11,
      border: KEYCAP_BORDER,
    }),
  )

  return svgDocument(
    columns * LEGEND_KEY_WIDTH + KEYMAP_BORDER * 2,
    rows * KEY_SIDE + KEYMAP_BORDER * 2,
    KEYCAP_STYLE,
    entries,
  )
}

/**
 * Sorts combos into the images they are drawn on. Two-key combos on a key listed in
 * `combo_keys_with_separate_imgs` get that key's image (possibly several); the rest
 * go by shape.
 */
export function groupCombos(combos: readonly Combo[], opts: RenderOpts): ComboGroups {
  const separateKeys = new Set(opts.outputs.combo_keys_with_separate_imgs)
  const groups: ComboGroups = { neighbours: [], midTriples: [], separate: new Map(), others: [] }

  for (const combo of combos) {
    let handled = false
    if (combo.keys.length === 2) {
      for (const key of combo.keys) {
        if (!separateKeys.has(key.id)) continue
        const list = groups.separate.get(key.id) ?? []
        list.push(combo)
        groups.separate.set(key.id, list)
        handled = true
      }
    }
    if (handled) continue

    if (isMidTriple(combo)) {
      groups.midTriples.push(combo)
    } else if (isHorizontalNeighbour(combo) || isVerticalNeighbour(combo)) {
      groups.neighbours.push(combo)
    } else {
      groups.others.push(combo)
    }
  }

  return groups
}

function comboWidth(title: string, minWidth: number): number {
  return Math.max(Array.from(title).length * COMBO_CHAR_WIDTH + COMBO_TEXT_PADDING, minWidth)
}

// Middle of the vertical band that all keys overlap
function sharedMidY(keys: readonly Key[]): number {
  const top = Math.max(...keys.map((key) => key.y)) * KEY_SIDE
  const bottom = Math.min(...keys.map((key) => key.y)) * KEY_SIDE + KEY_SIDE
  return top + (bottom - top) / 2
}

function comboBox(combo: Combo, title: string, className: string, outerColor: string): KeyBox | null {
  let x: number
  let y: number
  let width: number

  if (isVerticalNeighbour(combo)) {
    const [a, b] = combo.keys
    width = comboWidth(title, 28)
    x = KEYMAP_BORDER + a.x * KEY_SIDE + KEY_SIDE / 2 - width / 2
    y = KEYMAP_BORDER + (1 + Math.min(a.y, b.y)) * KEY_SIDE - COMBO_KEY_HEIGHT / 2
  } else if (isHorizontalNeighbour(combo)) {
    const [a, b] = combo.keys
    width = comboWidth(title, 28)
    x = KEYMAP_BORDER + Math.max(a.x, b.x) * KEY_SIDE - width / 2
    y = KEYMAP_BORDER + sharedMidY(combo.keys) - COMBO_KEY_HEIGHT / 2
  } else if (isMidTriple(combo)) {
    const [a] = combo.keys
    width = comboWidth(title, 80)
    x = KEYMAP_BORDER + (1.5 + a.x) * KEY_SIDE - width / 2
    y = KEYMAP_BORDER + sharedMidY(combo.keys) - COMBO_KEY_HEIGHT / 2
  } else {
    return null
  }

  return {
    x,
    y,
    width,
    height: COMBO_KEY_HEIGHT,
    rx: 4,
    className,
    outerColor,
    title,
    holdTitle: null,
    textHeight: COMBO_TEXT_HEIGHT,
    border: COMBO_BORDER,
  }
}

/** The base layer in the background class with the combos drawn between their keys. */
export function renderCombosOnLayer(combos: readonly Combo[], baseLayer: Layer, opts: RenderOpts): string {
  const { width, height } = layerSize(baseLayer.keys)
  const background = layerKeys(baseLayer, opts, { baseClass: opts.outputs.combo_background_layer_class })

  const boxes: string[] = []
  for (const combo of combos) {
    const style = opts.get(baseLayer.id, combo.output)
    const box = comboBox(combo, style.title, style.class, opts.colorOf(style.class))
    if (box) {
      boxes.push(renderKey(box))
    }
  }

  return svgDocument(width, height, COMBO_STYLE, [...background, '  <g class="combos">', ...boxes, "  </g>"])
}

/**
 * One image per key: the key itself in the active class, each combo partner
 * labelled with that combo's output, everything else blank.
 */
export function renderSeparateCombos(
  activeKey: string,
  combos: readonly Combo[],
  baseLayer: Layer,
  opts: RenderOpts,
): string {
  const idOverrides = new Map<string, string>()
  const classOverrides = new Map<string, string>()
  for (const combo of combos) {
    const style = opts.get(baseLayer.id, combo.output)
    for (const key of combo.keys) {
      if (key.id === activeKey) continue
      idOverrides.set(key.id, combo.output)
      classOverrides.set(combo.output, style.class)
    }
  }
  classOverrides.set(activeKey, opts.outputs.active_class_in_separate_layer)

  const background = opts.outputs.combo_background_layer_class
  const { width, height } = layerSize(baseLayer.keys)
  return svgDocument(
    width,
    height,
    COMBO_STYLE,
    layerKeys(baseLayer, opts, { baseClass: background, classOverrides, blankClass: background, idOverrides }),
  )
}

export function renderSingleCombo(combo: Combo, baseLayer: Layer, opts: RenderOpts): string {
  const style = opts.get(baseLayer.id, combo.output)
  const classOverrides = new Map(combo.keys.map((key) => [key.id, style.class]))

  const { width, height } = layerSize(baseLayer.keys)
  const keys = layerKeys(baseLayer, opts, {
    baseClass: opts.outputs.combo_background_layer_class,
    classOverrides,
  })
  const output = `  <text x="${fmt(width / 2)}" y="12" text-anchor="middle" dominant-baseline="middle" class="combo-output">${escapeXml(combo.output)}</text>`

  return svgDocument(width, height, COMBO_STYLE, [...keys, output])
}

export function renderCombos(combos: readonly Combo[], baseLayer: Layer, opts: RenderOpts): RenderedFile[] {
  const groups = groupCombos(combos, opts)
  const files: RenderedFile[] = [
    { name: "neighbour_combos.svg", svg: renderCombosOnLayer(groups.neighbours, baseLayer, opts) },
    { name: "mid_triple_combos.svg", svg: renderCombosOnLayer(groups.midTriples, baseLayer, opts) },
  ]

  for (const [activeKey, keyCombos] of groups.separate) {
    files.push({ name: `${activeKey}.svg`, svg: renderSeparateCombos(activeKey, keyCombos, baseLayer, opts) })
  }
  for (const combo of groups.others) {
    files.push({ name: `${combo.id}.svg`, svg: renderSingleCombo(combo, baseLayer, opts) })
  }

  for (const [group, ids] of Object.entries(opts.outputs.combo_highlight_groups)) {
    const selected = combos.filter((combo) => ids.includes(combo.id))
    files.push({ name: `${group}.svg`, svg: renderCombosOnLayer(selected, baseLayer, opts) })
  }

  return files
}

export function renderLayout(layout: LayoutModel, opts: RenderOpts): RenderedFile[] {
  const files: RenderedFile[] = []
  const [baseLayer] = layout.layers
  const { outputs } = opts

  if (outputs.layers) {
    for (const layer of layout.layers) {
      files.push({ name: `${layer.id}.svg`, svg: renderLayer(layer, opts) })
    }
  }
  if (outputs.effort) {
    files.push({ name: "effort.svg", svg: renderEffort(baseLayer, opts) })
  }
  if (outputs.legend) {
    const legend = renderLegend(opts)
    if (legend !== null) {
      files.push({ name: "legend.svg", svg: legend })
    }
  }
  if (outputs.combos) {
    files.push(...renderCombos(layout.combos, baseLayer, opts))
  }

  return files
}

export async function writeRenderedFiles(outputDir: string, files: readonly RenderedFile[]): Promise<string[]> {
  const paths: string[] = []
  for (const file of files) {
    const path = join(outputDir, file.name)
    await writeTextFile(path, file.svg)
    paths.push(path)
  }
  return paths
}
