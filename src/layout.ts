import { basename, extname, join } from "node:path"
import { TRANSPARENT_KEYS } from "./consts.ts"
import { KeylogError } from "./errors.ts"
import { fingerAssignmentKey, sameFinger, uniqueSortedFingers } from "./finger.ts"
import { fileExists, readTextFile } from "./fs.ts"
import {
  type ComboDef,
  type KeyboardSpec,
  KeymapSourceParser,
  getLayoutSpec,
  parseKeyboardSpec,
} from "./keymaps.ts"
import { type LayoutOpts, fingerAt, parseLayoutOpts, physicalPosAt } from "./layoutOpts.ts"
import type { Combo, FingerAssignment, Key, Layer, LayerDef, MatrixPos } from "./types.ts"

export type LayoutSources = {
  keymapC: string
  keyboardJson: string
  combosDef: string
  layoutOpts: LayoutOpts
}

export type QmkPaths = {
  qmkRoot: string
  keyboard: string
  keymap: string
}

/**
 * Layers and combos of one keymap. Keys and combos are created once here and
 * handed out by reference to everything downstream.
 */
export class LayoutModel {
  readonly layers: readonly Layer[]
  readonly combos: readonly Combo[]

  constructor(layers: readonly Layer[], combos: readonly Combo[]) {
    this.layers = layers
    this.combos = combos
  }

  /** Walks from `layerIndex` down to the base layer, skipping transparent keys. */
  resolveKey(layerIndex: number, pos: MatrixPos): Key | null {
    if (layerIndex >= this.layers.length) return null

    for (let current = layerIndex; current >= 0; current--) {
      const key = findKeyByMatrix(this.layers[current], pos)
      if (key && !isTransparentKey(key.id)) {
        return key
      }
    }
    return null
  }

  layerIdOf(layerIndex: number): string | null {
    return this.layers[layerIndex]?.id ?? null
  }

  comboAt(index: number): Combo | null {
    return this.combos[index] ?? null
  }
}

export function isTransparentKey(id: string): boolean {
  return TRANSPARENT_KEYS.has(id)
}

export function findKeyByMatrix(layer: Layer, pos: MatrixPos): Key | null {
  return layer.keys.find((key) => key.matrixPos[0] === pos[0] && key.matrixPos[1] === pos[1]) ?? null
}

export function findKeyById(layer: Layer, id: string): Key | null {
  return layer.keys.find((key) => key.id === id) ?? null
}

export function samePosition(a: Key, b: Key): boolean {
  return a.physicalPos.col === b.physicalPos.col && a.physicalPos.row === b.physicalPos.row
}

function positionKey(key: Key): string {
  return `${key.physicalPos.col},${key.physicalPos.row}`
}

// Two different positions pressed by the same finger
export function isKeySfb(a: Key, b: Key): boolean {
  return !samePosition(a, b) && sameFinger(a.finger, b.finger)
}

export function createCombo(id: string, output: string, keys: readonly Key[]): Combo {
  const sorted = [...keys].sort(
    (a, b) => a.physicalPos.col - b.physicalPos.col || a.physicalPos.row - b.physicalPos.row,
  )
  return { id, output, keys: sorted }
}

export function comboFingers(combo: Combo): FingerAssignment[] {
  return uniqueSortedFingers(combo.keys.map((key) => key.finger))
}

export function comboPositions(combo: Combo): Set<string> {
  return new Set(combo.keys.map(positionKey))
}

export function comboContainsPosition(combo: Combo, key: Key): boolean {
  return combo.keys.some((comboKey) => samePosition(comboKey, key))
}

export function comboContainsFinger(combo: Combo, finger: FingerAssignment): boolean {
  return combo.keys.some((comboKey) => sameFinger(comboKey.finger, finger))
}

export function isComboKeySfb(combo: Combo, key: Key): boolean {
  // the key being part of the chord is no finger movement
  if (comboContainsPosition(combo, key)) return false
  return comboContainsFinger(combo, key.finger)
}

export function isComboComboSfb(a: Combo, b: Combo): boolean {
  const positions = comboPositions(a)
  if (b.keys.some((key) => positions.has(positionKey(key)))) return false

  const fingers = new Set(comboFingers(a).map(fingerAssignmentKey))
  return comboFingers(b).some((finger) => fingers.has(fingerAssignmentKey(finger)))
}

export function isHorizontalNeighbour(combo: Combo): boolean {
  if (combo.keys.length !== 2) return false
  const [a, b] = combo.keys
  return a.physicalPos.row === b.physicalPos.row && Math.abs(a.physicalPos.col - b.physicalPos.col) === 1
}

export function isVerticalNeighbour(combo: Combo): boolean {
  if (combo.keys.length !== 2) return false
  const [a, b] = combo.keys
  return a.physicalPos.col === b.physicalPos.col && Math.abs(a.physicalPos.row - b.physicalPos.row) === 1
}

// Three adjacent keys in one row
export function isMidTriple(combo: Combo): boolean {
  if (combo.keys.length !== 3) return false
  const [a, b, c] = combo.keys
  return (
    a.physicalPos.row === b.physicalPos.row &&
    b.physicalPos.row === c.physicalPos.row &&
    b.physicalPos.col - a.physicalPos.col === 1 &&
    c.physicalPos.col - b.physicalPos.col === 1
  )
}

export function buildLayer(def: LayerDef, spec: KeyboardSpec, opts: LayoutOpts): Layer {
  const layoutSpec = getLayoutSpec(spec, def.layoutId)
  if (!layoutSpec) {
    throw new KeylogError(`Failed to find layout spec for ${def.layoutId}`, "INVALID_LAYOUT")
  }

  if (def.keys.length !== layoutSpec.layout.length) {
    throw new KeylogError(
      `Layer ${def.layerId} has ${def.keys.length} keys but layout ${def.layoutId} has ${layoutSpec.layout.length}`,
      "INVALID_LAYOUT",
    )
  }

  const keys = def.keys.map((id, index): Key => {
    const keySpec = layoutSpec.layout[index]
    const { col, row, half, value } = physicalPosAt(opts, index)
    return {
      id,
      x: keySpec.x,
      y: keySpec.y,
      physicalPos: { col, row, half },
      finger: fingerAt(opts, index),
      effort: value,
      matrixPos: [keySpec.matrix[0], keySpec.matrix[1]],
    }
  })

  return { id: def.layerId, keys }
}

export function buildCombos(defs: readonly ComboDef[], baseLayer: Layer): Combo[] {
  return defs.map((def) => {
    const keys = def.keys.map((id) => {
      const key = findKeyById(baseLayer, id)
      if (!key) {
        throw new KeylogError(`Couldn't find combo key ${id} of ${def.id} in base layer`, "INVALID_LAYOUT")
      }
      return key
    })
    return createCombo(def.id, def.output, keys)
  })
}

export function buildLayoutModel(
  sources: LayoutSources,
  parser = new KeymapSourceParser(),
): LayoutModel {
  const layerDefs = parser.parseLayers(sources.keymapC)
  if (layerDefs.length === 0) {
    throw new KeylogError("No layers found in keymap.c", "INVALID_LAYOUT")
  }

  const keyboardSpec = parseKeyboardSpec(sources.keyboardJson)
  const layers = layerDefs.map((def) => buildLayer(def, keyboardSpec, sources.layoutOpts))
  const combos = buildCombos(parser.parseCombos(sources.combosDef), layers[0])

  return new LayoutModel(layers, combos)
}

export function keyboardDir(paths: QmkPaths): string {
  return join(paths.qmkRoot, "keyboards", paths.keyboard)
}

// Keymaps of a revisioned keyboard ("crkbd/rev1") live under the base keyboard
export function keymapDir(paths: QmkPaths): string {
  const [base] = paths.keyboard.split("/")
  return join(paths.qmkRoot, "keyboards", base, "keymaps", paths.keymap)
}

export async function loadLayoutModel(paths: QmkPaths, layoutOptsPath: string): Promise<LayoutModel> {
  const optsText = await readTextFile(layoutOptsPath)
  const layoutOpts = parseLayoutOpts(basename(layoutOptsPath, extname(layoutOptsPath)), optsText)

  const keymapC = await readTextFile(join(keymapDir(paths), "keymap.c"))

  const keyboardJsonPath = join(keyboardDir(paths), "keyboard.json")
  const infoJsonPath = join(keyboardDir(paths), "info.json")
  let keyboardJson: string
  if (await fileExists(keyboardJsonPath)) {
    keyboardJson = await readTextFile(keyboardJsonPath)
  } else if (await fileExists(infoJsonPath)) {
    keyboardJson = await readTextFile(infoJsonPath)
  } else {
    throw new KeylogError(
      `Couldn't find keyboard.json or info.json at ${keyboardJsonPath} nor ${infoJsonPath}`,
      "IO_FAILURE",
    )
  }

  const combosPath = join(keymapDir(paths), "combos.def")
  const combosDef = (await fileExists(combosPath)) ? await readTextFile(combosPath) : ""

  return buildLayoutModel({ keymapC, keyboardJson, combosDef, layoutOpts })
}
