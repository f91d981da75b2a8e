import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { join } from "node:path"
import { LayoutModel, buildLayoutModel, findKeyById } from "../src/layout.ts"
import { parseLayoutOpts } from "../src/layoutOpts.ts"
import type { Key, LogicalEvent } from "../src/types.ts"

export const fixturesDir = fileURLToPath(new URL("./fixtures/", import.meta.url))
export const qmkRoot = join(fixturesDir, "qmk")
export const layoutOptsPath = join(fixturesDir, "layout.json")
export const keylogPath = join(fixturesDir, "keylog.csv")
export const keymapDir = join(qmkRoot, "keyboards", "splitkb", "keymaps", "default")

export async function loadFixtureLayout(): Promise<LayoutModel> {
  const [keymapC, keyboardJson, combosDef, opts] = await Promise.all([
    readFile(join(keymapDir, "keymap.c"), "utf8"),
    readFile(join(qmkRoot, "keyboards", "splitkb", "keyboard.json"), "utf8"),
    readFile(join(keymapDir, "combos.def"), "utf8"),
    readFile(layoutOptsPath, "utf8"),
  ])
  return buildLayoutModel({
    keymapC,
    keyboardJson,
    combosDef,
    layoutOpts: parseLayoutOpts("layout", opts),
  })
}

export function baseKey(layout: LayoutModel, id: string): Key {
  const key = findKeyById(layout.layers[0], id)
  if (!key) throw new Error(`No key ${id} on the base layer`)
  return key
}

export function single(key: Key): LogicalEvent {
  return { kind: "single", key, keycode: "0x0001", highestLayer: "_BASE", pressed: true, tapCount: 1 }
}

export function comboEvent(layout: LayoutModel, id: string): LogicalEvent {
  const combo = layout.combos.find((entry) => entry.id === id)
  if (!combo) throw new Error(`No combo ${id}`)
  return { kind: "combo", combo }
}
