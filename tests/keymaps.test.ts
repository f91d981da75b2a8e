import { beforeAll, describe, expect, it } from "vitest"
import { readFile } from "node:fs/promises"
import { join } from "node:path"
import {
  KeymapSourceParser,
  getLayoutSpec,
  parseCombosFromSource,
  parseKeyboardSpec,
  parseLayersFromSource,
} from "../src/keymaps.ts"
import { KeylogError } from "../src/errors.ts"
import { keymapDir, qmkRoot } from "./helpers.ts"

let keymapC: string
let combosDef: string
let keyboardJson: string

beforeAll(async () => {
  keymapC = await readFile(join(keymapDir, "keymap.c"), "utf8")
  combosDef = await readFile(join(keymapDir, "combos.def"), "utf8")
  keyboardJson = await readFile(join(qmkRoot, "keyboards", "splitkb", "keyboard.json"), "utf8")
})

describe("parseLayersFromSource", () => {
  it("extracts every layer with its layout macro and keys", () => {
    const layers = parseLayersFromSource(keymapC)

    expect(layers.map((layer) => layer.layerId)).toEqual(["_BASE", "_NUM"])
    expect(layers[0].layoutId).toBe("LAYOUT")
    expect(layers[0].keys.length).toBe(35)
    expect(layers[0].keys[0]).toBe("KC_J")
    expect(layers[0].keys[34]).toBe("KC_E")
    expect(layers[1].keys[1]).toBe("KC_PLUS")
    expect(layers[1].keys[6]).toBe("_______")
  })

  it("drops comments between keys", () => {
    const src = `
const uint16_t PROGMEM keymaps[][MATRIX_ROWS][MATRIX_COLS] = {
    [0] = LAYOUT_2(
      KC_A, // home
      /* inner */ KC_B
    )
};
`
    const [layer] = parseLayersFromSource(src)
    expect(layer.keys).toEqual(["KC_A", "KC_B"])
  })

  it("returns no layers when there is no keymaps array", () => {
    expect(parseLayersFromSource("int main(void) { return 0; }")).toEqual([])
  })

  it("gives the same result when one parser is reused", () => {
    const parser = new KeymapSourceParser()
    const first = parser.parseLayers(keymapC)
    const second = parser.parseLayers(keymapC)
    expect(second).toEqual(first)
  })
})

describe("parseCombosFromSource", () => {
  it("reads COMB and SUBS lines in order", () => {
    const combos = parseCombosFromSource(combosDef)

    expect(combos.map((combo) => combo.id)).toEqual([
      "num",
      "https",
      "boot_r",
      "escape_sym",
      "lt_eq",
      "str_interp",
      "coln_sym",
    ])
    expect(combos[0]).toEqual({ id: "num", output: "NUMWORD", keys: ["MT_SPC", "KC_E"] })
    expect(combos[2].keys).toEqual(["KC_E", "KC_L", "KC_LPRN", "KC_RPRN", "KC_UNDS"])
  })

  it("unquotes plain substitution strings only", () => {
    const combos = parseCombosFromSource(combosDef)

    expect(combos[1].output).toBe("https://")
    expect(combos[4].output).toBe("<=")
    expect(combos[5].output).toBe('"#{}"SS_TAP(X_LEFT)')
  })

  it("rejects combos without keys", () => {
    expect(() => parseCombosFromSource("COMB(lonely, KC_A)")).toThrow(KeylogError)
  })
})

describe("parseKeyboardSpec", () => {
  it("resolves layout aliases", () => {
    const spec = parseKeyboardSpec(keyboardJson)

    const direct = getLayoutSpec(spec, "LAYOUT")
    const aliased = getLayoutSpec(spec, "LAYOUT_split_3x5_3")
    expect(direct?.layout.length).toBe(35)
    expect(aliased).toBe(direct)
    expect(getLayoutSpec(spec, "LAYOUT_ortho")).toBeNull()
  })

  it("stops on alias cycles", () => {
    const spec = parseKeyboardSpec(JSON.stringify({ layouts: {}, layout_aliases: { A: "B", B: "A" } }))
    expect(getLayoutSpec(spec, "A")).toBeNull()
  })

  it("rejects keys without a matrix position", () => {
    const text = JSON.stringify({ layouts: { LAYOUT: { layout: [{ x: 0, y: 0 }] } } })
    expect(() => parseKeyboardSpec(text)).toThrow(/Invalid keyboard\.json: layouts\.LAYOUT\.layout\.0\.matrix/)
  })
})
