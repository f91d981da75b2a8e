import { afterAll, beforeAll, describe, expect, it } from "vitest"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { KeylogError } from "../src/errors.ts"
import { parseKeylog, readKeylog } from "../src/log.ts"

let tempDir: string

beforeAll(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "keylog-stats-log-"))
})

afterAll(async () => {
  await rm(tempDir, { recursive: true, force: true })
})

describe("parseKeylog", () => {
  it("decodes key and combo rows", () => {
    const records = parseKeylog(["0x0016,1,2,0,1,0x02,0x00,1", "COMBO,NA,NA,0,0,0,0,6"].join("\n"))

    expect(records).toEqual([
      {
        line: 1,
        keycode: "0x0016",
        row: "1",
        col: "2",
        highestLayer: 0,
        pressed: 1,
        mods: "0x02",
        oneshotMods: "0x00",
        tapCount: 1,
      },
      {
        line: 2,
        keycode: "COMBO",
        row: "NA",
        col: "NA",
        highestLayer: 0,
        pressed: 0,
        mods: "0",
        oneshotMods: "0",
        tapCount: 6,
      },
    ])
  })

  it("skips blank lines and accepts CRLF", () => {
    const records = parseKeylog("0x0004,1,1,0,1,0x00,0x00,1\r\n\r\n0x0004,1,1,0,0,0x00,0x00,1\r\n")

    expect(records.length).toBe(2)
    expect(records[1].line).toBe(3)
    expect(records[1].pressed).toBe(0)
  })

  it("fails on a wrong field count with the line number", () => {
    const text = ["0x0004,1,1,0,1,0x00,0x00,1", "0x0004,1,1,0,1"].join("\n")

    expect(() => parseKeylog(text)).toThrow(KeylogError)
    expect(() => parseKeylog(text)).toThrow("Expected 8 fields but found 5 (line 2)")
  })

  it("fails on non-numeric counters", () => {
    try {
      parseKeylog("0x0004,1,1,zero,1,0x00,0x00,1")
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(KeylogError)
      if (error instanceof KeylogError) {
        expect(error.code).toBe("MALFORMED_RECORD")
        expect(error.line).toBe(1)
        expect(error.message).toBe("Invalid highest_layer 'zero' (line 1)")
      }
    }
  })
})

describe("readKeylog", () => {
  it("reads records from disk", async () => {
    const path = join(tempDir, "keylog.csv")
    await writeFile(path, "0x0004,3,4,1,1,0x00,0x00,2\n")

    const records = await readKeylog(path)
    expect(records.length).toBe(1)
    expect(records[0].highestLayer).toBe(1)
    expect(records[0].tapCount).toBe(2)
  })

  it("reports a missing file as an IO failure", async () => {
    await expect(readKeylog(join(tempDir, "missing.csv"))).rejects.toMatchObject({
      code: "IO_FAILURE",
    })
  })
})
