import { KeylogError } from "./errors.ts"
import { readTextFile } from "./fs.ts"
import type { RawLogRecord } from "./types.ts"

const FIELD_COUNT = 8

export async function readKeylog(path: string): Promise<RawLogRecord[]> {
  const text = await readTextFile(path)
  return parseKeylog(text)
}

/**
 * Parses the headerless CSV written by the firmware:
 * `keycode,row,col,highest_layer,pressed,mods,oneshot_mods,tap_count`.
 * A bad line fails the whole log, since dropping it would skew every count.
 */
export function parseKeylog(text: string): RawLogRecord[] {
  const records: RawLogRecord[] = []

  const lines = text.split(/\r?\n/)
  for (const [index, line] of lines.entries()) {
    const trimmed = line.trim()
    if (!trimmed) continue

    const lineNumber = index + 1
    const fields = trimmed.split(",").map((field) => field.trim())
    if (fields.length !== FIELD_COUNT) {
      throw new KeylogError(
        `Expected ${FIELD_COUNT} fields but found ${fields.length}`,
        "MALFORMED_RECORD",
        lineNumber,
      )
    }

    const [keycode, row, col, highestLayer, pressed, mods, oneshotMods, tapCount] = fields
    records.push({
      line: lineNumber,
      keycode,
      row,
      col,
      highestLayer: parseUnsigned(highestLayer, "highest_layer", lineNumber),
      pressed: parseUnsigned(pressed, "pressed", lineNumber),
      mods,
      oneshotMods,
      tapCount: parseUnsigned(tapCount, "tap_count", lineNumber),
    })
  }

  return records
}

export function parseUnsigned(value: string, field: string, line: number): number {
  if (!/^\d+$/.test(value)) {
    throw new KeylogError(`Invalid ${field} '${value}'`, "MALFORMED_RECORD", line)
  }
  return Number(value)
}
