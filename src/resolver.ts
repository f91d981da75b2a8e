import { APP_NAME, COMBO_KEYCODE, SENTINEL_MATRIX, SENTINEL_TOKEN } from "./consts.ts"
import { KeylogError, isKeylogError } from "./errors.ts"
import type { LayoutModel } from "./layout.ts"
import { parseUnsigned } from "./log.ts"
import type { LogicalEvent, RawLogRecord, ResolveOptions, ResolveResult } from "./types.ts"

/**
 * Turns raw log records into key and combo events, in log order.
 *
 * Releases and the sentinel rows that accompany combos are dropped. Records that
 * point at something the layout doesn't have either fail the run or are skipped
 * with a warning, depending on `onLayoutMismatch`.
 */
export function resolveEvents(
  records: readonly RawLogRecord[],
  layout: LayoutModel,
  options?: ResolveOptions,
): ResolveResult {
  const policy = options?.onLayoutMismatch ?? "fail"
  const events: LogicalEvent[] = []
  let skipped = 0

  for (const record of records) {
    try {
      const event = resolveRecord(record, layout)
      if (event) {
        events.push(event)
      }
    } catch (error) {
      if (policy === "skip" && isKeylogError(error) && error.code === "LAYOUT_MISMATCH") {
        console.warn(`[${APP_NAME}] Skipping record: ${error.message}`)
        skipped++
        continue
      }
      throw error
    }
  }

  return { events, skipped }
}

function resolveRecord(record: RawLogRecord, layout: LayoutModel): LogicalEvent | null {
  if (record.keycode === COMBO_KEYCODE) {
    const combo = layout.comboAt(record.tapCount)
    if (!combo) {
      throw new KeylogError(
        `Combo index ${record.tapCount} out of range (${layout.combos.length} combos)`,
        "LAYOUT_MISMATCH",
        record.line,
      )
    }
    return { kind: "combo", combo }
  }

  if (record.pressed === 0) return null
  if (record.row === SENTINEL_TOKEN) return null

  const row = parseUnsigned(record.row, "row", record.line)
  const col = parseUnsigned(record.col, "col", record.line)
  if (row === SENTINEL_MATRIX && col === SENTINEL_MATRIX) return null

  const highestLayer = layout.layerIdOf(record.highestLayer)
  if (highestLayer === null) {
    throw new KeylogError(
      `Layer out of bounds ${record.highestLayer} >= ${layout.layers.length}`,
      "LAYOUT_MISMATCH",
      record.line,
    )
  }

  const key = layout.resolveKey(record.highestLayer, [row, col])
  if (!key) {
    throw new KeylogError(
      `Could not find key for matrix position ${row} ${col} on layer ${highestLayer} or below`,
      "LAYOUT_MISMATCH",
      record.line,
    )
  }

  return {
    kind: "single",
    key,
    keycode: record.keycode,
    highestLayer,
    pressed: true,
    tapCount: record.tapCount,
  }
}
