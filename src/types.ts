export type Finger = "pinky" | "ring" | "middle" | "index" | "thumb"

export type Half = "left" | "right"

export type FingerAssignment = {
  finger: Finger
  half: Half
}

export type PhysicalPos = {
  col: number
  row: number
  half: Half
}

// [row, col] as the firmware addresses the switch
export type MatrixPos = readonly [number, number]

export type Key = {
  readonly id: string
  readonly x: number
  readonly y: number
  readonly physicalPos: PhysicalPos
  readonly finger: FingerAssignment
  readonly effort: number
  readonly matrixPos: MatrixPos
}

export type Layer = {
  readonly id: string
  readonly keys: readonly Key[]
}

export type Combo = {
  readonly id: string
  readonly output: string
  readonly keys: readonly Key[]
}

export type LayerDef = {
  layerId: string
  layoutId: string
  keys: string[]
}

export type RawLogRecord = {
  line: number
  keycode: string
  row: string
  col: string
  highestLayer: number
  pressed: number
  mods: string
  oneshotMods: string
  // combo index when keycode is COMBO
  tapCount: number
}

export type LogicalEvent =
  | { kind: "combo"; combo: Combo }
  | {
      kind: "single"
      key: Key
      keycode: string
      highestLayer: string
      pressed: boolean
      tapCount: number
    }

export type Sfb =
  | {
      kind: "single"
      firstKey: Key
      secondKey: Key
      finger: FingerAssignment
    }
  | {
      kind: "combo"
      firstKeys: readonly Key[]
      secondKeys: readonly Key[]
      fingers: FingerAssignment[]
    }

export type SfbStats = {
  presses: number
  sfb: Sfb
}

export type FingerCount = {
  finger: FingerAssignment
  count: number
}

export type KeylogStats = {
  outputFrequency: Map<string, number>
  // ordered by compareFingerAssignments
  fingerFrequency: FingerCount[]
  // one combo activation is one event
  totalEvents: number
  // one combo activation presses every key of the combo
  totalKeyPresses: number
  totalLeft: number
  totalRight: number
  totalSfbEvents: number
  // ascending by presses
  sfbs: SfbStats[]
  sfbsByFinger: Map<string, { finger: FingerAssignment; sfbs: Map<string, SfbStats> }>
  sfbsById: Map<string, SfbStats>
}

export type MismatchPolicy = "fail" | "skip"

export type ResolveOptions = {
  onLayoutMismatch?: MismatchPolicy
}

export type ResolveResult = {
  events: LogicalEvent[]
  skipped: number
}

export type LayoutSuggestion = {
  sfb: string
  change: string
  rationale: string
}

export type SuggestionResponse = {
  suggestions: LayoutSuggestion[]
  raw: string
}
