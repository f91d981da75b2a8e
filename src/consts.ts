export const APP_NAME = "keylog-stats"

export const DEFAULT_MODEL = "gpt-4o-mini"

export const COMBO_KEYCODE = "COMBO"

// row/col written alongside combo activations
export const SENTINEL_MATRIX = 254
export const SENTINEL_TOKEN = "NA"

export const TRANSPARENT_KEYS = new Set(["_______", "xxxxxxx"])

export const SFB_FIRST_WIDTH = 22
export const SFB_SECOND_WIDTH = 20
export const SFB_SEPARATOR = "    "
