export type KeylogErrorCode =
  // log or layout file could not be read
  | "IO_FAILURE"
  // a log line that does not match the record format
  | "MALFORMED_RECORD"
  // the log references a layer, key or combo the layout does not have
  | "LAYOUT_MISMATCH"
  // layout sources that cannot be assembled into a model
  | "INVALID_LAYOUT"

export class KeylogError extends Error {
  readonly code: KeylogErrorCode
  readonly line?: number

  constructor(message: string, code: KeylogErrorCode, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`)
    this.name = "KeylogError"
    this.code = code
    this.line = line
  }
}

export function isKeylogError(error: unknown): error is KeylogError {
  return error instanceof KeylogError
}
