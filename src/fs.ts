import { access, mkdir, readFile, writeFile } from "node:fs/promises"
import { constants } from "node:fs"
import { dirname } from "node:path"
import { KeylogError } from "./errors.ts"

export async function readTextFile(path: string): Promise<string> {
  try {
    await access(path, constants.F_OK)
  } catch {
    throw new KeylogError(`File not found: ${path}`, "IO_FAILURE")
  }

  try {
    return await readFile(path, "utf8")
  } catch (error) {
    throw new KeylogError(`Unable to read ${path}: ${error}`, "IO_FAILURE")
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK)
    return true
  } catch {
    return false
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, "utf8")
  } catch (error) {
    throw new KeylogError(`Unable to write ${path}: ${error}`, "IO_FAILURE")
  }
}
