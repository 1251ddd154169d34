/**
 * File Storage
 *
 * Synchronous UTF-8 file backing. A missing file reads as empty and is only
 * created on the first write, along with its parent directories.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs"
import path from "node:path"
import { StorageError } from "../errors"
import type { StorageAdapter } from "./types"

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export class FileStorage implements StorageAdapter {
  readonly location: string

  constructor(filePath: string) {
    this.location = path.resolve(filePath)
  }

  read(): string | undefined {
    try {
      return readFileSync(this.location, "utf8")
    } catch (error) {
      if (isMissingFile(error)) return undefined
      throw new StorageError(
        `Cannot read store file: ${this.location}`,
        this.location,
        error instanceof Error ? error : undefined,
      )
    }
  }

  write(text: string): void {
    try {
      mkdirSync(path.dirname(this.location), { recursive: true })
      writeFileSync(this.location, text, "utf8")
    } catch (error) {
      throw new StorageError(
        `Cannot write store file: ${this.location}`,
        this.location,
        error instanceof Error ? error : undefined,
      )
    }
  }
}
