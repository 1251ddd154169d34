/**
 * Memory Storage
 *
 * Keeps the persisted text in a string. Zero infrastructure, for tests and
 * throwaway databases.
 */

import type { StorageAdapter } from "./types"

export class MemoryStorage implements StorageAdapter {
  readonly location: string
  private contents: string | undefined
  private _writes = 0

  constructor(initial?: string, location = "memory") {
    this.contents = initial
    this.location = location
  }

  read(): string | undefined {
    return this.contents
  }

  write(text: string): void {
    this.contents = text
    this._writes += 1
  }

  /** Number of writes so far */
  get writes(): number {
    return this._writes
  }
}
