/**
 * Storage Types
 *
 * The only contract between a database and its backing bytes: text in, text out.
 */

export interface StorageAdapter {
  /** Human-readable location, used in logs and errors */
  readonly location: string
  /** Current contents, or undefined when nothing has been written yet */
  read(): string | undefined
  /** Replace the whole contents */
  write(text: string): void
}
