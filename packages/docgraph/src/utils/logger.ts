/**
 * Logger Utility
 *
 * Leveled, contextual logging. Quiet by default: only warnings and errors are
 * written unless `DOCGRAPH_LOG_LEVEL` or the `level` option says otherwise.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levelPriority
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.DOCGRAPH_LOG_LEVEL?.toLowerCase()
  return isLogLevel(fromEnv) ? fromEnv : "warn"
}

export class Logger {
  readonly level: LogLevel
  readonly context: string
  readonly silent: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? defaultLevel()
    this.context = options.context ?? ""
    this.silent = options.silent ?? false
  }

  /**
   * Format a message with context, level and optional data
   */
  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : ""
    const output = `[${level}]${ctx} ${message}`
    return data ? `${output} ${JSON.stringify(data)}` : output
  }

  isEnabled(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("debug")) {
      console.debug(this.format("debug", message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("info")) {
      console.info(this.format("info", message, data))
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("warn")) {
      console.warn(this.format("warn", message, data))
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.isEnabled("error")) {
      console.error(this.format("error", message, data))
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
    })
  }
}

export function createLogger(context: string, options: Omit<LoggerOptions, "context"> = {}): Logger {
  return new Logger({ ...options, context })
}
