export { restartable } from "./iterable"
export { Logger, createLogger } from "./logger"
export type { LogLevel, LoggerOptions } from "./logger"
