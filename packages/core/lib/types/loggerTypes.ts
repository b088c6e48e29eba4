export type LogFn = (obj: unknown, msg?: string, ...args: unknown[]) => void

/**
 * Subset of pino's logger, satisfied by `CommonLogger` from `@lokalise/node-core`.
 */
export type Logger = {
  error: LogFn
  info: LogFn
  warn: LogFn
  debug: LogFn
  trace: LogFn
  fatal: LogFn
}
