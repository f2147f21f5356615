/**
 * @shardwatch/types — Logger contract
 *
 * Every component logs through this shape so an operator (or a test) can
 * swap the sink. The default writes to the console with a `[scope]` prefix.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export function createConsoleLogger(scope: string): Logger {
  const tag = `[${scope}]`
  const verbose = Boolean(process.env.SHARDWATCH_DEBUG)

  return {
    debug: (message, ...details) => {
      if (verbose) console.debug(tag, message, ...details)
    },
    info:  (message, ...details) => console.log(tag, message, ...details),
    warn:  (message, ...details) => console.warn(tag, message, ...details),
    error: (message, ...details) => console.error(tag, message, ...details),
  }
}
