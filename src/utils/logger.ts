/**
 * Logging
 *
 * Batch operations, transactions and the cache adapter report through the
 * module-level `logger`. It is silent until `setLogger` or the `logLevel`
 * setting of `configure` swaps it.
 *
 * @module utils/logger
 */

/**
 * Sink for kindling's diagnostics
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels, least to most verbose
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

/**
 * Writes to the console, each message prefixed with its level
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/** Discards everything */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages above `level` are dropped
 */
export function withLevel(inner: Logger, level: LogLevel): Logger {
  const threshold = LEVEL_ORDER[level]
  return {
    debug(message, ...args) {
      if (threshold >= LEVEL_ORDER.debug) inner.debug(message, ...args)
    },
    info(message, ...args) {
      if (threshold >= LEVEL_ORDER.info) inner.info(message, ...args)
    },
    warn(message, ...args) {
      if (threshold >= LEVEL_ORDER.warn) inner.warn(message, ...args)
    },
    error(message, error, ...args) {
      if (threshold >= LEVEL_ORDER.error) inner.error(message, error, ...args)
    },
  }
}

/** The logger every module reports through */
export let logger: Logger = noopLogger

/**
 * Replace the module-level logger
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger, withLevel } from 'kindling'
 *
 * setLogger(withLevel(consoleLogger, 'warn'))
 * ```
 */
export function setLogger(next: Logger): void {
  logger = next
}
