/**
 * @file Logger
 *
 * Pluggable logger. All methods are optional; missing methods are no-ops.
 *
 * @example
 * ```typescript
 * // Structured logging
 * const logger: OdmLogger = {
 *   debug: (msg, data) => console.debug(JSON.stringify({ level: 'debug', msg, ...data })),
 *   warn: (msg, data) => console.warn(JSON.stringify({ level: 'warn', msg, ...data })),
 * }
 * ```
 *
 * @module docmap/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMethod = (message: string, data?: Record<string, unknown>) => void

export interface OdmLogger {
  /** Catalog reads, skipped and satisfied indexes */
  debug?: LogMethod
  /** Indexes created */
  info?: LogMethod
  warn?: LogMethod
  /** Failed index creations */
  error?: LogMethod
}

const noop: LogMethod = () => {}

/**
 * Fills in no-ops for the methods a logger leaves out.
 */
export function resolveLogger(logger?: OdmLogger): Required<OdmLogger> {
  return {
    debug: logger?.debug ?? noop,
    info: logger?.info ?? noop,
    warn: logger?.warn ?? noop,
    error: logger?.error ?? noop,
  }
}

/**
 * Console logger with a timestamped prefix.
 */
export function createConsoleLogger(prefix = 'docmap'): Required<OdmLogger> {
  const write =
    (level: LogLevel): LogMethod =>
    (message, data) => {
      const line = `[${prefix} ${new Date().toISOString()}] ${level.toUpperCase()} ${message}`
      if (data) {
        console[level](line, data)
      } else {
        console[level](line)
      }
    }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  }
}
