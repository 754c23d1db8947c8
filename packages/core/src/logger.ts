/**
 * Leveled logger for envsync internals.
 *
 * All log lines go to stderr so stdout stays usable for command output
 * (`envsync doctor --json`, forwarded output of `envsync run`).
 * The threshold comes from ENVSYNC_LOG_LEVEL (default: warn).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogContext = Record<string, unknown>

type LoggerFn = (message: string, context?: LogContext) => void

export interface Logger {
  debug: LoggerFn
  info: LoggerFn
  warn: LoggerFn
  error: LoggerFn
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const LOG_LEVEL_ENV = 'ENVSYNC_LOG_LEVEL'

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK
}

let threshold: LogLevel = resolveLevel(process.env[LOG_LEVEL_ENV])

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return normalized && isLogLevel(normalized) ? normalized : 'warn'
}

/**
 * Override the threshold (e.g. from a --verbose flag).
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return
  const line = `[envsync] ${level}: ${message}`
  const sink = level === 'warn' ? console.warn : console.error
  if (context && Object.keys(context).length > 0) {
    sink(line, context)
    return
  }
  sink(line)
}

export const logger: Logger = {
  debug: (message, context) => emit('debug', message, context),
  info: (message, context) => emit('info', message, context),
  warn: (message, context) => emit('warn', message, context),
  error: (message, context) => emit('error', message, context),
}
