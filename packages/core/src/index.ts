/**
 * @envsync/core - Shared model and on-disk formats for envsync.
 *
 * WHY: The engine and the CLI agree on one desired-state model, one plan
 * vocabulary and one marker format. Keeping them here lets the engine be
 * tested without the CLI and the CLI format results without the engine's
 * internals.
 */

export * from './types/index.js'
export * from './config/index.js'
export * from './errors.js'

export { atomicWriteFile, atomicWriteJson } from './fs/atomic.js'
export { type ProjectLockOptions, withProjectLock } from './fs/lock.js'
export {
  getLogLevel,
  isLogLevel,
  LOG_LEVEL_ENV,
  type LogContext,
  type LogLevel,
  type Logger,
  logger,
  setLogLevel,
} from './logger.js'
