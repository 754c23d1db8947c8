/**
 * Error taxonomy for envsync.
 *
 * WHY: The CLI maps errors to exit codes and hints by `code`, so every
 * failure a user can hit carries one. Probe problems are not errors: they
 * are recorded as ProbeIssue data on the observed state.
 */

import type { Action } from './types/plan.js'

export type EnvsyncErrorCode =
  | 'config_not_found'
  | 'config_invalid'
  | 'config_exists'
  | 'action_failed'
  | 'target_not_found'
  | 'not_reconciled'
  | 'lock_contention'

export class EnvsyncError extends Error {
  readonly code: EnvsyncErrorCode

  constructor(code: EnvsyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EnvsyncError'
    this.code = code
  }
}

export class ConfigNotFoundError extends EnvsyncError {
  readonly configPath: string

  constructor(configPath: string) {
    super('config_not_found', `Config file not found: ${configPath}`)
    this.name = 'ConfigNotFoundError'
    this.configPath = configPath
  }
}

export class ConfigInvalidError extends EnvsyncError {
  readonly configPath: string
  readonly issues: string[]

  constructor(configPath: string, issues: string[], options?: { cause?: unknown }) {
    super('config_invalid', `Invalid config ${configPath}:\n  - ${issues.join('\n  - ')}`, options)
    this.name = 'ConfigInvalidError'
    this.configPath = configPath
    this.issues = issues
  }
}

export class ConfigExistsError extends EnvsyncError {
  readonly configPath: string

  constructor(configPath: string) {
    super('config_exists', `Config file already exists: ${configPath}`)
    this.name = 'ConfigExistsError'
    this.configPath = configPath
  }
}

/**
 * Thrown by providers when an external tool fails.
 */
export class ActionFailedError extends EnvsyncError {
  readonly command?: string | undefined
  readonly stderr?: string | undefined

  constructor(
    message: string,
    details: { command?: string | undefined; stderr?: string | undefined; cause?: unknown } = {}
  ) {
    super('action_failed', message, { cause: details.cause })
    this.name = 'ActionFailedError'
    this.command = details.command
    this.stderr = details.stderr
  }
}

export class TargetNotFoundError extends EnvsyncError {
  readonly target: string
  readonly available: string[]

  constructor(target: string, available: string[]) {
    super(
      'target_not_found',
      `Run target "${target}" not found (available: ${available.join(', ') || 'none'})`
    )
    this.name = 'TargetNotFoundError'
    this.target = target
    this.available = available
  }
}

export class EnvironmentNotReconciledError extends EnvsyncError {
  readonly pending: Action[]

  constructor(pending: Action[], details: string[]) {
    super(
      'not_reconciled',
      `Environment is not up to date (${pending.length} pending action${pending.length === 1 ? '' : 's'}):\n  - ${details.join('\n  - ')}`
    )
    this.name = 'EnvironmentNotReconciledError'
    this.pending = pending
  }
}

export class LockContentionError extends EnvsyncError {
  readonly lockPath: string

  constructor(lockPath: string, options?: { cause?: unknown }) {
    super('lock_contention', `Another envsync reconciliation holds the lock: ${lockPath}`, options)
    this.name = 'LockContentionError'
    this.lockPath = lockPath
  }
}

export function isEnvsyncError(error: unknown): error is EnvsyncError {
  return error instanceof EnvsyncError
}

/**
 * Render any thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
