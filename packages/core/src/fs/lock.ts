/**
 * Per-project reconciliation lock.
 *
 * WHY: Two terminals running `envsync up` at once must not race on
 * environment creation. The lock lives next to the state marker
 * (`.envsync/reconcile.lock`) and is taken around probe → diff → apply →
 * record. Read-only commands (doctor, probe) never take it.
 */

import { mkdir } from 'node:fs/promises'

import lockfile from 'proper-lockfile'

import { getLockPath, getStateDir } from '../config/paths.js'
import { LockContentionError, errorMessage } from '../errors.js'
import { logger } from '../logger.js'

/** A lock not refreshed for this long is considered abandoned */
const LOCK_STALE_MS = 60_000

/** Refresh interval while the lock is held */
const LOCK_UPDATE_MS = 10_000

export interface ProjectLockOptions {
  /**
   * Wait for a held lock instead of failing immediately.
   * `true` waits up to about two minutes.
   */
  wait?: boolean | undefined
}

/**
 * Run `fn` while holding the project's reconciliation lock.
 *
 * @throws LockContentionError if the lock is held by another process
 */
export async function withProjectLock<T>(
  projectRoot: string,
  fn: () => Promise<T>,
  options: ProjectLockOptions = {}
): Promise<T> {
  const stateDir = getStateDir(projectRoot)
  const lockPath = getLockPath(projectRoot)
  await mkdir(stateDir, { recursive: true })

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(stateDir, {
      lockfilePath: lockPath,
      stale: LOCK_STALE_MS,
      update: LOCK_UPDATE_MS,
      retries: options.wait
        ? { retries: 40, factor: 1.2, minTimeout: 200, maxTimeout: 5_000 }
        : 0,
      onCompromised: (error) => {
        // Default behaviour throws from a timer; report instead
        logger.warn('Reconciliation lock compromised', { path: lockPath, error: error.message })
      },
    })
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ELOCKED') {
      throw new LockContentionError(lockPath, { cause: error })
    }
    throw error
  }

  logger.debug('Acquired reconciliation lock', { path: lockPath })
  try {
    return await fn()
  } finally {
    try {
      await release()
      logger.debug('Released reconciliation lock', { path: lockPath })
    } catch (error) {
      logger.warn('Failed to release reconciliation lock', {
        path: lockPath,
        error: errorMessage(error),
      })
    }
  }
}
