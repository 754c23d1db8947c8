/**
 * Project layout constants and helpers.
 *
 * WHY: envsync keeps everything it owns under `<project>/.envsync/`: the
 * state marker, the reconciliation lock and the provider's environment.
 * The config file sits at the project root.
 */

import { stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

/** Project config filename */
export const CONFIG_FILENAME = 'envsync.yaml'

/** Directory for envsync-managed state inside a project */
export const STATE_DIR = '.envsync'

/** Filename of the last-applied marker inside STATE_DIR */
export const STATE_FILENAME = 'state.json'

/** Filename of the reconciliation lock inside STATE_DIR */
export const LOCK_FILENAME = 'reconcile.lock'

/** .gitignore entry covering STATE_DIR */
export const GITIGNORE_ENTRY = `${STATE_DIR}/`

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME)
}

export function getStateDir(projectRoot: string): string {
  return join(projectRoot, STATE_DIR)
}

export function getStatePath(projectRoot: string): string {
  return join(projectRoot, STATE_DIR, STATE_FILENAME)
}

export function getLockPath(projectRoot: string): string {
  return join(projectRoot, STATE_DIR, LOCK_FILENAME)
}

async function exists(path: string, kind: 'file' | 'directory'): Promise<boolean> {
  try {
    const stats = await stat(path)
    return kind === 'file' ? stats.isFile() : stats.isDirectory()
  } catch {
    return false
  }
}

/**
 * Find the project root for a working directory.
 *
 * Walks up looking for envsync.yaml first, then for a `.git` directory;
 * falls back to `start` itself.
 */
export async function findProjectRoot(start: string = process.cwd()): Promise<string> {
  const origin = resolve(start)

  for (const marker of [CONFIG_FILENAME, '.git'] as const) {
    let current = origin
    while (true) {
      const found =
        marker === CONFIG_FILENAME
          ? await exists(join(current, marker), 'file')
          : await exists(join(current, marker), 'directory')
      if (found) return current
      const parent = dirname(current)
      if (parent === current) break
      current = parent
    }
  }

  return origin
}
