/**
 * Atomic file writes.
 *
 * WHY: The state marker must never be observed half-written, even if the
 * process is interrupted. Content goes to a sibling temp file first and is
 * renamed into place (rename is atomic within a directory).
 */

import { randomBytes } from 'node:crypto'
import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Write text to `path` atomically, creating parent directories.
 */
export async function atomicWriteFile(path: string, content: string): Promise<void> {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })
  const tempPath = join(dir, `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`)
  try {
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * Write a value as pretty-printed JSON atomically.
 */
export async function atomicWriteJson(path: string, value: unknown): Promise<void> {
  await atomicWriteFile(path, `${JSON.stringify(value, null, 2)}\n`)
}
