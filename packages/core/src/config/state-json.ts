/**
 * State marker (.envsync/state.json) parser and serializer.
 *
 * WHY: The marker is the only state envsync persists between runs. It must
 * stay readable by future versions, so unknown fields are ignored and only
 * the fields this version needs are validated.
 */

import { readFile } from 'node:fs/promises'

import { z } from 'zod'

import { errorMessage } from '../errors.js'
import { atomicWriteJson } from '../fs/atomic.js'
import { type Fingerprint, isFingerprint } from '../types/fingerprint.js'

export const STATE_MARKER_VERSION = 1

export interface StateMarker {
  /** Marker format version */
  version: number
  /** Absolute project path the marker belongs to */
  projectPath: string
  /** Desired-state fingerprint that was converged */
  fingerprint: Fingerprint
  /** When convergence finished (ISO 8601) */
  appliedAt: string
}

const markerSchema = z.object({
  version: z.number().int().positive(),
  projectPath: z.string(),
  fingerprint: z.string().refine(isFingerprint, { message: 'invalid fingerprint' }),
  appliedAt: z.string().datetime({ offset: true }),
})

/**
 * Parse marker JSON. Extra fields are dropped.
 *
 * @throws Error if the content is not a valid marker
 */
export function parseStateJson(content: string): StateMarker {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new Error(`State marker is not valid JSON: ${errorMessage(error)}`)
  }
  const result = markerSchema.safeParse(raw)
  if (!result.success) {
    const first = result.error.issues[0]
    throw new Error(
      `State marker is invalid: ${first ? `${first.path.join('.')}: ${first.message}` : 'unknown'}`
    )
  }
  const { fingerprint, ...rest } = result.data
  if (!isFingerprint(fingerprint)) {
    throw new Error('State marker is invalid: fingerprint: invalid fingerprint')
  }
  return { ...rest, fingerprint }
}

/**
 * Read a marker file. Returns undefined when the file does not exist.
 *
 * @throws Error if the file exists but cannot be read or parsed
 */
export async function readStateJson(path: string): Promise<StateMarker | undefined> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined
    }
    throw error
  }
  return parseStateJson(content)
}

/**
 * Write a marker file atomically.
 */
export async function writeStateJson(path: string, marker: StateMarker): Promise<void> {
  await atomicWriteJson(path, marker)
}
