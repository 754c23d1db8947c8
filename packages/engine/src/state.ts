/**
 * State recorder: the last-applied marker in `.envsync/state.json`.
 */

import { resolve } from 'node:path'

import {
  type Fingerprint,
  STATE_MARKER_VERSION,
  type StateMarker,
  getStatePath,
  logger,
  readStateJson,
  writeStateJson,
} from '@envsync/core'

export class StateRecorder {
  readonly projectRoot: string
  private readonly now: () => Date

  constructor(projectRoot: string, now: () => Date = () => new Date()) {
    this.projectRoot = resolve(projectRoot)
    this.now = now
  }

  get markerPath(): string {
    return getStatePath(this.projectRoot)
  }

  /**
   * Last converged marker, or undefined when none was written.
   *
   * @throws Error if the marker exists but is unreadable
   */
  async readLastApplied(): Promise<StateMarker | undefined> {
    return readStateJson(this.markerPath)
  }

  /**
   * Record that the project converged to `fingerprint`.
   * Callers only do this after a fully successful apply.
   */
  async recordSuccess(fingerprint: Fingerprint): Promise<StateMarker> {
    const marker: StateMarker = {
      version: STATE_MARKER_VERSION,
      projectPath: this.projectRoot,
      fingerprint,
      appliedAt: this.now().toISOString(),
    }
    await writeStateJson(this.markerPath, marker)
    logger.debug('Recorded converged state', { path: this.markerPath, fingerprint })
    return marker
  }
}
