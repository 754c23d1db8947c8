/**
 * Observed-state types for envsync
 *
 * An ObservedState is a snapshot of the machine and project directory taken
 * by the prober. Each probe yields a new frozen snapshot.
 */

import type { DependencySpec } from './desired.js'
import type { Fingerprint } from './fingerprint.js'

/** Which part of the snapshot a probe issue degraded */
export type ProbeSubject = 'runtime' | 'environment' | 'dependencies' | 'variables' | 'marker'

/**
 * Non-fatal inspection failure. The affected field falls back to its
 * "absent" value and the issue is reported by doctor.
 */
export interface ProbeIssue {
  subject: ProbeSubject
  message: string
}

export interface ObservedState {
  /** Whether an interpreter usable for creating the environment was found */
  readonly runtimePresent: boolean
  /** Version of that interpreter */
  readonly runtimeVersion?: string | undefined
  /** Path or command of that interpreter */
  readonly runtimePath?: string | undefined
  /** Whether the project environment exists */
  readonly envExists: boolean
  /** Interpreter version inside the existing environment */
  readonly envRuntimeVersion?: string | undefined
  /** Dependencies recorded in (and confirmed against) the environment */
  readonly installedDependencies?: readonly DependencySpec[] | undefined
  /** Fingerprint of installedDependencies */
  readonly installedFingerprint?: Fingerprint | undefined
  /** Variables currently exported by the environment */
  readonly exportedVars: Readonly<Record<string, string>>
  /** Fingerprint written by the last converged reconciliation */
  readonly lastAppliedFingerprint?: Fingerprint | undefined
  /** When the last converged reconciliation finished (ISO 8601) */
  readonly timestampOfLastApply?: string | undefined
  /** Inspection problems encountered while probing */
  readonly issues: readonly ProbeIssue[]
}
