/**
 * Reconciliation orchestration (up command).
 *
 * WHY: Orchestrates one convergence pass:
 * - Load and validate envsync.yaml (config errors surface before any probing)
 * - Acquire the project lock
 * - Probe → diff → apply
 * - Record the marker only when the apply fully converged
 *
 * A dry run stops after the diff and takes no lock.
 */

import {
  type ApplyResult,
  type DesiredState,
  type ObservedState,
  type Plan,
  type StateMarker,
  isConvergedPlan,
  logger,
  withProjectLock,
} from '@envsync/core'

import { type ApplyProgressEvent, apply } from './apply.js'
import { type EngineOptions, loadProject } from './context.js'
import { diff } from './diff.js'
import { probe } from './probe.js'
import { StateRecorder } from './state.js'

/**
 * Options for reconcile operation.
 */
export interface ReconcileOptions extends EngineOptions {
  /** Stop after planning (default: false) */
  dryRun?: boolean | undefined
  /** Wait for a concurrent reconciliation instead of failing (default: false) */
  wait?: boolean | undefined
  /** Cancels the plan between actions */
  signal?: AbortSignal | undefined
  /** Progress callback for each action */
  onProgress?: ((event: ApplyProgressEvent) => void) | undefined
  /** Clock for the marker timestamp (default: new Date()) */
  now?: (() => Date) | undefined
}

/**
 * Result of reconcile operation.
 */
export interface ReconcileResult {
  desired: DesiredState
  /** Snapshot the plan was computed from */
  observed: ObservedState
  plan: Plan
  /** Apply result; undefined for a dry run */
  result?: ApplyResult | undefined
  /** Whether the last-applied marker was (re)written */
  markerWritten: boolean
  /** Marker after this pass, when one was written */
  marker?: StateMarker | undefined
}

/**
 * Converge a project's environment to its envsync.yaml.
 *
 * @throws ConfigInvalidError / ConfigNotFoundError before any probing
 * @throws LockContentionError if another reconciliation holds the lock
 */
export async function reconcile(
  projectRoot: string,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const { desired, provider } = await loadProject(projectRoot, options)
  const probeOptions = { provider, env: options.env }

  if (options.dryRun) {
    const observed = await probe(projectRoot, desired, probeOptions)
    return { desired, observed, plan: diff(desired, observed), markerWritten: false }
  }

  return withProjectLock(
    projectRoot,
    async () => {
      const observed = await probe(projectRoot, desired, probeOptions)
      const plan = diff(desired, observed)
      logger.info('Planned reconciliation', {
        projectRoot,
        actions: plan.actions.map((action) => action.kind),
      })

      const result = await apply(
        plan,
        provider,
        { projectRoot, desired, env: options.env },
        { signal: options.signal, onProgress: options.onProgress }
      )

      if (result.status !== 'converged') {
        logger.info('Reconciliation did not converge; marker left unchanged', {
          status: result.status,
        })
        return { desired, observed, plan, result, markerWritten: false }
      }

      // An already-converged environment only needs the marker refreshed when it is stale
      const markerCurrent =
        isConvergedPlan(plan) && observed.lastAppliedFingerprint === plan.fingerprint
      if (markerCurrent) {
        return { desired, observed, plan, result, markerWritten: false }
      }

      const marker = await new StateRecorder(projectRoot, options.now).recordSuccess(
        plan.fingerprint
      )
      return { desired, observed, plan, result, markerWritten: true, marker }
    },
    { wait: options.wait }
  )
}
