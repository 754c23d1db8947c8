/**
 * Apply result types for envsync
 */

import type { Action } from './plan.js'

export type ActionStatus = 'succeeded' | 'failed' | 'skipped'

export type ApplyStatus = 'converged' | 'partially-converged' | 'failed'

export interface ActionOutcome {
  action: Action
  status: ActionStatus
  /** Failure or skip reason */
  reason?: string | undefined
  /** Wall-clock duration of the action (0 when skipped) */
  durationMs: number
}

export interface ApplyResult {
  status: ApplyStatus
  /** One outcome per plan action, in plan order */
  outcomes: ActionOutcome[]
  /** Whether a cancellation signal stopped the plan early */
  cancelled: boolean
}

/**
 * Outcomes that completed successfully (noop excluded).
 */
export function succeededActions(result: ApplyResult): Action[] {
  return result.outcomes
    .filter((outcome) => outcome.status === 'succeeded' && outcome.action.kind !== 'noop')
    .map((outcome) => outcome.action)
}

/**
 * The outcome that halted the plan, if any.
 */
export function failedOutcome(result: ApplyResult): ActionOutcome | undefined {
  return result.outcomes.find((outcome) => outcome.status === 'failed')
}
