/**
 * Executor: applies a plan through a provisioning provider.
 *
 * WHY: Actions run strictly in plan order and the first failure halts the
 * plan. Nothing is rolled back: whatever succeeded stays applied, and the
 * next `up` re-probes and plans only the remaining gap.
 *
 * Cancellation is cooperative. An abort never interrupts an action that is
 * already running; it stops the executor from starting the next one.
 */

import {
  type Action,
  type ActionOutcome,
  type ApplyResult,
  type ApplyStatus,
  type Plan,
  type ProviderContext,
  type ProvisioningProvider,
  assertNever,
  describeAction,
  errorMessage,
  logger,
} from '@envsync/core'

export type ApplyProgressEvent =
  | { type: 'action-start'; action: Action; index: number; total: number }
  | { type: 'action-done'; outcome: ActionOutcome; index: number; total: number }

export interface ApplyOptions {
  /** Stops the plan before the next action once aborted */
  signal?: AbortSignal | undefined
  /** Called before and after each action */
  onProgress?: ((event: ApplyProgressEvent) => void) | undefined
  /** Clock used for action durations (default: Date.now) */
  now?: (() => number) | undefined
}

/**
 * Run one action against the provider.
 */
async function runAction(
  action: Action,
  provider: ProvisioningProvider,
  context: ProviderContext
): Promise<void> {
  switch (action.kind) {
    case 'create-environment':
      return provider.create(context, action)
    case 'install-dependencies':
      return provider.install(context, action)
    case 'set-env-vars':
      return provider.exportVars(context, action)
    case 'noop':
      return
    default:
      return assertNever(action)
  }
}

function computeStatus(outcomes: ActionOutcome[]): ApplyStatus {
  const mutating = outcomes.filter((o) => o.action.kind !== 'noop')
  if (mutating.every((o) => o.status === 'succeeded')) return 'converged'

  const attempted = mutating.filter((o) => o.status !== 'skipped')
  const first = attempted[0]
  if (first?.status === 'failed') return 'failed'
  return 'partially-converged'
}

/**
 * Apply a plan.
 *
 * Never throws for provider failures: they become a `failed` outcome and
 * every later action is `skipped`.
 */
export async function apply(
  plan: Plan,
  provider: ProvisioningProvider,
  context: ProviderContext,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const now = options.now ?? Date.now
  const total = plan.actions.length
  const outcomes: ActionOutcome[] = []
  let haltReason: string | undefined
  let cancelled = false

  for (const [index, action] of plan.actions.entries()) {
    if (haltReason === undefined && options.signal?.aborted) {
      cancelled = true
      haltReason = 'cancelled before start'
    }
    if (haltReason !== undefined) {
      outcomes.push({ action, status: 'skipped', reason: haltReason, durationMs: 0 })
      continue
    }

    options.onProgress?.({ type: 'action-start', action, index, total })
    const started = now()
    let outcome: ActionOutcome
    try {
      await runAction(action, provider, context)
      outcome = { action, status: 'succeeded', durationMs: now() - started }
      logger.info('Action succeeded', {
        action: describeAction(action),
        durationMs: outcome.durationMs,
      })
    } catch (error) {
      const reason = errorMessage(error)
      outcome = { action, status: 'failed', reason, durationMs: now() - started }
      haltReason = `not attempted: ${describeAction(action)} failed`
      logger.warn('Action failed', { action: describeAction(action), reason })
    }
    outcomes.push(outcome)
    options.onProgress?.({ type: 'action-done', outcome, index, total })
  }

  return { status: computeStatus(outcomes), outcomes, cancelled }
}
