/**
 * Plan and action types for envsync
 *
 * Actions are data describing an intended mutation. The union is closed so
 * the executor and the doctor translator can match it exhaustively.
 * Plan order is fixed: create-environment, install-dependencies, set-env-vars.
 */

import { type DependencySpec, formatRequirement } from './desired.js'
import type { Fingerprint } from './fingerprint.js'

export interface CreateEnvironmentAction {
  kind: 'create-environment'
  /** Runtime constraint the new environment must satisfy */
  runtime: string
  /** True when an existing environment is deleted and rebuilt */
  recreate: boolean
  /** Why the environment has to be (re)created */
  reason: string
}

export interface InstallDependenciesAction {
  kind: 'install-dependencies'
  /** Full desired dependency set */
  dependencies: DependencySpec[]
  /** Dependencies missing or with a changed constraint */
  added: DependencySpec[]
  /** Names installed by a previous pass that are no longer declared */
  removed: string[]
}

export interface SetEnvVarsAction {
  kind: 'set-env-vars'
  /** Variables whose exported value is missing or different */
  vars: Record<string, string>
  /** Exported variables that are no longer declared */
  unset: string[]
}

export interface NoOpAction {
  kind: 'noop'
}

export type Action = CreateEnvironmentAction | InstallDependenciesAction | SetEnvVarsAction | NoOpAction

export type ActionKind = Action['kind']

/** Rank used to enforce plan ordering */
export const ACTION_ORDER: Record<ActionKind, number> = {
  'create-environment': 0,
  'install-dependencies': 1,
  'set-env-vars': 2,
  noop: 3,
}

export interface Plan {
  /** Ordered actions; `[noop]` when already converged */
  actions: Action[]
  /** Desired-state fingerprint the plan converges to */
  fingerprint: Fingerprint
}

/**
 * Exhaustiveness guard for switch statements over closed unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`)
}

/**
 * Actions that actually mutate something.
 */
export function pendingActions(plan: Plan): Action[] {
  return plan.actions.filter((action) => action.kind !== 'noop')
}

/**
 * A plan with zero non-noop actions means the environment is converged.
 */
export function isConvergedPlan(plan: Plan): boolean {
  return pendingActions(plan).length === 0
}

/**
 * Check the ordering invariant of a plan.
 */
export function isOrderedPlan(plan: Plan): boolean {
  return plan.actions.every((action, i) => {
    const prev = plan.actions[i - 1]
    return !prev || ACTION_ORDER[prev.kind] <= ACTION_ORDER[action.kind]
  })
}

/**
 * One-line human description of an action.
 */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'create-environment':
      return action.recreate
        ? `recreate environment (runtime ${action.runtime}): ${action.reason}`
        : `create environment (runtime ${action.runtime})`
    case 'install-dependencies': {
      const parts: string[] = []
      if (action.added.length > 0) {
        parts.push(`install ${action.added.map(formatRequirement).join(', ')}`)
      }
      if (action.removed.length > 0) {
        parts.push(`remove ${action.removed.join(', ')}`)
      }
      return parts.length > 0 ? parts.join('; ') : 'sync dependencies'
    }
    case 'set-env-vars': {
      const parts: string[] = []
      const names = Object.keys(action.vars)
      if (names.length > 0) parts.push(`set ${names.join(', ')}`)
      if (action.unset.length > 0) parts.push(`unset ${action.unset.join(', ')}`)
      return `${parts.join('; ')} in environment`
    }
    case 'noop':
      return 'nothing to do'
    default:
      return assertNever(action)
  }
}
