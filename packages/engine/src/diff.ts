/**
 * Diff engine: desired state × observed state → plan.
 *
 * WHY: Planning is a pure function of its two inputs so that the same
 * situation always yields the same plan. That is what makes `up` safe to
 * re-run: a converged project diffs to `[noop]`, a partially applied plan
 * diffs to the remaining gap.
 *
 * Plan order is fixed: create-environment, install-dependencies,
 * set-env-vars. An environment whose runtime no longer satisfies the
 * constraint is recreated, never upgraded in place.
 */

import {
  type Action,
  type DependencySpec,
  type DesiredState,
  type ObservedState,
  type Plan,
  dependencyFingerprint,
  desiredFingerprint,
  sameDependency,
} from '@envsync/core'

import { runtimeSatisfies } from './runtime.js'

/**
 * Decide whether the environment must be (re)created.
 */
function planEnvironment(desired: DesiredState, observed: ObservedState): Action | undefined {
  if (!observed.envExists) {
    return {
      kind: 'create-environment',
      runtime: desired.runtime,
      recreate: false,
      reason: 'environment does not exist',
    }
  }
  if (!runtimeSatisfies(observed.envRuntimeVersion, desired.runtime)) {
    return {
      kind: 'create-environment',
      runtime: desired.runtime,
      recreate: true,
      reason: observed.envRuntimeVersion
        ? `environment runtime ${observed.envRuntimeVersion} does not satisfy "${desired.runtime}"`
        : `environment runtime version is unknown and "${desired.runtime}" is required`,
    }
  }
  return undefined
}

/**
 * Plan dependency installation against what the environment has.
 * `installed` is undefined when the installed set is unknown.
 */
function planDependencies(
  desired: DesiredState,
  installed: readonly DependencySpec[] | undefined,
  installedFingerprint: string | undefined
): Action | undefined {
  if (installedFingerprint === dependencyFingerprint(desired.dependencies)) {
    return undefined
  }

  const dependencies = desired.dependencies.map((dep) => ({ ...dep }))
  if (!installed) {
    return { kind: 'install-dependencies', dependencies, added: dependencies, removed: [] }
  }

  const added = dependencies.filter(
    (dep) => !installed.some((current) => sameDependency(current, dep))
  )
  const declared = new Set(dependencies.map((dep) => dep.name))
  const removed = installed
    .map((dep) => dep.name)
    .filter((name) => !declared.has(name))
    .sort()

  return {
    kind: 'install-dependencies',
    dependencies,
    // Fingerprints differ but the delta is empty: reinstall everything
    added: added.length === 0 && removed.length === 0 ? dependencies : added,
    removed,
  }
}

/**
 * Plan variable export: changed or missing values, and stale names.
 */
function planVariables(
  desired: DesiredState,
  exported: Readonly<Record<string, string>>
): Action | undefined {
  const vars: Record<string, string> = {}
  for (const name of Object.keys(desired.envVars).sort()) {
    const value = desired.envVars[name]
    if (value !== undefined && exported[name] !== value) {
      vars[name] = value
    }
  }
  const unset = Object.keys(exported)
    .filter((name) => !Object.hasOwn(desired.envVars, name))
    .sort()

  if (Object.keys(vars).length === 0 && unset.length === 0) {
    return undefined
  }
  return { kind: 'set-env-vars', vars, unset }
}

/**
 * Compute the plan that converges `observed` to `desired`.
 */
export function diff(desired: DesiredState, observed: ObservedState): Plan {
  const actions: Action[] = []

  const create = planEnvironment(desired, observed)
  if (create) actions.push(create)

  // A (re)created environment starts empty
  const installed = create ? [] : observed.installedDependencies
  const installedFingerprint = create ? dependencyFingerprint([]) : observed.installedFingerprint
  const exported = create ? {} : observed.exportedVars

  const install = planDependencies(desired, installed, installedFingerprint)
  if (install) actions.push(install)

  const setVars = planVariables(desired, exported)
  if (setVars) actions.push(setVars)

  return {
    actions: actions.length > 0 ? actions : [{ kind: 'noop' }],
    fingerprint: desiredFingerprint(desired),
  }
}
