import { describe, expect, test } from 'vitest'

import { type Plan, describeAction, isConvergedPlan, isOrderedPlan, pendingActions } from './plan.js'

const FINGERPRINT = `sha256:${'0'.repeat(64)}` as const

describe('describeAction', () => {
  test('environment creation', () => {
    expect(
      describeAction({ kind: 'create-environment', runtime: '3.11', recreate: false, reason: 'x' })
    ).toBe('create environment (runtime 3.11)')
    expect(
      describeAction({
        kind: 'create-environment',
        runtime: '3.11',
        recreate: true,
        reason: 'environment runtime 3.10.4 does not satisfy "3.11"',
      })
    ).toBe(
      'recreate environment (runtime 3.11): environment runtime 3.10.4 does not satisfy "3.11"'
    )
  })

  test('dependency sync', () => {
    expect(
      describeAction({
        kind: 'install-dependencies',
        dependencies: [],
        added: [{ name: 'requests', constraint: '>=2.31' }],
        removed: ['click'],
      })
    ).toBe('install requests>=2.31; remove click')
  })

  test('variables and noop', () => {
    expect(describeAction({ kind: 'set-env-vars', vars: { DEBUG: '1' }, unset: ['OLD'] })).toBe(
      'set DEBUG; unset OLD in environment'
    )
    expect(describeAction({ kind: 'noop' })).toBe('nothing to do')
  })
})

describe('plan helpers', () => {
  const plan: Plan = {
    fingerprint: FINGERPRINT,
    actions: [
      { kind: 'create-environment', runtime: '*', recreate: false, reason: 'missing' },
      { kind: 'set-env-vars', vars: { A: '1' }, unset: [] },
    ],
  }

  test('ordering', () => {
    expect(isOrderedPlan(plan)).toBe(true)
    expect(isOrderedPlan({ ...plan, actions: [...plan.actions].reverse() })).toBe(false)
  })

  test('a noop plan is converged', () => {
    expect(isConvergedPlan(plan)).toBe(false)
    expect(pendingActions({ fingerprint: FINGERPRINT, actions: [{ kind: 'noop' }] })).toEqual([])
    expect(isConvergedPlan({ fingerprint: FINGERPRINT, actions: [{ kind: 'noop' }] })).toBe(true)
  })
})
