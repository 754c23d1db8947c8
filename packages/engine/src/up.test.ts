import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import {
  ConfigInvalidError,
  LockContentionError,
  getStatePath,
  loadDesiredState,
  withProjectLock,
} from '@envsync/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { StateRecorder } from './state.js'
import { FakeProvider } from './testing/fake-provider.js'
import { type TempProject, createTempProject } from './testing/project.js'
import { reconcile } from './up.js'

const CONFIG = `name: demo
python: "3.11"
dependencies:
  - requests>=2.31
env:
  DEBUG: "1"
run:
  dev: python main.py
`

const FIXED_NOW = () => new Date('2026-01-02T03:04:05.000Z')

describe('reconcile', () => {
  let project: TempProject
  let provider: FakeProvider

  beforeEach(async () => {
    project = await createTempProject(CONFIG)
    provider = new FakeProvider()
  })

  afterEach(async () => {
    await project.cleanup()
  })

  test('converges a fresh project and writes the marker', async () => {
    const result = await reconcile(project.root, { provider, now: FIXED_NOW })

    expect(result.plan.actions.map((a) => a.kind)).toEqual([
      'create-environment',
      'install-dependencies',
      'set-env-vars',
    ])
    expect(result.result?.status).toBe('converged')
    expect(result.markerWritten).toBe(true)

    const marker = JSON.parse(await readFile(getStatePath(project.root), 'utf-8'))
    expect(marker).toEqual({
      version: 1,
      projectPath: project.root,
      fingerprint: result.plan.fingerprint,
      appliedAt: '2026-01-02T03:04:05.000Z',
    })
  })

  test('second run is a no-op and leaves the marker alone', async () => {
    await reconcile(project.root, { provider, now: FIXED_NOW })
    const callsAfterFirst = provider.calls.length

    const second = await reconcile(project.root, {
      provider,
      now: () => new Date('2030-01-01T00:00:00.000Z'),
    })

    expect(second.plan.actions).toEqual([{ kind: 'noop' }])
    expect(second.result?.status).toBe('converged')
    expect(second.markerWritten).toBe(false)
    expect(provider.calls.length).toBe(callsAfterFirst)
    const marker = await new StateRecorder(project.root).readLastApplied()
    expect(marker?.appliedAt).toBe('2026-01-02T03:04:05.000Z')
  })

  test('already converged environment without a marker gets one', async () => {
    const desired = await loadDesiredState(project.root)
    provider.state = {
      ...provider.state,
      envExists: true,
      envRuntimeVersion: '3.11.9',
      installed: [...desired.dependencies],
      exportedVars: { DEBUG: '1' },
    }

    const result = await reconcile(project.root, { provider, now: FIXED_NOW })

    expect(result.plan.actions).toEqual([{ kind: 'noop' }])
    expect(result.markerWritten).toBe(true)
    expect(result.marker?.fingerprint).toBe(result.plan.fingerprint)
  })

  test('failure writes no marker and the next run resumes the remaining gap', async () => {
    provider.failOn('install-dependencies', 'pip exploded')

    const first = await reconcile(project.root, { provider })
    expect(first.result?.status).toBe('partially-converged')
    expect(first.markerWritten).toBe(false)
    expect(await new StateRecorder(project.root).readLastApplied()).toBeUndefined()

    provider.clearFailures()
    provider.calls.length = 0
    const second = await reconcile(project.root, { provider })

    expect(second.plan.actions.map((a) => a.kind)).toEqual([
      'install-dependencies',
      'set-env-vars',
    ])
    expect(second.result?.status).toBe('converged')
    expect(second.markerWritten).toBe(true)
    expect(provider.calls.map((a) => a.kind)).toEqual(['install-dependencies', 'set-env-vars'])
  })

  test('added dependency installs only the new package', async () => {
    await reconcile(project.root, { provider })
    await project.writeConfig(
      CONFIG.replace('  - requests>=2.31\n', '  - requests>=2.31\n  - rich\n')
    )
    provider.calls.length = 0

    const result = await reconcile(project.root, { provider })

    expect(provider.calls).toEqual([
      {
        kind: 'install-dependencies',
        dependencies: [
          { name: 'requests', constraint: '>=2.31' },
          { name: 'rich', constraint: '' },
        ],
        added: [{ name: 'rich', constraint: '' }],
        removed: [],
      },
    ])
    expect(result.result?.status).toBe('converged')
  })

  test('deleted environment is recreated', async () => {
    await reconcile(project.root, { provider })
    provider.deleteEnvironment()

    const result = await reconcile(project.root, { provider })

    expect(result.plan.actions[0]).toMatchObject({ kind: 'create-environment', recreate: false })
    expect(result.result?.status).toBe('converged')
    expect(provider.state.envExists).toBe(true)
  })

  test('dry run plans without applying or locking', async () => {
    const result = await withProjectLock(project.root, () =>
      reconcile(project.root, { provider, dryRun: true })
    )

    expect(result.result).toBeUndefined()
    expect(result.markerWritten).toBe(false)
    expect(result.plan.actions).toHaveLength(3)
    expect(provider.calls).toEqual([])
  })

  test('fails with lock contention while another reconciliation runs', async () => {
    await withProjectLock(project.root, async () => {
      await expect(reconcile(project.root, { provider })).rejects.toBeInstanceOf(
        LockContentionError
      )
    })
    expect(provider.detectCount).toBe(0)
  })

  test('invalid config fails before probing', async () => {
    await project.writeConfig('python: 3.11\n')

    await expect(reconcile(project.root, { provider })).rejects.toBeInstanceOf(ConfigInvalidError)
    expect(provider.detectCount).toBe(0)
  })

  test('unknown provider is a config error', async () => {
    await project.writeConfig('provider: conda-env\n')

    const error = await reconcile(project.root).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigInvalidError)
    expect(error instanceof ConfigInvalidError ? error.issues : []).toEqual([
      'provider: unknown provider "conda-env" (available: python-venv)',
    ])
  })

  test('marker file is newline-terminated JSON', async () => {
    await reconcile(project.root, { provider })
    const content = await readFile(join(project.root, '.envsync', 'state.json'), 'utf-8')
    expect(content.endsWith('\n')).toBe(true)
  })
})
