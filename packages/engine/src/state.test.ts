import { readdir } from 'node:fs/promises'

import { asFingerprint, getStateDir } from '@envsync/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { StateRecorder } from './state.js'
import { type TempProject, createTempProject } from './testing/project.js'

const FIRST = asFingerprint(`sha256:${'1'.repeat(64)}`)
const SECOND = asFingerprint(`sha256:${'2'.repeat(64)}`)

describe('StateRecorder', () => {
  let project: TempProject

  beforeEach(async () => {
    project = await createTempProject()
  })

  afterEach(async () => {
    await project.cleanup()
  })

  test('reads nothing before the first success', async () => {
    expect(await new StateRecorder(project.root).readLastApplied()).toBeUndefined()
  })

  test('records and reads back the marker', async () => {
    const recorder = new StateRecorder(project.root, () => new Date('2026-05-06T07:08:09.000Z'))

    const written = await recorder.recordSuccess(FIRST)

    expect(written).toEqual({
      version: 1,
      projectPath: project.root,
      fingerprint: FIRST,
      appliedAt: '2026-05-06T07:08:09.000Z',
    })
    expect(await recorder.readLastApplied()).toEqual(written)
  })

  test('overwrites the previous marker without leaving temp files', async () => {
    const recorder = new StateRecorder(project.root)
    await recorder.recordSuccess(FIRST)
    await recorder.recordSuccess(SECOND)

    expect((await recorder.readLastApplied())?.fingerprint).toBe(SECOND)
    expect(await readdir(getStateDir(project.root))).toEqual(['state.json'])
  })
})
