import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { LockContentionError } from '../errors.js'
import { withProjectLock } from './lock.js'

describe('withProjectLock', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'envsync-lock-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  test('second holder fails fast while the callback runs', async () => {
    const result = await withProjectLock(root, async () => {
      await expect(withProjectLock(root, async () => 'unreachable')).rejects.toBeInstanceOf(
        LockContentionError
      )
      return 'held'
    })

    expect(result).toBe('held')
    expect(await withProjectLock(root, async () => 'released')).toBe('released')
  })

  test('releases the lock when the callback throws', async () => {
    await expect(
      withProjectLock(root, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(await withProjectLock(root, async () => 'again')).toBe('again')
  })
})
