import { describe, expect, test } from 'vitest'

import { isAnyRuntime, runtimeMajorMinor, runtimeSatisfies } from './runtime.js'

describe('runtime constraints', () => {
  test('any-version constraints', () => {
    expect(isAnyRuntime('*')).toBe(true)
    expect(isAnyRuntime('')).toBe(true)
    expect(isAnyRuntime('3.11')).toBe(false)
  })

  test('major.minor constraint accepts patch releases only of that minor', () => {
    expect(runtimeSatisfies('3.11.9', '3.11')).toBe(true)
    expect(runtimeSatisfies('3.12.0', '3.11')).toBe(false)
  })

  test('ranges and pre-release interpreters', () => {
    expect(runtimeSatisfies('3.12.1', '>=3.10 <3.13')).toBe(true)
    expect(runtimeSatisfies('3.13.0rc1', '>=3.13')).toBe(true)
  })

  test('unknown version only satisfies any-version', () => {
    expect(runtimeSatisfies(undefined, '*')).toBe(true)
    expect(runtimeSatisfies(undefined, '3.11')).toBe(false)
  })

  test('major.minor used for versioned executable names', () => {
    expect(runtimeMajorMinor('3.11')).toBe('3.11')
    expect(runtimeMajorMinor('>=3.10 <3.13')).toBe('3.10')
    expect(runtimeMajorMinor('~3.12.1')).toBe('3.12')
    expect(runtimeMajorMinor('*')).toBeUndefined()
  })
})
