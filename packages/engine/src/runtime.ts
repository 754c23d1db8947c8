/**
 * Runtime version constraint helpers.
 *
 * Constraints use semver range syntax (`3.11`, `>=3.10 <3.13`, `~3.12.1`).
 * Interpreter versions are coerced first, so `3.13.0rc1` counts as `3.13.0`.
 */

import semver from 'semver'

/**
 * True when the constraint accepts any version.
 */
export function isAnyRuntime(range: string): boolean {
  return semver.validRange(range.trim()) === '*'
}

/**
 * Check an interpreter version against a runtime constraint.
 * An unknown version only satisfies the "any version" constraint.
 */
export function runtimeSatisfies(version: string | undefined, range: string): boolean {
  if (isAnyRuntime(range)) return true
  if (!version) return false
  const coerced = semver.coerce(version)
  return coerced !== null && semver.satisfies(coerced, range.trim())
}

/**
 * `major.minor` of the lowest version a constraint accepts, used to guess
 * versioned executable names such as `python3.11`.
 */
export function runtimeMajorMinor(range: string): string | undefined {
  if (isAnyRuntime(range)) return undefined
  try {
    const min = semver.minVersion(range.trim())
    if (!min || min.major === 0) return undefined
    return `${min.major}.${min.minor}`
  } catch {
    // Invalid range; config validation reports it
    return undefined
  }
}
