/**
 * Fingerprints for envsync
 *
 * A fingerprint is a SHA-256 over a canonical JSON document, formatted like
 * an integrity string: `sha256:<64-hex-chars>`.
 */

import { createHash } from 'node:crypto'

import {
  type DependencySpec,
  type DesiredState,
  normalizeConstraint,
  normalizeDependencyName,
  normalizeMarker,
} from './desired.js'

/** SHA-256 fingerprint in the format `sha256:<64-hex-chars>` */
export type Fingerprint = `sha256:${string}`

const FINGERPRINT_PATTERN = /^sha256:[0-9a-f]{64}$/

/** Bumped when the canonical form changes, so old markers stop matching */
const FINGERPRINT_SCHEMA = 1

export function isFingerprint(value: string): value is Fingerprint {
  return FINGERPRINT_PATTERN.test(value)
}

export function asFingerprint(value: string): Fingerprint {
  if (!isFingerprint(value)) {
    throw new Error(`Invalid fingerprint: "${value}" (must be sha256:<64-hex-chars>)`)
  }
  return value
}

function hash(document: unknown): Fingerprint {
  const digest = createHash('sha256').update(JSON.stringify(document)).digest('hex')
  return `sha256:${digest}`
}

/** One canonical dependency: name, constraint and, when present, marker */
export type CanonicalDependency = [string, string] | [string, string, string]

/**
 * Canonical dependency set: normalized names, constraints and markers,
 * sorted by name. Declaration order does not affect the fingerprint.
 */
export function canonicalDependencies(deps: readonly DependencySpec[]): CanonicalDependency[] {
  return deps
    .map((dep): CanonicalDependency => {
      const name = normalizeDependencyName(dep.name)
      const constraint = normalizeConstraint(dep.constraint)
      const marker = normalizeMarker(dep.marker)
      return marker ? [name, constraint, marker] : [name, constraint]
    })
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

/**
 * Fingerprint of a dependency set.
 */
export function dependencyFingerprint(deps: readonly DependencySpec[]): Fingerprint {
  return hash({ schema: FINGERPRINT_SCHEMA, dependencies: canonicalDependencies(deps) })
}

/**
 * Fingerprint of the provisioning-relevant part of a desired state:
 * provider, runtime constraint and dependency set.
 */
export function desiredFingerprint(desired: DesiredState): Fingerprint {
  return hash({
    schema: FINGERPRINT_SCHEMA,
    provider: desired.provider,
    runtime: desired.runtime.trim(),
    dependencies: canonicalDependencies(desired.dependencies),
  })
}
