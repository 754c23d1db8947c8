/**
 * Desired-state types for envsync
 *
 * The desired state is the validated, in-memory form of envsync.yaml.
 * It is rebuilt from the config on every invocation and frozen once loaded.
 */

/** Identifier of a provisioning provider (e.g. `python-venv`) */
export type ProviderId = string & { readonly __brand: 'ProviderId' }

/** A single declared dependency: normalized name plus version constraint */
export interface DependencySpec {
  /** Normalized package name (lower-case, `-` separated) */
  name: string
  /** Version constraint as written (e.g. `>=2.31`), '' for any version */
  constraint: string
  /** Environment marker without the `;` (e.g. `sys_platform == "win32"`) */
  marker?: string | undefined
}

/** Validated desired state of one project environment */
export interface DesiredState {
  /** Project name */
  readonly name: string
  /** Provider that provisions the environment */
  readonly provider: ProviderId
  /** Runtime version constraint (semver range syntax, e.g. `3.11` or `>=3.10 <3.13`) */
  readonly runtime: string
  /** Declared dependencies in declaration order, names unique */
  readonly dependencies: readonly DependencySpec[]
  /** Variables exported into the environment */
  readonly envVars: Readonly<Record<string, string>>
  /** Named run targets mapped to command lines */
  readonly runTargets: Readonly<Record<string, string>>
  /** dotenv file the variables were partly loaded from (relative to project root) */
  readonly envFile?: string | undefined
  /** Variable names that must be present when running (checked by doctor) */
  readonly secrets: readonly string[]
}

// ============================================================================
// Dependency names and requirement strings
// ============================================================================

const REQUIREMENT_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)(\[[^\]]*\])?\s*(.*)$/
const CONSTRAINT_PATTERN = /^(?:(?:===|==|~=|!=|<=|>=|<|>)\s*[A-Za-z0-9.*+!_-]+\s*,?\s*)*$/

/**
 * Normalize a package name so that `Foo_Bar`, `foo.bar` and `foo-bar`
 * compare equal.
 */
export function normalizeDependencyName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-')
}

/** Collapse whitespace in an environment marker */
export function normalizeMarker(marker: string | undefined): string {
  return (marker ?? '').trim().replace(/\s+/g, ' ')
}

/**
 * Normalize a constraint for comparison: whitespace removed, clauses sorted.
 */
export function normalizeConstraint(constraint: string): string {
  const clauses = constraint
    .replace(/\s+/g, '')
    .split(',')
    .filter((clause) => clause.length > 0)
  return clauses.sort().join(',')
}

/**
 * Parse a requirement line such as `requests>=2.31,<3` or `Django`.
 *
 * Extras (`pkg[extra]`) are dropped from the identity. An environment marker
 * (`; python_version < "3.11"`) is kept and handed to the installer as written.
 */
export function parseRequirement(value: string): DependencySpec {
  const separator = value.indexOf(';')
  const requirement = (separator === -1 ? value : value.slice(0, separator)).trim()
  const marker = separator === -1 ? '' : normalizeMarker(value.slice(separator + 1))
  const match = requirement.match(REQUIREMENT_PATTERN)
  if (!match || !match[1]) {
    throw new Error(`Invalid requirement: "${value}"`)
  }
  const constraint = (match[3] ?? '').trim()
  if (!CONSTRAINT_PATTERN.test(constraint)) {
    throw new Error(`Invalid version constraint in requirement: "${value}"`)
  }
  const dep: DependencySpec = { name: normalizeDependencyName(match[1]), constraint }
  if (marker) dep.marker = marker
  return dep
}

/**
 * Format a dependency back into requirement syntax.
 */
export function formatRequirement(dep: DependencySpec): string {
  const marker = normalizeMarker(dep.marker)
  return marker ? `${dep.name}${dep.constraint}; ${marker}` : `${dep.name}${dep.constraint}`
}

/**
 * Check whether two dependency specs describe the same requirement.
 */
export function sameDependency(a: DependencySpec, b: DependencySpec): boolean {
  return (
    a.name === b.name &&
    normalizeConstraint(a.constraint) === normalizeConstraint(b.constraint) &&
    normalizeMarker(a.marker) === normalizeMarker(b.marker)
  )
}

const PROVIDER_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_ID_PATTERN.test(value)
}

export function asProviderId(value: string): ProviderId {
  if (!isProviderId(value)) {
    throw new Error(`Invalid provider ID: "${value}" (must be kebab-case)`)
  }
  return value
}

/**
 * Freeze a desired state (and its nested collections).
 */
export function freezeDesiredState(desired: DesiredState): DesiredState {
  return Object.freeze({
    ...desired,
    dependencies: Object.freeze(desired.dependencies.map((dep) => Object.freeze({ ...dep }))),
    envVars: Object.freeze({ ...desired.envVars }),
    runTargets: Object.freeze({ ...desired.runTargets }),
    secrets: Object.freeze([...desired.secrets]),
  })
}
