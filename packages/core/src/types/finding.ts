/**
 * Diagnostic finding types for envsync doctor
 */

export type Severity = 'error' | 'warning' | 'info'

/** Stable codes so scripts can match findings without parsing messages */
export const FINDING_CODES = {
  CONFIG_MISSING: 'config-missing',
  CONFIG_INVALID: 'config-invalid',
  PROJECT_NOT_WRITABLE: 'project-not-writable',
  PROVIDER_UNAVAILABLE: 'provider-unavailable',
  RUNTIME_MISSING: 'runtime-missing',
  RUNTIME_MISMATCH: 'runtime-mismatch',
  ENV_FILE_MISSING: 'env-file-missing',
  SECRET_MISSING: 'secret-missing',
  PROBE_INCOMPLETE: 'probe-incomplete',
  ENVIRONMENT_MISSING: 'environment-missing',
  ENVIRONMENT_STALE: 'environment-stale',
  DEPENDENCIES_OUT_OF_SYNC: 'dependencies-out-of-sync',
  VARIABLES_OUT_OF_SYNC: 'variables-out-of-sync',
  DRIFT: 'drift',
  CONFIG_CHANGED: 'config-changed',
  CONVERGED: 'converged',
} as const

export type FindingCode = (typeof FINDING_CODES)[keyof typeof FINDING_CODES]

export interface Finding {
  severity: Severity
  code: FindingCode
  /** What the finding is about (e.g. `environment`, `secret:API_KEY`) */
  subject: string
  message: string
  /** Command or step that resolves the finding */
  suggestedAction?: string | undefined
}

export function hasErrors(findings: readonly Finding[]): boolean {
  return findings.some((finding) => finding.severity === 'error')
}
