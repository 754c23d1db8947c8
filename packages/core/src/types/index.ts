/**
 * Core types for envsync
 */

// Desired state
export type { DependencySpec, DesiredState, ProviderId } from './desired.js'

export {
  asProviderId,
  formatRequirement,
  freezeDesiredState,
  isProviderId,
  normalizeConstraint,
  normalizeDependencyName,
  normalizeMarker,
  parseRequirement,
  sameDependency,
} from './desired.js'

// Observed state
export type { ObservedState, ProbeIssue, ProbeSubject } from './observed.js'

// Fingerprints
export type { CanonicalDependency, Fingerprint } from './fingerprint.js'

export {
  asFingerprint,
  canonicalDependencies,
  dependencyFingerprint,
  desiredFingerprint,
  isFingerprint,
} from './fingerprint.js'

// Plans and actions
export type {
  Action,
  ActionKind,
  CreateEnvironmentAction,
  InstallDependenciesAction,
  NoOpAction,
  Plan,
  SetEnvVarsAction,
} from './plan.js'

export {
  ACTION_ORDER,
  assertNever,
  describeAction,
  isConvergedPlan,
  isOrderedPlan,
  pendingActions,
} from './plan.js'

// Apply results
export type { ActionOutcome, ActionStatus, ApplyResult, ApplyStatus } from './result.js'

export { failedOutcome, succeededActions } from './result.js'

// Doctor findings
export type { Finding, FindingCode, Severity } from './finding.js'

export { FINDING_CODES, hasErrors } from './finding.js'

// Provisioning providers
export type {
  ProcessEnv,
  ProviderContext,
  ProviderDetection,
  ProvisioningProvider,
} from './provider.js'
