/**
 * Provisioning provider types for envsync
 *
 * A provider wraps one ecosystem's existing tools (interpreter manager,
 * package installer). The engine only talks to this contract, so it can be
 * exercised against an in-memory provider.
 */

import type { DependencySpec, DesiredState } from './desired.js'
import type { ProbeIssue } from './observed.js'
import type {
  CreateEnvironmentAction,
  InstallDependenciesAction,
  SetEnvVarsAction,
} from './plan.js'

/** Environment of a child process */
export type ProcessEnv = Record<string, string | undefined>

/**
 * Everything a provider needs to locate and shape a project environment.
 */
export interface ProviderContext {
  /** Absolute project root */
  projectRoot: string
  /** Desired state the environment is reconciled towards */
  desired: DesiredState
  /** Environment of the envsync process (defaults to process.env) */
  env?: ProcessEnv | undefined
}

/**
 * Result of inspecting the machine and the project environment.
 * Providers report inspection problems as issues instead of throwing.
 */
export interface ProviderDetection {
  runtimePresent: boolean
  runtimeVersion?: string | undefined
  runtimePath?: string | undefined
  envExists: boolean
  envRuntimeVersion?: string | undefined
  /** Installed dependencies; undefined when they could not be determined */
  installedDependencies?: DependencySpec[] | undefined
  exportedVars: Record<string, string>
  issues: ProbeIssue[]
}

/**
 * Provider contract: detect, create, install, exportVars, activate.
 *
 * Mutating methods throw on failure; the executor turns the error into a
 * failed action outcome.
 */
export interface ProvisioningProvider {
  /** Unique identifier referenced from envsync.yaml */
  readonly id: string
  /** Human-readable name */
  readonly name: string

  /** Inspect runtime and environment. Never throws. */
  detect(context: ProviderContext): Promise<ProviderDetection>

  /** Create (or delete and rebuild) the project environment. */
  create(context: ProviderContext, action: CreateEnvironmentAction): Promise<void>

  /** Install/remove dependencies and record the installed set in the environment. */
  install(context: ProviderContext, action: InstallDependenciesAction): Promise<void>

  /** Persist the exported variable set in the environment. */
  exportVars(context: ProviderContext, action: SetEnvVarsAction): Promise<void>

  /**
   * Variables that activate the environment for a child process
   * (e.g. VIRTUAL_ENV and a PATH prefix), computed over `baseEnv`.
   */
  activate(context: ProviderContext, baseEnv: ProcessEnv): Record<string, string>
}
