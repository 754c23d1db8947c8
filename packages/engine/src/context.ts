/**
 * Shared engine options and provider resolution.
 */

import {
  ConfigInvalidError,
  type DesiredState,
  type ProcessEnv,
  type ProvisioningProvider,
  getConfigPath,
  loadDesiredState,
} from '@envsync/core'

import { type ProviderRegistry, providerRegistry } from './provider/index.js'

/**
 * Options every engine entry point accepts.
 */
export interface EngineOptions {
  /** Pre-loaded desired state (default: load envsync.yaml from the project root) */
  desired?: DesiredState | undefined
  /** Provider override, mainly for tests (default: looked up in `registry`) */
  provider?: ProvisioningProvider | undefined
  /** Registry to look providers up in (default: the built-in registry) */
  registry?: ProviderRegistry | undefined
  /** Environment of the envsync process (default: process.env) */
  env?: ProcessEnv | undefined
}

/**
 * Provider for a desired state. An unknown provider id is a config error.
 */
export function resolveProvider(
  projectRoot: string,
  desired: DesiredState,
  options: Pick<EngineOptions, 'provider' | 'registry'> = {}
): ProvisioningProvider {
  if (options.provider) return options.provider
  const registry = options.registry ?? providerRegistry
  const provider = registry.get(desired.provider)
  if (!provider) {
    throw new ConfigInvalidError(getConfigPath(projectRoot), [
      `provider: unknown provider "${desired.provider}" (available: ${registry.ids().join(', ') || 'none'})`,
    ])
  }
  return provider
}

/**
 * Desired state and provider for a project.
 */
export async function loadProject(
  projectRoot: string,
  options: EngineOptions = {}
): Promise<{ desired: DesiredState; provider: ProvisioningProvider }> {
  const desired = options.desired ?? (await loadDesiredState(projectRoot))
  return { desired, provider: resolveProvider(projectRoot, desired, options) }
}
