/**
 * Provider module for envsync
 *
 * Provides the provisioning provider pattern for multi-ecosystem support.
 */

export { ProviderRegistry, providerRegistry } from './registry.js'
export { PythonVenvProvider, pythonVenvProvider, type PythonVenvProviderOptions } from './python-venv.js'
export { type CommandResult, type CommandRunner, execaRunner } from './command.js'

// Re-export types from core
export type {
  ProcessEnv,
  ProviderContext,
  ProviderDetection,
  ProvisioningProvider,
} from '@envsync/core'

export { DEFAULT_PROVIDER } from '@envsync/core'

import { pythonVenvProvider } from './python-venv.js'
// Initialize the registry with built-in providers
import { providerRegistry } from './registry.js'

// Register built-in providers
providerRegistry.register(pythonVenvProvider)
