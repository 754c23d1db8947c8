/**
 * ProviderRegistry - lookup table of provisioning providers by id.
 */

import type { ProvisioningProvider } from '@envsync/core'

export class ProviderRegistry {
  private readonly providers = new Map<string, ProvisioningProvider>()

  /**
   * Register a provider. Re-registering an id replaces the previous entry.
   */
  register(provider: ProvisioningProvider): void {
    this.providers.set(provider.id, provider)
  }

  get(id: string): ProvisioningProvider | undefined {
    return this.providers.get(id)
  }

  ids(): string[] {
    return [...this.providers.keys()].sort()
  }
}

/**
 * Shared registry with the built-in providers (see ./index.ts).
 */
export const providerRegistry = new ProviderRegistry()
