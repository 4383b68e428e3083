import type { ProviderRegistry } from '../providers/registry.js';
import type { SearchProvider, SearchType } from '../providers/types.js';
import { CapabilityError } from '../utils/errors.js';

/** Fallback order for registered providers. Unlisted providers follow in registration order. */
export const PRIORITY_ORDER: readonly string[] = ['brave', 'google', 'kagi', 'searxng', 'duckduckgo'];

function qualifies(provider: SearchProvider, type: SearchType): boolean {
  return provider.supportedTypes.has(type) && provider.isAvailable();
}

/**
 * Ordered candidates for a request. An explicit provider yields at most one
 * candidate and never falls back. An empty list means nothing can serve `type`.
 */
export function selectProviders(
  registry: ProviderRegistry,
  type: SearchType,
  explicit?: string
): SearchProvider[] {
  if (explicit !== undefined) {
    const provider = registry.get(explicit);
    return provider && qualifies(provider, type) ? [provider] : [];
  }

  const selected: SearchProvider[] = [];
  for (const name of PRIORITY_ORDER) {
    const provider = registry.get(name);
    if (provider && qualifies(provider, type)) {
      selected.push(provider);
    }
  }
  for (const provider of registry.list()) {
    if (!PRIORITY_ORDER.includes(provider.name) && qualifies(provider, type)) {
      selected.push(provider);
    }
  }
  return selected;
}

export function noProvidersError(type: SearchType, explicit?: string): CapabilityError {
  if (explicit !== undefined) {
    return new CapabilityError(explicit, `provider "${explicit}" is not available for search type: ${type}`);
  }
  return new CapabilityError('*', `no available providers support search type: ${type}`);
}
