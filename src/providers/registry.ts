import type { SearchProvider } from './types.js';
import { ConfigError } from '../utils/errors.js';

/**
 * The fixed set of providers, built once at start-up and passed to the
 * orchestrator. Read-only after construction.
 */
export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, SearchProvider>;

  constructor(providers: Iterable<SearchProvider>) {
    const byName = new Map<string, SearchProvider>();
    for (const provider of providers) {
      if (byName.has(provider.name)) {
        throw new ConfigError(`duplicate provider name: ${provider.name}`);
      }
      byName.set(provider.name, provider);
    }
    this.providers = byName;
  }

  get(name: string): SearchProvider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /** Providers in registration order. */
  list(): SearchProvider[] {
    return [...this.providers.values()];
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  get size(): number {
    return this.providers.size;
  }
}
