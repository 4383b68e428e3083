import type { Config, ProviderName } from './config/schema.js';
import {
  BraveProvider,
  DuckDuckGoProvider,
  GoogleProvider,
  KagiProvider,
  ProviderRegistry,
  SearxngProvider,
  type SearchProvider,
} from './providers/index.js';
import { MultiSearch, type ContentScanner } from './pipeline/index.js';
import { RateLimitedHttpClient } from './utils/http-client.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { createChildLogger } from './utils/logger.js';

const logger = createChildLogger('app');

type Env = Readonly<Record<string, string | undefined>>;

/** Environment first, then the config file. Read on every call. */
function credential(env: Env, variable: string, fallback: string | undefined): () => string | undefined {
  return () => env[variable] || fallback || undefined;
}

/**
 * Builds the registry of enabled providers, each with its own limiter and
 * HTTP client. Credentials are resolved lazily, so a provider without them is
 * registered but reports itself unavailable.
 */
export function createProviders(config: Config, env: Env = process.env): ProviderRegistry {
  const { search, providers: settings } = config;

  const clientFor = (name: ProviderName): RateLimitedHttpClient => {
    const rate = settings[name].rateLimit ?? search.rateLimit;
    return new RateLimitedHttpClient(name, new RateLimiter(name, rate), {
      timeoutMs: search.timeoutMs,
      maxAttempts: search.maxAttempts,
      retryBaseDelayMs: search.retryBaseDelayMs,
    });
  };

  const providers: SearchProvider[] = [];

  if (settings.brave.enabled) {
    providers.push(new BraveProvider(credential(env, 'BRAVE_API_KEY', settings.brave.apiKey), clientFor('brave')));
  }

  if (settings.google.enabled) {
    providers.push(
      new GoogleProvider(
        credential(env, 'GOOGLE_SEARCH_API_KEY', settings.google.apiKey),
        credential(env, 'GOOGLE_SEARCH_ID', settings.google.searchId),
        clientFor('google')
      )
    );
  }

  if (settings.kagi.enabled) {
    providers.push(new KagiProvider(credential(env, 'KAGI_API_KEY', settings.kagi.apiKey), clientFor('kagi')));
  }

  if (settings.searxng.enabled) {
    const baseUrl = credential(env, 'SEARXNG_BASE_URL', settings.searxng.baseUrl);
    const username = credential(env, 'SEARXNG_USERNAME', settings.searxng.username);
    const password = credential(env, 'SEARXNG_PASSWORD', settings.searxng.password);
    providers.push(
      new SearxngProvider(
        () => ({ baseUrl: baseUrl(), username: username(), password: password() }),
        clientFor('searxng')
      )
    );
  }

  if (settings.duckduckgo.enabled) {
    providers.push(new DuckDuckGoProvider(clientFor('duckduckgo')));
  }

  logger.debug({ providers: providers.map((p) => p.name) }, 'Providers registered');
  return new ProviderRegistry(providers);
}

export function createSearch(
  config: Config,
  options: { env?: Env; scanner?: ContentScanner } = {}
): MultiSearch {
  return new MultiSearch(createProviders(config, options.env), {
    maxParallel: config.search.maxParallel,
    fallbackDelayMs: config.search.fallbackDelayMs,
    scanner: options.scanner,
  });
}
