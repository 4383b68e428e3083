import type { SearchParams, SearchProvider, SearchResult, SearchType } from '../providers/types.js';
import { abortReason, sleep } from '../utils/abort.js';
import { CancellationError, SecurityBlockedError, errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { ContentScanner, ProviderAttempt, QueryOutcome } from './types.js';

const logger = createChildLogger('executor');

export const DEFAULT_FALLBACK_DELAY_MS = 1000;

export interface ExecuteQueryOptions {
  type: SearchType;
  query: string;
  params: SearchParams;
  /** Candidates in fallback order, as returned by `selectProviders`. */
  providers: readonly SearchProvider[];
  /** Set when the caller named a provider; the first failure is final. */
  explicit?: boolean;
  fallbackDelayMs?: number;
  scanner?: ContentScanner;
  signal?: AbortSignal;
}

function formatFailure(errors: readonly string[]): string {
  if (errors.length === 0) {
    return 'no providers could complete the search';
  }
  if (errors.length === 1) {
    return `search failed: ${errors[0]}`;
  }
  return `all providers failed: ${errors.join('; ')}`;
}

function scanResults(provider: string, results: SearchResult[], scanner: ContentScanner | undefined): SearchResult[] {
  if (!scanner) {
    return results;
  }

  return results.map((result) => {
    const verdict = scanner.scan(`${result.title} ${result.description}`, provider);
    switch (verdict.action) {
      case 'block':
        throw new SecurityBlockedError(
          provider,
          `search result blocked by security policy: ${verdict.message ?? 'content rejected'}`
        );
      case 'warn':
        logger.warn({ provider, url: result.url, message: verdict.message }, 'Result flagged by content scanner');
        return { ...result, metadata: { ...result.metadata, security_warning: verdict.message ?? '' } };
      default:
        return result;
    }
  });
}

/**
 * Runs one query against its candidates in order until one answers. Provider
 * failures never reject: they end up in `outcome.error`.
 */
export async function executeQuery(options: ExecuteQueryOptions): Promise<QueryOutcome> {
  const { type, query, params, providers, signal, scanner } = options;
  const fallbackDelayMs = options.fallbackDelayMs ?? DEFAULT_FALLBACK_DELAY_MS;
  const attempts: ProviderAttempt[] = [];
  const errors: string[] = [];

  const failed = (error: string): QueryOutcome => ({ query, results: [], error, attempts });

  for (const [index, provider] of providers.entries()) {
    if (signal?.aborted) {
      return failed(`search cancelled: ${abortReason(signal)}`);
    }

    if (index > 0 && fallbackDelayMs > 0) {
      try {
        await sleep(index * fallbackDelayMs, signal, 'search cancelled during fallback');
      } catch (error) {
        if (error instanceof CancellationError) {
          return failed(error.message);
        }
        throw error;
      }
    }

    if (!provider.isAvailable()) {
      logger.debug({ provider: provider.name, query }, 'Skipping provider that became unavailable');
      attempts.push({ provider: provider.name, ok: false, error: 'provider unavailable', durationMs: 0 });
      continue;
    }

    logger.debug({ provider: provider.name, type, query }, 'Executing search query');
    const startedAt = Date.now();
    try {
      const results = scanResults(provider.name, await provider.search(type, query, params, signal), scanner);
      attempts.push({ provider: provider.name, ok: true, durationMs: Date.now() - startedAt });
      return { query, results, provider: provider.name, attempts };
    } catch (error) {
      const message = errorMessage(error);
      attempts.push({ provider: provider.name, ok: false, error: message, durationMs: Date.now() - startedAt });

      if (error instanceof CancellationError) {
        return failed(signal?.aborted ? `search cancelled: ${abortReason(signal)}` : message);
      }
      if (error instanceof SecurityBlockedError) {
        logger.warn({ provider: provider.name, query }, message);
        return failed(message);
      }

      logger.warn({ provider: provider.name, query, error: message }, 'Provider search failed');
      errors.push(`${provider.name}: ${message}`);
      if (options.explicit) {
        break;
      }
    }
  }

  return failed(formatFailure(errors));
}
