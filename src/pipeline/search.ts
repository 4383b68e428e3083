import type { ProviderRegistry } from '../providers/registry.js';
import { abortReason } from '../utils/abort.js';
import { CancellationError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { aggregateOutcomes } from './aggregator.js';
import { DEFAULT_MAX_PARALLEL, dispatchQueries } from './dispatcher.js';
import { DEFAULT_FALLBACK_DELAY_MS, executeQuery } from './executor.js';
import { parseSearchRequest } from './request.js';
import { noProvidersError, selectProviders } from './selector.js';
import type { AggregateResponse, ContentScanner } from './types.js';

const logger = createChildLogger('search');

export interface MultiSearchOptions {
  maxParallel?: number;
  fallbackDelayMs?: number;
  scanner?: ContentScanner;
}

/**
 * Runs a batch of queries against the registry: one provider selection per
 * request, bounded parallel execution, per-query fallback.
 */
export class MultiSearch {
  private readonly maxParallel: number;
  private readonly fallbackDelayMs: number;
  private readonly scanner?: ContentScanner;

  constructor(
    private readonly registry: ProviderRegistry,
    options: MultiSearchOptions = {}
  ) {
    this.maxParallel = options.maxParallel ?? DEFAULT_MAX_PARALLEL;
    this.fallbackDelayMs = options.fallbackDelayMs ?? DEFAULT_FALLBACK_DELAY_MS;
    this.scanner = options.scanner;
  }

  async run(input: unknown, signal?: AbortSignal): Promise<AggregateResponse> {
    const request = parseSearchRequest(input);

    const providers = selectProviders(this.registry, request.type, request.provider);
    if (providers.length === 0) {
      throw noProvidersError(request.type, request.provider);
    }

    logger.info(
      {
        type: request.type,
        queries: request.queries.length,
        providers: providers.map((p) => p.name),
      },
      'Starting multi-search'
    );

    const outcomes = await dispatchQueries(
      request.queries,
      (query) =>
        executeQuery({
          type: request.type,
          query,
          params: request.params,
          providers,
          explicit: request.provider !== undefined,
          fallbackDelayMs: this.fallbackDelayMs,
          scanner: this.scanner,
          signal,
        }),
      this.maxParallel
    );

    if (signal?.aborted) {
      throw new CancellationError(`search cancelled: ${abortReason(signal)}`, { cause: signal.reason });
    }

    const response = aggregateOutcomes(outcomes);
    logger.info(response.summary, 'Multi-search complete');
    return response;
  }
}
