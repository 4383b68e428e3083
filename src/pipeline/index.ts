export { MultiSearch, type MultiSearchOptions } from './search.js';
export { selectProviders, noProvidersError, PRIORITY_ORDER } from './selector.js';
export { executeQuery, DEFAULT_FALLBACK_DELAY_MS, type ExecuteQueryOptions } from './executor.js';
export { dispatchQueries, DEFAULT_MAX_PARALLEL } from './dispatcher.js';
export { aggregateOutcomes } from './aggregator.js';
export { parseSearchRequest, SearchRequestSchema, type SearchRequest } from './request.js';
export type {
  AggregateResponse,
  ContentScanner,
  ProviderAttempt,
  QueryOutcome,
  ScanAction,
  ScanVerdict,
  SearchSummary,
} from './types.js';
