import type { SearchResult } from '../providers/types.js';

export interface ProviderAttempt {
  provider: string;
  ok: boolean;
  error?: string;
  durationMs: number;
}

/** Result of one query after fallback. `error` is set only when no provider answered. */
export interface QueryOutcome {
  query: string;
  results: SearchResult[];
  provider?: string;
  error?: string;
  attempts: ProviderAttempt[];
}

export interface SearchSummary {
  total: number;
  successful: number;
  failed: number;
}

export interface AggregateResponse {
  searches: QueryOutcome[];
  summary: SearchSummary;
}

export type ScanAction = 'allow' | 'warn' | 'block';

export interface ScanVerdict {
  action: ScanAction;
  message?: string;
}

/** Inspects result text before it is returned. `source` is the provider name. */
export interface ContentScanner {
  scan(text: string, source: string): ScanVerdict;
}
