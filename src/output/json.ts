import type { SearchResult } from '../providers/types.js';
import type { AggregateResponse, ProviderAttempt, SearchSummary } from '../pipeline/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('json');

export interface JsonOutputOptions {
  /** Include per-provider attempts. */
  verbose?: boolean;
  pretty?: boolean;
}

export interface JsonSearch {
  query: string;
  results: SearchResult[];
  provider?: string;
  error?: string;
  attempts?: ProviderAttempt[];
}

export interface JsonOutput {
  searches: JsonSearch[];
  summary: SearchSummary;
}

export class JsonGenerator {
  toOutput(response: AggregateResponse, options: JsonOutputOptions = {}): JsonOutput {
    return {
      searches: response.searches.map((outcome) => {
        const search: JsonSearch = { query: outcome.query, results: outcome.results };
        if (outcome.provider !== undefined) {
          search.provider = outcome.provider;
        }
        if (outcome.error !== undefined) {
          search.error = outcome.error;
        }
        if (options.verbose) {
          search.attempts = outcome.attempts;
        }
        return search;
      }),
      summary: response.summary,
    };
  }

  generate(response: AggregateResponse, options: JsonOutputOptions = {}): string {
    const output = this.toOutput(response, options);
    logger.debug({ searches: output.searches.length }, 'JSON generated');

    if (options.pretty ?? true) {
      return JSON.stringify(output, null, 2);
    }

    return JSON.stringify(output);
  }
}
