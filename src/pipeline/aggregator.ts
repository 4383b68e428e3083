import { AllQueriesFailedError } from '../utils/errors.js';
import type { AggregateResponse, QueryOutcome } from './types.js';

/** Builds the response; throws only when every query failed. */
export function aggregateOutcomes(outcomes: QueryOutcome[]): AggregateResponse {
  const failures = outcomes.flatMap((outcome) =>
    outcome.error !== undefined ? [{ query: outcome.query, error: outcome.error }] : []
  );
  const successful = outcomes.length - failures.length;

  if (successful === 0 && failures.length > 0) {
    throw new AllQueriesFailedError(failures);
  }

  return {
    searches: outcomes,
    summary: { total: outcomes.length, successful, failed: failures.length },
  };
}
