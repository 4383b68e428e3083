import pLimit from 'p-limit';
import { createChildLogger } from '../utils/logger.js';
import type { QueryOutcome } from './types.js';

const logger = createChildLogger('dispatcher');

export const DEFAULT_MAX_PARALLEL = 3;

/**
 * Runs `execute` for every query with at most `maxParallel` in flight.
 * Outcomes come back in input order regardless of completion order.
 */
export async function dispatchQueries(
  queries: readonly string[],
  execute: (query: string, index: number) => Promise<QueryOutcome>,
  maxParallel = DEFAULT_MAX_PARALLEL
): Promise<QueryOutcome[]> {
  const concurrency = Math.max(1, Math.min(maxParallel, queries.length));
  const limit = pLimit(concurrency);
  const outcomes = new Array<QueryOutcome>(queries.length);

  logger.info({ queries: queries.length, concurrency }, 'Dispatching queries');

  await Promise.all(
    queries.map((query, index) =>
      limit(async () => {
        outcomes[index] = await execute(query, index);
      })
    )
  );

  return outcomes;
}
