import { describe, it, expect } from 'vitest';
import { dispatchQueries } from './dispatcher.js';
import type { QueryOutcome } from './types.js';
import { sleep } from '../utils/abort.js';

function tracker() {
  const state = { inFlight: 0, maxInFlight: 0 };
  const execute = async (query: string, index: number): Promise<QueryOutcome> => {
    state.inFlight += 1;
    state.maxInFlight = Math.max(state.maxInFlight, state.inFlight);
    // Later queries finish first.
    await sleep(30 - index * 5);
    state.inFlight -= 1;
    return { query, results: [], provider: 'fake', attempts: [] };
  };
  return { state, execute };
}

describe('dispatchQueries', () => {
  it('returns outcomes in input order', async () => {
    const { execute } = tracker();
    const queries = ['first', 'second', 'third', 'fourth'];

    const outcomes = await dispatchQueries(queries, execute, 4);

    expect(outcomes.map((outcome) => outcome.query)).toEqual(queries);
  });

  it('keeps at most maxParallel executions in flight', async () => {
    const { state, execute } = tracker();

    await dispatchQueries(['a', 'b', 'c', 'd', 'e', 'f'], execute, 2);

    expect(state.maxInFlight).toBe(2);
    expect(state.inFlight).toBe(0);
  });

  it('runs fewer workers than the limit when there are fewer queries', async () => {
    const { state, execute } = tracker();

    const outcomes = await dispatchQueries(['a', 'b'], execute, 10);

    expect(outcomes).toHaveLength(2);
    expect(state.maxInFlight).toBe(2);
  });

  it('handles an empty batch', async () => {
    const { execute } = tracker();

    await expect(dispatchQueries([], execute)).resolves.toEqual([]);
  });
});
