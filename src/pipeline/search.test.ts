import { describe, it, expect } from 'vitest';
import { MultiSearch } from './search.js';
import { ProviderRegistry } from '../providers/registry.js';
import { FakeProvider } from '../testing/fake-provider.js';
import { AllQueriesFailedError, CancellationError, CapabilityError, RequestValidationError } from '../utils/errors.js';

function createSearch(providers: FakeProvider[], maxParallel = 3) {
  return new MultiSearch(new ProviderRegistry(providers), { maxParallel, fallbackDelayMs: 0 });
}

describe('MultiSearch', () => {
  it('returns outcomes in query order whatever the completion order', async () => {
    const latencies: Record<string, number> = { slow: 40, medium: 20, fast: 1 };
    const brave = new FakeProvider('brave', { latencyMs: (query) => latencies[query] ?? 0 });

    const response = await createSearch([brave]).run({ query: ['slow', 'medium', 'fast'] });

    expect(response.searches.map((s) => s.query)).toEqual(['slow', 'medium', 'fast']);
    expect(response.searches.map((s) => s.provider)).toEqual(['brave', 'brave', 'brave']);
    expect(response.summary).toEqual({ total: 3, successful: 3, failed: 0 });
  });

  it('leaves padded queries exactly as given', async () => {
    const brave = new FakeProvider('brave');
    const queries = ['  padded ', 'c++ ', 'plain'];

    const response = await createSearch([brave], 1).run({ query: queries });

    expect(response.searches.map((s) => s.query)).toEqual(queries);
    expect(brave.calls.map((call) => call.query)).toEqual(queries);
  });

  it('falls back in priority order and names every failed provider', async () => {
    const search = createSearch([
      new FakeProvider('google', { failWith: new Error('quota exceeded') }),
      new FakeProvider('brave', { failWith: new Error('HTTP 500') }),
    ]);

    await expect(search.run({ query: ['rust'] })).rejects.toThrow(
      'all queries failed: rust: all providers failed: brave: HTTP 500; google: quota exceeded'
    );
  });

  it('uses only the explicit provider', async () => {
    const brave = new FakeProvider('brave');
    const google = new FakeProvider('google');

    const response = await createSearch([brave, google]).run({ query: ['a', 'b'], provider: 'google' });

    expect(brave.calls).toHaveLength(0);
    expect(google.calls.map((call) => call.query)).toEqual(['a', 'b']);
    expect(response.searches.every((s) => s.provider === 'google')).toBe(true);
  });

  it('does not fall back when the explicit provider fails', async () => {
    const brave = new FakeProvider('brave');
    const search = createSearch([brave, new FakeProvider('google', { failWith: new Error('down') })]);

    await expect(search.run({ query: ['a'], provider: 'google' })).rejects.toThrow(
      'all queries failed: a: search failed: google: down'
    );
    expect(brave.calls).toHaveLength(0);
  });

  it('bounds the number of queries in flight', async () => {
    const brave = new FakeProvider('brave', { latencyMs: 15 });

    await createSearch([brave], 2).run({ query: ['1', '2', '3', '4', '5', '6'] });

    expect(brave.calls).toHaveLength(6);
    expect(brave.maxInFlight).toBe(2);
  });

  it('reports partial failure without throwing', async () => {
    const brave = new FakeProvider('brave', {
      failWith: (query) => (query === 'bad' ? new Error('HTTP 500') : undefined),
    });

    const response = await createSearch([brave]).run({ query: ['good', 'bad', 'fine'] });

    expect(response.summary).toEqual({ total: 3, successful: 2, failed: 1 });
    expect(response.searches[1]).toMatchObject({ query: 'bad', results: [], error: 'search failed: brave: HTTP 500' });
  });

  it('throws an error naming every failed query', async () => {
    const search = createSearch([new FakeProvider('brave', { failWith: new Error('HTTP 503') })]);

    const error = await search.run({ query: ['one', 'two'] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllQueriesFailedError);
    expect(error).toHaveProperty(
      'message',
      'all queries failed: one: search failed: brave: HTTP 503; two: search failed: brave: HTTP 503'
    );
  });

  it('stops promptly when cancelled', async () => {
    const brave = new FakeProvider('brave', { latencyMs: 10_000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort('caller gave up'), 20);

    const startedAt = Date.now();
    const error = await createSearch([brave]).run({ query: ['a', 'b'] }, controller.signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(error).toHaveProperty('message', 'search cancelled: caller gave up');
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it('stops promptly when cancelled during the fallback delay', async () => {
    const google = new FakeProvider('google');
    const search = new MultiSearch(
      new ProviderRegistry([new FakeProvider('brave', { failWith: new Error('HTTP 500') }), google]),
      { fallbackDelayMs: 10_000 }
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort('caller gave up'), 20);

    const startedAt = Date.now();
    const error = await search.run({ query: ['a'] }, controller.signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancellationError);
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(google.calls).toHaveLength(0);
  });

  it('only calls providers that support the type', async () => {
    const brave = new FakeProvider('brave', { types: ['web', 'image'] });
    const duckduckgo = new FakeProvider('duckduckgo', { types: ['web'] });

    const response = await createSearch([brave, duckduckgo]).run({ query: ['cats'], type: 'image' });

    expect(response.searches[0]?.provider).toBe('brave');
    expect(duckduckgo.calls).toHaveLength(0);
  });

  it('fails before any provider call when nothing supports the type', async () => {
    const duckduckgo = new FakeProvider('duckduckgo', { types: ['web'] });
    const search = createSearch([duckduckgo]);

    await expect(search.run({ query: ['cafe'], type: 'local' })).rejects.toThrow(
      new CapabilityError('*', 'no available providers support search type: local')
    );
    await expect(search.run({ query: ['cafe'], provider: 'kagi' })).rejects.toThrow(
      'provider "kagi" is not available for search type: web'
    );
    expect(duckduckgo.calls).toHaveLength(0);
  });

  it('validates the request first', async () => {
    await expect(createSearch([new FakeProvider('brave')]).run({ query: [] })).rejects.toBeInstanceOf(
      RequestValidationError
    );
  });

  it('forwards params to the provider', async () => {
    const brave = new FakeProvider('brave');

    await createSearch([brave]).run({ query: ['a'], count: 7, freshness: 'pd' });

    expect(brave.calls[0]?.params).toEqual({ count: 7, freshness: 'pd' });
  });
});
