import { describe, it, expect } from 'vitest';
import { buildSearchRequest, formatProviderList } from './cli.js';
import { ProviderRegistry } from './providers/registry.js';
import { FakeProvider } from './testing/fake-provider.js';

describe('buildSearchRequest', () => {
  it('maps flags onto request keys and drops unset ones', () => {
    expect(
      buildSearchRequest(['rust', 'go'], {
        type: 'news',
        provider: 'brave',
        count: '4',
        freshness: 'pw',
        timeRange: 'day',
        page: '2',
      })
    ).toEqual({
      query: ['rust', 'go'],
      type: 'news',
      provider: 'brave',
      count: 4,
      freshness: 'pw',
      time_range: 'day',
      pageno: 2,
    });
  });

  it('keeps a malformed number for validation to reject', () => {
    expect(buildSearchRequest(['rust'], { type: 'web', count: 'many' }).count).toBeNaN();
  });
});

describe('formatProviderList', () => {
  it('shows availability and supported types', () => {
    const registry = new ProviderRegistry([
      new FakeProvider('brave', { types: ['web', 'image'] }),
      new FakeProvider('kagi', { available: false }),
    ]);

    expect(formatProviderList(registry)).toBe(
      ['  ✓ brave: available (web, image)', '  ✗ kagi: unavailable (web)'].join('\n')
    );
  });
});
