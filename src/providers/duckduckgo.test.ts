import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DuckDuckGoProvider } from './duckduckgo.js';
import { RateLimitedHttpClient } from '../utils/http-client.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { CapabilityError, ProviderError, VendorRateLimitedError } from '../utils/errors.js';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

describe('DuckDuckGoProvider', () => {
  let provider: DuckDuckGoProvider;

  beforeEach(() => {
    const client = new RateLimitedHttpClient('duckduckgo', new RateLimiter('duckduckgo', 1000), {
      retryBaseDelayMs: 1,
    });
    provider = new DuckDuckGoProvider(client);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Provider interface', () => {
    it('has correct name', () => {
      expect(provider.name).toBe('duckduckgo');
    });

    it('is always available and only serves web searches', () => {
      expect(provider.isAvailable()).toBe(true);
      expect([...provider.supportedTypes]).toEqual(['web']);
    });
  });

  describe('Search (mocked)', () => {
    it('normalizes results correctly', async () => {
      const mockResponse = {
        Abstract: 'TypeScript is a programming language',
        AbstractText: 'TypeScript is a strongly typed programming language that builds on JavaScript',
        AbstractSource: 'Wikipedia',
        AbstractURL: 'https://en.wikipedia.org/wiki/TypeScript',
        Heading: 'TypeScript',
        Image: '',
        RelatedTopics: [
          {
            Text: 'JavaScript - A scripting language',
            FirstURL: 'https://en.wikipedia.org/wiki/JavaScript',
            Result: '<a href="https://en.wikipedia.org/wiki/JavaScript">JavaScript</a> - A scripting language',
          },
        ],
        Results: [],
        Type: 'A',
      };

      const fetchSpy = vi.spyOn(global, 'fetch').mockResolvedValueOnce(jsonResponse(mockResponse));

      const results = await provider.search('web', 'typescript', { count: 10 });

      expect(fetchSpy.mock.calls[0]?.[0]).toBe(
        'https://api.duckduckgo.com/?q=typescript&format=json&no_html=1&skip_disambig=1'
      );
      expect(results).toEqual([
        {
          title: 'TypeScript',
          url: 'https://en.wikipedia.org/wiki/TypeScript',
          description: 'TypeScript is a strongly typed programming language that builds on JavaScript',
          metadata: { type: 'abstract', source: 'Wikipedia' },
        },
        {
          title: 'JavaScript',
          url: 'https://en.wikipedia.org/wiki/JavaScript',
          description: 'JavaScript - A scripting language',
          metadata: { type: 'related' },
        },
      ]);
    });

    it('flattens nested topic groups', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValueOnce(
        jsonResponse({
          RelatedTopics: [
            {
              Name: 'Languages',
              Topics: [{ Text: 'Rust - systems language', FirstURL: 'https://example.com/rust' }],
            },
          ],
        })
      );

      const results = await provider.search('web', 'languages', {});

      expect(results).toEqual([
        {
          title: 'Rust - systems language',
          url: 'https://example.com/rust',
          description: 'Rust - systems language',
          metadata: { type: 'related' },
        },
      ]);
    });

    it('handles empty response gracefully', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValueOnce(
        jsonResponse({ AbstractText: '', AbstractURL: '', Heading: '', RelatedTopics: [], Results: [] })
      );

      const results = await provider.search('web', 'xyznonexistent', {});
      expect(results).toHaveLength(0);
    });

    it('respects the count parameter', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValueOnce(
        jsonResponse({
          RelatedTopics: Array.from({ length: 20 }, (_, i) => ({
            Text: `Topic ${i}`,
            FirstURL: `https://example.com/topic/${i}`,
          })),
        })
      );

      const results = await provider.search('web', 'test', { count: 5 });
      expect(results).toHaveLength(5);
      expect(results[4]?.url).toBe('https://example.com/topic/4');
    });

    it('throws ProviderError on HTTP error', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValueOnce(new Response('', { status: 500 }));

      const error = await provider.search('web', 'test', {}).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ message: 'HTTP 500', statusCode: 500 });
    });

    it('treats HTTP 202 as vendor throttling', async () => {
      vi.spyOn(global, 'fetch').mockResolvedValueOnce(new Response('', { status: 202 }));

      await expect(provider.search('web', 'test', {})).rejects.toBeInstanceOf(VendorRateLimitedError);
    });

    it('refuses unsupported search types', async () => {
      const fetchSpy = vi.spyOn(global, 'fetch');

      await expect(provider.search('image', 'test', {})).rejects.toThrow(
        new CapabilityError('duckduckgo', 'unsupported search type for duckduckgo: image')
      );
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });
});
