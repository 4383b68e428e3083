import { z } from 'zod';
import type { CredentialSource, SearchParams, SearchProvider, SearchResult, SearchType } from './types.js';
import { assertSupported, cleanText, compactMetadata, readCount } from './params.js';
import { AuthenticationError, ProviderError } from '../utils/errors.js';
import type { RateLimitedHttpClient } from '../utils/http-client.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('kagi');

export const KAGI_API_BASE_URL = 'https://kagi.com/api/v0';

const KagiResponse = z.object({
  data: z
    .array(
      z.object({
        t: z.number(),
        rank: z.number().optional(),
        url: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional(),
        published: z.string().optional(),
        thumbnail: z
          .object({ url: z.string(), width: z.number().optional(), height: z.number().optional() })
          .optional(),
      })
    )
    .default([]),
  error: z.array(z.object({ code: z.number().optional(), msg: z.string() })).optional(),
});

/** Kagi Search API, web only. */
export class KagiProvider implements SearchProvider {
  readonly name = 'kagi';
  readonly supportedTypes: ReadonlySet<SearchType> = new Set<SearchType>(['web']);

  constructor(
    private readonly apiKey: CredentialSource,
    private readonly client: RateLimitedHttpClient,
    private readonly baseUrl = KAGI_API_BASE_URL
  ) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey());
  }

  async search(
    type: SearchType,
    query: string,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    assertSupported(this, type);

    const apiKey = this.apiKey();
    if (!apiKey) {
      throw new AuthenticationError(this.name, 'KAGI_API_KEY is not set');
    }

    const search = new URLSearchParams({ q: query, limit: String(readCount(params, 25)) });
    logger.debug({ query }, 'Kagi search parameters');

    const data = await this.client.requestJson(`${this.baseUrl}/search?${search.toString()}`, KagiResponse, {
      headers: { Authorization: `Bot ${apiKey}` },
      signal,
    });

    const apiError = data.error?.[0];
    if (apiError) {
      throw new ProviderError(this.name, `API error: ${apiError.msg}`, apiError.code);
    }

    const results: SearchResult[] = [];
    for (const item of data.data) {
      // t=1 entries are related-search suggestions, not results.
      if (item.t !== 0 || !item.url) {
        continue;
      }
      results.push({
        title: cleanText(item.title),
        url: item.url,
        description: cleanText(item.snippet),
        metadata: compactMetadata({
          rank: item.rank,
          published: item.published,
          thumbnail: item.thumbnail
            ? compactMetadata({ url: item.thumbnail.url, width: item.thumbnail.width, height: item.thumbnail.height })
            : undefined,
        }),
      });
    }
    return results;
  }
}
