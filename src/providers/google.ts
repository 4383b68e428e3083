import { z } from 'zod';
import type { CredentialSource, SearchParams, SearchProvider, SearchResult, SearchType } from './types.js';
import { assertSupported, cleanText, compactMetadata, readCount, readInteger } from './params.js';
import { AuthenticationError } from '../utils/errors.js';
import type { RateLimitedHttpClient } from '../utils/http-client.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('google');

export const GOOGLE_API_URL = 'https://www.googleapis.com/customsearch/v1';

const GoogleResponse = z.object({
  items: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().optional(),
        displayLink: z.string().optional(),
        image: z
          .object({
            contextLink: z.string().optional(),
            width: z.number().optional(),
            height: z.number().optional(),
            thumbnailLink: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

/** Google Custom Search JSON API (web and image). Needs an API key and engine ID. */
export class GoogleProvider implements SearchProvider {
  readonly name = 'google';
  readonly supportedTypes: ReadonlySet<SearchType> = new Set<SearchType>(['web', 'image']);

  constructor(
    private readonly apiKey: CredentialSource,
    private readonly searchId: CredentialSource,
    private readonly client: RateLimitedHttpClient,
    private readonly apiUrl = GOOGLE_API_URL
  ) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey()) && Boolean(this.searchId());
  }

  async search(
    type: SearchType,
    query: string,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    assertSupported(this, type);

    const key = this.apiKey();
    const cx = this.searchId();
    if (!key || !cx) {
      throw new AuthenticationError(this.name, 'GOOGLE_SEARCH_API_KEY and GOOGLE_SEARCH_ID must both be set');
    }

    // `start` is zero-based for callers; the API counts from 1 and stops at 91.
    const start = readInteger(params, 'start', 0, { min: 0, max: 90 });
    const search = new URLSearchParams({
      key,
      cx,
      q: query,
      num: String(readCount(params, 10)),
      start: String(start + 1),
    });
    if (type === 'image') {
      search.set('searchType', 'image');
    }

    logger.debug({ type, query, start }, 'Google search parameters');
    const data = await this.client.requestJson(`${this.apiUrl}?${search.toString()}`, GoogleResponse, { signal });

    return data.items.map((item) => {
      const title = cleanText(item.title);
      if (type === 'image') {
        return {
          title,
          url: item.link,
          description: cleanText(item.snippet) || `Image: ${title}`,
          metadata: compactMetadata({
            imageUrl: item.image?.contextLink,
            width: item.image?.width,
            height: item.image?.height,
            thumbnail: item.image?.thumbnailLink,
          }),
        };
      }
      return {
        title,
        url: item.link,
        description: cleanText(item.snippet),
        metadata: compactMetadata({ displayLink: item.displayLink }),
      };
    });
  }
}
