import { z } from 'zod';
import type { SearchParams, SearchProvider, SearchResult, SearchType } from './types.js';
import { assertSupported, cleanText, compactMetadata, readChoice, readCount, readInteger, readString } from './params.js';
import { ConfigError } from '../utils/errors.js';
import type { RateLimitedHttpClient } from '../utils/http-client.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('searxng');

export interface SearxngSettings {
  baseUrl?: string;
  username?: string;
  password?: string;
}

const CATEGORIES: Record<SearchType, string> = {
  web: 'general',
  image: 'images',
  news: 'news',
  video: 'videos',
  local: 'map',
};

const SearxngResponse = z.object({
  results: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string(),
        content: z.string().optional(),
        engine: z.string().optional(),
        publishedDate: z.string().nullable().optional(),
        img_src: z.string().optional(),
        thumbnail: z.string().nullable().optional(),
      })
    )
    .default([]),
});

function normalizeBaseUrl(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }
  try {
    const parsed = new URL(raw);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return undefined;
    }
  } catch {
    return undefined;
  }
  return raw.replace(/\/+$/, '');
}

/** Self-hosted SearXNG instance, queried through its JSON output format. */
export class SearxngProvider implements SearchProvider {
  readonly name = 'searxng';
  readonly supportedTypes: ReadonlySet<SearchType> = new Set<SearchType>(['web', 'image', 'news', 'video']);

  constructor(
    private readonly settings: () => SearxngSettings,
    private readonly client: RateLimitedHttpClient
  ) {}

  isAvailable(): boolean {
    return normalizeBaseUrl(this.settings().baseUrl) !== undefined;
  }

  async search(
    type: SearchType,
    query: string,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    assertSupported(this, type);

    const settings = this.settings();
    const baseUrl = normalizeBaseUrl(settings.baseUrl);
    if (!baseUrl) {
      throw new ConfigError('SEARXNG_BASE_URL must be an http(s) URL');
    }

    const timeRange = readChoice(params, 'time_range', ['day', 'month', 'year']);
    const language = readString(params, 'language') ?? 'all';
    const search = new URLSearchParams({
      q: query,
      format: 'json',
      pageno: String(readInteger(params, 'pageno', 1, { min: 1, max: 100 })),
      categories: CATEGORIES[type],
      safesearch: readChoice(params, 'safesearch', ['0', '1', '2']) ?? '0',
    });
    if (timeRange) {
      search.set('time_range', timeRange);
    }
    if (language !== 'all') {
      search.set('language', language);
    }

    const headers: Record<string, string> = {};
    if (settings.username && settings.password) {
      const token = Buffer.from(`${settings.username}:${settings.password}`).toString('base64');
      headers['Authorization'] = `Basic ${token}`;
    }

    logger.debug({ type, query, baseUrl }, 'SearXNG search parameters');
    const data = await this.client.requestJson(`${baseUrl}/search?${search.toString()}`, SearxngResponse, {
      headers,
      signal,
    });

    // SearXNG has no result-count parameter, so trim client-side.
    return data.results.slice(0, readCount(params, 50)).map((result) => ({
      title: cleanText(result.title) || result.url,
      url: result.url,
      description: cleanText(result.content),
      metadata: compactMetadata({
        category: type,
        engine: result.engine,
        published: result.publishedDate,
        imageUrl: result.img_src,
        thumbnail: result.thumbnail,
        language: language !== 'all' ? language : undefined,
        timeRange,
      }),
    }));
  }
}
