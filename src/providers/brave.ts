import { z } from 'zod';
import type { CredentialSource, SearchParams, SearchProvider, SearchResult, SearchType } from './types.js';
import { assertSupported, cleanText, compactMetadata, readCount, readInteger, readString } from './params.js';
import { AuthenticationError, CancellationError, ProviderError, errorMessage } from '../utils/errors.js';
import type { RateLimitedHttpClient } from '../utils/http-client.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('brave');

export const BRAVE_API_BASE_URL = 'https://api.search.brave.com/res/v1';

const Thumbnail = z.object({ src: z.string().optional() }).optional();

const BraveWebResult = z.object({
  title: z.string(),
  url: z.string(),
  description: z.string().optional(),
  age: z.string().optional(),
  page_age: z.string().optional(),
  language: z.string().optional(),
  thumbnail: Thumbnail,
  extra_snippets: z.array(z.string()).optional(),
});

const BraveLocation = z.object({
  id: z.string().optional(),
  title: z.string(),
  url: z.string().optional(),
  description: z.string().optional(),
  coordinates: z.array(z.number()).optional(),
  postal_address: z.object({ displayAddress: z.string().optional() }).optional(),
  rating: z.object({ ratingValue: z.number().optional(), reviewCount: z.number().optional() }).optional(),
  contact: z.object({ telephone: z.string().optional() }).optional(),
});

const BraveWebResponse = z.object({
  web: z.object({ results: z.array(BraveWebResult).default([]) }).optional(),
  locations: z.object({ results: z.array(BraveLocation).default([]) }).optional(),
});

const BravePoiResponse = z.object({
  results: z
    .array(
      z.object({
        name: z.string().optional(),
        address: z.string().optional(),
        phone_number: z.string().optional(),
        rating: z.number().optional(),
        review_count: z.number().optional(),
        website: z.string().optional(),
        hours: z.record(z.unknown()).optional(),
      })
    )
    .default([]),
});

type BravePoi = z.output<typeof BravePoiResponse>['results'][number];

const BraveDescriptionsResponse = z.object({
  results: z.array(z.object({ id: z.string(), description: z.string().optional() })).default([]),
});

export const LOCAL_FALLBACK_MARKER = 'internet_search_fallback';

const BraveImageResponse = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        source: z.string().optional(),
        thumbnail: Thumbnail,
        properties: z
          .object({
            url: z.string().optional(),
            format: z.string().optional(),
            width: z.number().optional(),
            height: z.number().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const BraveNewsResponse = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        description: z.string().optional(),
        age: z.string().optional(),
        page_age: z.string().optional(),
        breaking: z.boolean().optional(),
        meta_url: z.object({ hostname: z.string().optional() }).optional(),
        thumbnail: Thumbnail,
      })
    )
    .default([]),
});

const BraveVideoResponse = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        description: z.string().optional(),
        age: z.string().optional(),
        thumbnail: Thumbnail,
        video: z
          .object({
            duration: z.string().optional(),
            views: z.union([z.string(), z.number()]).optional(),
            creator: z.string().optional(),
            publisher: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

/** Brave Search API. Supports every search type. */
export class BraveProvider implements SearchProvider {
  readonly name = 'brave';
  readonly supportedTypes: ReadonlySet<SearchType> = new Set<SearchType>(['web', 'image', 'news', 'video', 'local']);

  constructor(
    private readonly apiKey: CredentialSource,
    private readonly client: RateLimitedHttpClient,
    private readonly baseUrl = BRAVE_API_BASE_URL
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
    logger.debug({ type, query }, 'Brave search parameters');

    switch (type) {
      case 'web':
        return this.webSearch(query, params, signal);
      case 'image':
        return this.imageSearch(query, params, signal);
      case 'news':
        return this.newsSearch(query, params, signal);
      case 'video':
        return this.videoSearch(query, params, signal);
      case 'local':
        return this.localSearch(query, params, signal);
    }
  }

  private async webSearch(query: string, params: SearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const search = this.baseParams(query, params, 20);
    search.set('offset', String(readInteger(params, 'offset', 0, { min: 0, max: 9 })));
    return this.fetchWebResults(search, signal);
  }

  private async fetchWebResults(search: URLSearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const data = await this.get('/web/search', search, BraveWebResponse, signal);
    return (data.web?.results ?? []).map((result) => ({
      title: cleanText(result.title),
      url: result.url,
      description: cleanText(result.description),
      metadata: compactMetadata({
        age: result.age,
        pageAge: result.page_age,
        language: result.language,
        thumbnail: result.thumbnail?.src,
        extraSnippets: result.extra_snippets,
      }),
    }));
  }

  private async imageSearch(query: string, params: SearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const search = new URLSearchParams({ q: query, count: String(readCount(params, 100)) });

    const data = await this.get('/images/search', search, BraveImageResponse, signal);
    return data.results.map((result) => ({
      title: cleanText(result.title),
      url: result.url,
      description: `Image: ${cleanText(result.title)}`,
      metadata: compactMetadata({
        imageUrl: result.properties?.url,
        format: result.properties?.format,
        width: result.properties?.width,
        height: result.properties?.height,
        thumbnail: result.thumbnail?.src,
        source: result.source,
      }),
    }));
  }

  private async newsSearch(query: string, params: SearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const search = this.baseParams(query, params, 50);

    const data = await this.get('/news/search', search, BraveNewsResponse, signal);
    return data.results.map((result) => ({
      title: cleanText(result.title),
      url: result.url,
      description: cleanText(result.description),
      metadata: compactMetadata({
        age: result.age,
        pageAge: result.page_age,
        breaking: result.breaking,
        source: result.meta_url?.hostname,
        thumbnail: result.thumbnail?.src,
      }),
    }));
  }

  private async videoSearch(query: string, params: SearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const search = this.baseParams(query, params, 50);

    const data = await this.get('/videos/search', search, BraveVideoResponse, signal);
    return data.results.map((result) => ({
      title: cleanText(result.title),
      url: result.url,
      description: cleanText(result.description),
      metadata: compactMetadata({
        age: result.age,
        duration: result.video?.duration,
        views: result.video?.views,
        creator: result.video?.creator,
        publisher: result.video?.publisher,
        thumbnail: result.thumbnail?.src,
      }),
    }));
  }

  /**
   * Locations matching the query, enriched from the POI and descriptions
   * endpoints. With no locations it falls back to a web search whose results
   * are marked with `metadata.fallback`.
   */
  private async localSearch(query: string, params: SearchParams, signal?: AbortSignal): Promise<SearchResult[]> {
    const count = readCount(params, 20);
    const search = new URLSearchParams({ q: query, count: String(count), result_filter: 'locations' });

    const data = await this.get('/web/search', search, BraveWebResponse, signal);
    const locations = (data.locations?.results ?? []).slice(0, count);
    if (locations.length === 0) {
      return this.localFallback(query, count, signal);
    }

    const ids = locations.flatMap((location) => (location.id ? [location.id] : []));
    const { pois, descriptions } = await this.fetchLocationDetails(ids, signal);

    return locations.map((location) => {
      const poi = location.id ? pois.get(location.id) : undefined;
      const description = (location.id ? descriptions.get(location.id) : undefined) || location.description;
      const address = poi?.address || location.postal_address?.displayAddress;
      return {
        title: cleanText(location.title),
        url: location.url ?? '',
        description: cleanText(description ?? address),
        metadata: compactMetadata({
          id: location.id,
          address,
          coordinates: location.coordinates,
          rating: poi?.rating || location.rating?.ratingValue,
          reviewCount: poi?.review_count || location.rating?.reviewCount,
          phone: poi?.phone_number || location.contact?.telephone,
          website: poi?.website,
          hours: poi?.hours && Object.keys(poi.hours).length > 0 ? poi.hours : undefined,
        }),
      };
    });
  }

  /** Detail lookups are best effort; a failed one leaves the location as listed. */
  private async fetchLocationDetails(
    ids: string[],
    signal?: AbortSignal
  ): Promise<{ pois: Map<string, BravePoi>; descriptions: Map<string, string> }> {
    const pois = new Map<string, BravePoi>();
    const descriptions = new Map<string, string>();
    if (ids.length === 0) {
      return { pois, descriptions };
    }

    const search = new URLSearchParams();
    for (const id of ids) {
      search.append('ids', id);
    }

    const [poiResult, descriptionResult] = await Promise.allSettled([
      this.get('/local/pois', search, BravePoiResponse, signal),
      this.get('/local/descriptions', search, BraveDescriptionsResponse, signal),
    ]);

    for (const result of [poiResult, descriptionResult]) {
      if (result.status === 'rejected' && result.reason instanceof CancellationError) {
        throw result.reason;
      }
    }

    if (poiResult.status === 'fulfilled') {
      // POIs come back in the order the IDs were sent.
      poiResult.value.results.forEach((poi, index) => {
        const id = ids[index];
        if (id !== undefined) {
          pois.set(id, poi);
        }
      });
    } else {
      logger.warn({ error: errorMessage(poiResult.reason) }, 'Failed to fetch POI details');
    }

    if (descriptionResult.status === 'fulfilled') {
      for (const entry of descriptionResult.value.results) {
        if (entry.description) {
          descriptions.set(entry.id, entry.description);
        }
      }
    } else {
      logger.warn({ error: errorMessage(descriptionResult.reason) }, 'Failed to fetch location descriptions');
    }

    return { pois, descriptions };
  }

  private async localFallback(query: string, count: number, signal?: AbortSignal): Promise<SearchResult[]> {
    logger.info({ query }, 'No location results found, falling back to internet search');
    const search = new URLSearchParams({ q: query, count: String(count), offset: '0' });

    let results: SearchResult[];
    try {
      results = await this.fetchWebResults(search, signal);
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      throw new ProviderError(
        this.name,
        `local search found no results and fallback internet search failed: ${errorMessage(error)}`,
        error instanceof ProviderError ? error.statusCode : undefined,
        { cause: error }
      );
    }

    return results.map((result) => ({
      ...result,
      metadata: { ...result.metadata, fallback: LOCAL_FALLBACK_MARKER },
    }));
  }

  private baseParams(query: string, params: SearchParams, maxCount: number): URLSearchParams {
    const search = new URLSearchParams({ q: query, count: String(readCount(params, maxCount)) });
    const freshness = readString(params, 'freshness');
    if (freshness) {
      search.set('freshness', freshness);
    }
    return search;
  }

  private async get<S extends z.ZodTypeAny>(
    endpoint: string,
    search: URLSearchParams,
    schema: S,
    signal?: AbortSignal
  ): Promise<z.output<S>> {
    const apiKey = this.apiKey();
    if (!apiKey) {
      throw new AuthenticationError(this.name, 'BRAVE_API_KEY is not set');
    }

    return this.client.requestJson(`${this.baseUrl}${endpoint}?${search.toString()}`, schema, {
      headers: { 'X-Subscription-Token': apiKey },
      signal,
    });
  }
}
