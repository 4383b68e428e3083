import { z } from 'zod';
import type { SearchParams, SearchProvider, SearchResult, SearchType } from './types.js';
import { assertSupported, cleanText, compactMetadata, readCount } from './params.js';
import { VendorRateLimitedError } from '../utils/errors.js';
import type { RateLimitedHttpClient } from '../utils/http-client.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('duckduckgo');

export const DUCKDUCKGO_API_URL = 'https://api.duckduckgo.com/';

interface DDGRelatedTopic {
  Text?: string;
  FirstURL?: string;
  Icon?: { URL?: string };
  Result?: string;
  Topics?: DDGRelatedTopic[];
  Name?: string;
}

const DDGRelatedTopicSchema: z.ZodType<DDGRelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Icon: z.object({ URL: z.string().optional() }).optional(),
    Result: z.string().optional(),
    Topics: z.array(DDGRelatedTopicSchema).optional(),
    Name: z.string().optional(),
  })
);

const DDGInstantAnswer = z.object({
  AbstractText: z.string().default(''),
  AbstractSource: z.string().default(''),
  AbstractURL: z.string().default(''),
  Image: z.string().default(''),
  Heading: z.string().default(''),
  Answer: z.union([z.string(), z.number()]).default(''),
  AnswerType: z.string().default(''),
  Definition: z.string().default(''),
  DefinitionSource: z.string().default(''),
  DefinitionURL: z.string().default(''),
  RelatedTopics: z.array(DDGRelatedTopicSchema).default([]),
  Results: z.array(DDGRelatedTopicSchema).default([]),
});

type DDGInstantAnswer = z.output<typeof DDGInstantAnswer>;

/**
 * DuckDuckGo Instant Answer API. Needs no credentials, so it is always
 * available and sits last in the fallback order.
 */
export class DuckDuckGoProvider implements SearchProvider {
  readonly name = 'duckduckgo';
  readonly supportedTypes: ReadonlySet<SearchType> = new Set<SearchType>(['web']);

  constructor(
    private readonly client: RateLimitedHttpClient,
    private readonly apiUrl = DUCKDUCKGO_API_URL
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async search(
    type: SearchType,
    query: string,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    assertSupported(this, type);

    const search = new URLSearchParams({
      q: query,
      format: 'json',
      no_html: '1',
      skip_disambig: '1',
    });

    logger.debug({ query }, 'Fetching DuckDuckGo Instant Answer');
    const response = await this.client.request(`${this.apiUrl}?${search.toString()}`, {
      headers: { Accept: 'application/json' },
      signal,
    });

    // 202 with an empty body is how DuckDuckGo signals throttling.
    if (response.status === 202) {
      throw new VendorRateLimitedError(this.name, 'rate limit exceeded: please wait before retrying', 202);
    }

    const data = this.client.parseJson(response, DDGInstantAnswer);
    return this.normalize(data, readCount(params, 50));
  }

  private normalize(data: DDGInstantAnswer, limit: number): SearchResult[] {
    const results: SearchResult[] = [];

    if (data.AbstractURL && data.AbstractText) {
      results.push({
        title: data.Heading || data.AbstractSource || 'DuckDuckGo Result',
        url: data.AbstractURL,
        description: cleanText(data.AbstractText),
        metadata: compactMetadata({ type: 'abstract', source: data.AbstractSource, image: data.Image }),
      });
    }

    if (data.Answer !== '' && data.AnswerType) {
      results.push({
        title: `Answer: ${data.AnswerType}`,
        url: `https://duckduckgo.com/?q=${encodeURIComponent(data.Heading)}`,
        description: String(data.Answer),
        metadata: { type: 'answer' },
      });
    }

    if (data.DefinitionURL && data.Definition) {
      results.push({
        title: `Definition from ${data.DefinitionSource || 'Unknown'}`,
        url: data.DefinitionURL,
        description: cleanText(data.Definition),
        metadata: { type: 'definition' },
      });
    }

    this.collectTopics(data.Results, 'result', results, limit);
    this.collectTopics(data.RelatedTopics, 'related', results, limit);

    logger.debug({ count: results.length }, 'DuckDuckGo results normalized');
    return results.slice(0, limit);
  }

  private collectTopics(
    topics: DDGRelatedTopic[],
    kind: 'result' | 'related',
    results: SearchResult[],
    limit: number
  ): void {
    for (const topic of topics) {
      if (results.length >= limit) break;

      if (topic.FirstURL && topic.Text) {
        results.push({
          title: this.extractTitle(topic.Result ?? '') || topic.Text.slice(0, 100),
          url: topic.FirstURL,
          description: cleanText(topic.Text),
          metadata: compactMetadata({ type: kind, icon: topic.Icon?.URL }),
        });
      }

      // Category groups nest their topics one level down.
      if (topic.Topics && topic.Topics.length > 0) {
        this.collectTopics(topic.Topics, kind, results, limit);
      }
    }
  }

  private extractTitle(html: string): string {
    const match = html.match(/<a[^>]*>([^<]+)<\/a>/);
    return match?.[1] ?? '';
  }
}
