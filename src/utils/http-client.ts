import pRetry, { AbortError } from 'p-retry';
import type { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { abortReason, sleep } from './abort.js';
import {
  AuthenticationError,
  CancellationError,
  ProviderError,
  TransientNetworkError,
  VendorRateLimitedError,
  errorMessage,
} from './errors.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('http');

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 100;

const USER_AGENT = 'searchmux/1.0';
const MAX_ERROR_BODY = 200;

export interface HttpClientOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
}

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  body: string;
}

function hasName(error: unknown, name: string): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === name;
}

/**
 * Outbound HTTP for one provider. Every attempt waits for a token from the
 * provider's limiter and is bounded by a timeout. Only connection failures
 * and timeouts are retried; a well-formed error response is final.
 */
export class RateLimitedHttpClient {
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly retryBaseDelayMs: number;

  constructor(
    readonly provider: string,
    private readonly rateLimiter: RateLimiter,
    options: HttpClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  }

  async request(url: string, request: HttpRequest = {}): Promise<HttpResponse> {
    const { signal } = request;

    return pRetry(
      async (attemptNumber) => {
        try {
          await this.rateLimiter.acquire(signal);
          return await this.attempt(url, request, attemptNumber);
        } catch (error) {
          if (error instanceof TransientNetworkError) {
            throw error;
          }
          throw new AbortError(error instanceof Error ? error : new Error(String(error)));
        }
      },
      {
        retries: this.maxAttempts - 1,
        factor: 1,
        minTimeout: 0,
        maxTimeout: 0,
        randomize: false,
        onFailedAttempt: async (error) => {
          logger.warn(
            {
              provider: this.provider,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            },
            'HTTP request failed'
          );
          if (error.retriesLeft > 0) {
            const delay = error.attemptNumber * this.retryBaseDelayMs;
            logger.debug({ provider: this.provider, delay }, 'Retrying request after delay');
            await sleep(delay, signal, 'request cancelled during retry');
          }
        },
      }
    );
  }

  async requestJson<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    request: HttpRequest = {}
  ): Promise<z.output<S>> {
    const response = await this.request(url, {
      ...request,
      headers: { Accept: 'application/json', ...request.headers },
    });
    return this.parseJson(response, schema);
  }

  parseJson<S extends z.ZodTypeAny>(response: HttpResponse, schema: S): z.output<S> {
    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      throw new ProviderError(this.provider, 'invalid JSON response', response.status, { cause: error });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ProviderError(
        this.provider,
        `unexpected response shape${where}: ${issue?.message ?? 'invalid'}`,
        response.status,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private async attempt(url: string, request: HttpRequest, attemptNumber: number): Promise<HttpResponse> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    logger.debug({ provider: this.provider, url, attempt: attemptNumber }, 'Sending request');

    let status: number;
    let headers: Headers;
    let body: string;
    try {
      const response = await fetch(url, {
        method: request.method ?? 'GET',
        headers: { 'User-Agent': USER_AGENT, ...request.headers },
        body: request.body,
        signal,
      });
      status = response.status;
      headers = response.headers;
      body = await response.text();
    } catch (error) {
      if (request.signal?.aborted) {
        throw new CancellationError(`request cancelled: ${abortReason(request.signal)}`, { cause: error });
      }
      if (timeout.aborted || hasName(error, 'TimeoutError')) {
        throw new TransientNetworkError(this.provider, `request timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new TransientNetworkError(this.provider, `request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (status < 200 || status >= 300) {
      throw this.statusError(status, body);
    }

    logger.debug({ provider: this.provider, status, size: body.length }, 'Request successful');
    return { status, headers, body };
  }

  private statusError(status: number, body: string): ProviderError {
    switch (status) {
      case 401:
        return new AuthenticationError(this.provider, 'authentication failed: invalid API key', status);
      case 403:
        return new AuthenticationError(
          this.provider,
          'access forbidden: check your API key and subscription plan',
          status
        );
      case 429:
        return new VendorRateLimitedError(
          this.provider,
          'rate limit exceeded: please wait before making more requests',
          status
        );
      default: {
        const text = body.trim().slice(0, MAX_ERROR_BODY);
        return new ProviderError(this.provider, text ? `HTTP ${status}: ${text}` : `HTTP ${status}`, status);
      }
    }
  }
}
