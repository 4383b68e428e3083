import { sleep, throwIfAborted } from './abort.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('rate-limiter');

/**
 * Token bucket. Tokens may go negative: each waiting caller holds a
 * reservation, so concurrent callers are spaced one interval apart instead of
 * all waking on the same refill.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per second

  constructor(
    private name: string,
    requestsPerSecond: number,
    burst = 1
  ) {
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`rate limit for ${name} must be positive, got ${requestsPerSecond}`);
    }
    this.maxTokens = Math.max(1, burst);
    this.tokens = this.maxTokens;
    this.refillRate = requestsPerSecond;
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    const tokensToAdd = elapsed * this.refillRate;

    this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'rate limiter wait cancelled');
    this.refill();

    this.tokens -= 1;
    if (this.tokens >= 0) {
      logger.debug({ name: this.name, tokens: this.tokens }, 'Token acquired');
      return;
    }

    const waitTime = (-this.tokens / this.refillRate) * 1000;
    logger.debug({ name: this.name, waitTime }, 'Rate limited, waiting');

    try {
      await sleep(waitTime, signal, 'rate limiter wait cancelled');
    } catch (error) {
      // Hand the reservation back so later callers do not wait for it.
      this.tokens += 1;
      throw error;
    }
  }

  tryAcquire(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  getAvailableTokens(): number {
    this.refill();
    return Math.max(0, this.tokens);
  }
}
