/**
 * Rate Limiter Utility
 *
 * Token bucket limiter for outbound calls to external services. In-process
 * only; each limiter instance keeps its own bucket.
 */

import { logger } from '../lib/logger';

export interface RateLimiterConfig {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
  /** Name for logging */
  name: string;
}

interface RateLimitBucket {
  tokens: number;
  lastRefill: number;
}

export class RateLimiter {
  private readonly bucket: RateLimitBucket;

  constructor(private readonly config: RateLimiterConfig) {
    if (config.maxRequests <= 0 || config.windowMs <= 0) {
      throw new Error(`${config.name}: maxRequests and windowMs must be positive`);
    }
    this.bucket = {
      tokens: config.maxRequests,
      lastRefill: Date.now(),
    };
  }

  private refillTokens(): void {
    const now = Date.now();
    const elapsed = now - this.bucket.lastRefill;
    const tokensToAdd = Math.floor((elapsed / this.config.windowMs) * this.config.maxRequests);

    if (tokensToAdd > 0) {
      this.bucket.tokens = Math.min(this.config.maxRequests, this.bucket.tokens + tokensToAdd);
      this.bucket.lastRefill = now;
    }
  }

  /** Take a token without waiting. */
  tryAcquire(): boolean {
    this.refillTokens();
    if (this.bucket.tokens > 0) {
      this.bucket.tokens--;
      return true;
    }
    return false;
  }

  /**
   * Take a token, sleeping until one is refilled. Concurrent waiters each
   * need a token of their own.
   */
  async acquire(): Promise<void> {
    const waitTime = Math.ceil(this.config.windowMs / this.config.maxRequests);

    while (!this.tryAcquire()) {
      logger.warn(`[${this.config.name}] Rate limit reached, waiting ${waitTime}ms...`);
      await new Promise<void>((resolve) => setTimeout(resolve, waitTime));
    }
  }
}
