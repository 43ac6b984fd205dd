/**
 * Sliding-window rate limiter for outbound requests
 *
 * Allows at most `maxRequests` calls in any rolling `windowMs` period.
 */

import { sleep } from './retry.js';
import { logger } from './logger.js';

export interface RateLimiterOptions {
  /** Clock source, overridable for tests */
  now?: () => number;
  wait?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private readonly timestamps: number[] = [];
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    options: RateLimiterOptions = {}
  ) {
    if (maxRequests < 1) {
      throw new Error(`RateLimiter needs at least one request per window, got ${maxRequests}`);
    }
    this.now = options.now ?? Date.now;
    this.wait = options.wait ?? sleep;
  }

  static perHour(requestsPerHour: number, options?: RateLimiterOptions): RateLimiter {
    return new RateLimiter(requestsPerHour, 60 * 60 * 1000, options);
  }

  get usedSlots(): number {
    this.evict(this.now());
    return this.timestamps.length;
  }

  async waitForSlot(): Promise<void> {
    let current = this.now();
    this.evict(current);

    while (this.timestamps.length >= this.maxRequests) {
      const oldest = this.timestamps[0] ?? current;
      const waitTime = Math.max(0, oldest + this.windowMs - current);
      logger.info({ waitMs: waitTime, limit: this.maxRequests }, 'Rate limit reached, waiting for a free slot');
      await this.wait(waitTime);
      current = this.now();
      this.evict(current);
    }

    this.timestamps.push(current);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }

  private evict(current: number): void {
    while (this.timestamps.length > 0 && (this.timestamps[0] ?? 0) <= current - this.windowMs) {
      this.timestamps.shift();
    }
  }
}
