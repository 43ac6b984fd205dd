/**
 * Retry with exponential backoff, plus the small timing helpers the scroll
 * engine shares.
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Return false to give up immediately on this error */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Fraction of each delay added as random jitter, 0 disables */
  jitter?: number;
  wait?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Random value within [minMs, maxMs]
 */
export function randomBetween(minMs: number, maxMs: number, random: () => number = Math.random): number {
  return minMs + random() * Math.max(0, maxMs - minMs);
}

/**
 * Delay before the retry that follows `attempt` (1-based), capped at maxDelayMs
 */
export function backoffDelay(attempt: number, config: RetryConfig): number {
  return Math.min(config.initialDelayMs * config.factor ** (attempt - 1), config.maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { shouldRetry = () => true, jitter = 0, wait = sleep, random = Math.random, ...overrides } = options;
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...overrides };

  if (config.maxAttempts < 1) {
    throw new Error(`withRetry needs at least one attempt, got ${config.maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(failure, attempt)) {
        throw failure;
      }
      if (attempt >= config.maxAttempts) {
        if (config.maxAttempts > 1) {
          logger.error({ error: failure, attempt, maxAttempts: config.maxAttempts }, 'All retry attempts exhausted');
        }
        throw failure;
      }

      const base = backoffDelay(attempt, config);
      const delay = Math.round(base + base * jitter * random());
      logger.warn(
        { error: failure.message, attempt, maxAttempts: config.maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );
      await wait(delay);
    }
  }
}
