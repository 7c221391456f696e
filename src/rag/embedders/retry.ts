import { setTimeout as sleep } from 'node:timers/promises';
import type { RetryConfig } from '../../types/config.types.js';
import { EmbeddingUnavailableError } from '../../errors/embedding.js';

export interface RetryOptions extends RetryConfig {
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 250,
  backoffMultiplier: 2,
  maxDelayMs: 4000,
};

/** Delay before retry number `attempt` (0-based), capped at `maxDelayMs`. */
export function retryDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

const isEmbeddingUnavailable = (err: unknown): boolean => err instanceof EmbeddingUnavailableError;

/**
 * Run `fn`, retrying up to `maxRetries` times with exponential backoff while
 * the failure is retryable. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isEmbeddingUnavailable;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= options.maxRetries || !isRetryable(err)) throw err;
      const delayMs = retryDelay(attempt, options);
      options.onRetry?.(err, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
