/**
 * Retry Service
 *
 * The chat client never retries on its own; callers that want another
 * attempt wrap the call here. Exponential backoff: 1s, 2s, 4s, ... max 60s.
 */

import { isRetryableError, errorMessage } from './errors.js';
import { defaultLogger, Logger } from './logger.js';

export interface RetryConfig {
  /** Attempts after the first one */
  maxRetries: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  backoffMultiplier: number;
  shouldRetry: (error: unknown) => boolean;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const DEFAULT_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialRetryDelayMs: 1000,
  maxRetryDelayMs: 60000,
  backoffMultiplier: 2,
  shouldRetry: isRetryableError,
  sleep,
  logger: defaultLogger,
};

/**
 * Delay before retry number `retryCount` (0-based)
 */
export function calculateBackoffDelay(
  retryCount: number,
  config: Pick<RetryConfig, 'initialRetryDelayMs' | 'backoffMultiplier' | 'maxRetryDelayMs'> = DEFAULT_CONFIG
): number {
  const delay = config.initialRetryDelayMs * Math.pow(config.backoffMultiplier, retryCount);
  return Math.min(delay, config.maxRetryDelayMs);
}

/**
 * Run `operation`, retrying failures that `shouldRetry` accepts
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryConfig> = {}
): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_CONFIG, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= config.maxRetries || !config.shouldRetry(error)) {
        throw error;
      }
      const delayMs = calculateBackoffDelay(attempt, config);
      config.logger.warn('Attempt failed, retrying', {
        attempt: attempt + 1,
        maxRetries: config.maxRetries,
        delayMs,
        error: errorMessage(error),
      });
      await config.sleep(delayMs);
    }
  }
}
