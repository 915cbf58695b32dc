/**
 * Retry with a fixed pause
 *
 * Downloads wait the same initialDelayMs between attempts (factor 1). A
 * caller may pass a larger factor to grow the pause up to maxDelayMs. The
 * 1-based attempt number is passed to fn, and the last error is rethrown
 * once maxAttempts is spent.
 */

import type { RetryConfig } from '../types/index.js';
import { toError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  factor: 1,
};

/**
 * Run fn until it resolves or maxAttempts is reached
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  logger: Logger = defaultLogger
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (attempt === maxAttempts) {
        logger.error({ error: lastError.message, attempt, maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger.warn(
        { error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  // maxAttempts < 1
  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
