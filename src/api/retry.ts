import type { RetryPolicy } from '../config/pipeline.js';
import { logger } from '../config/logger.js';
import { RetryExhaustedError, TransientGatewayError } from '../errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Run `fn` up to `policy.maxAttempts` times, backing off exponentially between
 * transient failures. Any other error is rethrown immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  wait: Sleep = sleep
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof TransientGatewayError)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delay = backoffDelay(attempt, policy);
      logger.warn('Transient gateway failure, retrying', {
        gateway: error.gateway,
        attempt,
        maxAttempts,
        delay,
        error: error.message,
      });
      await wait(delay);
    }
  }
}
