import { setTimeout as delay } from 'timers/promises';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

/**
 * Exponential backoff settings for remote calls
 */
export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  /** Name used in log lines, e.g. "translate" */
  label: string;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Source of jitter in [0, 1) */
  random?: () => number;
}

/**
 * Delay before retry number `attempt` (0-based).
 * The exponential delay is capped first, then jittered into [cap/2, cap].
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** attempt;
  const capped = Math.min(policy.maxDelayMs, exponential);
  return Math.round(capped / 2 + random() * (capped / 2));
}

/**
 * Run `operation`, retrying every failure under the backoff policy.
 * Rethrows the last error once the retries are used up.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const random = options.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxRetries) {
        options.logger.error(`${options.label} failed after ${attempt + 1} attempts: ${errorMessage(error)}`);
        throw error;
      }

      const wait = backoffDelay(policy, attempt, random);
      options.logger.warn(
        `${options.label} failed (attempt ${attempt + 1}/${policy.maxRetries + 1}), retrying in ${wait}ms: ${errorMessage(error)}`
      );
      await sleep(wait);
    }
  }
}
