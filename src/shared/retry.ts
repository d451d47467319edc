import type { Config } from './config.js';
import { SourceCycleFailed, TransientFetchError } from './errors.js';
import { logger } from './logger.js';
import { sleep } from './utils.js';

/**
 * Retry and pacing rules for one crawl. Passed into fetchers rather than read from
 * ambient state so that tests can run with {@link ZERO_DELAY_POLICY}.
 */
export interface RetryPolicy {
  /** Total attempts per request, including the first. */
  maxAttempts: number;
  /** Wait before the first retry. */
  delayMs: number;
  /** Multiplier applied to the wait after each failed retry. */
  backoffFactor: number;
  /** Upper bound of random extra wait added to each retry delay. */
  jitterMs: number;
  /** Pause between successive page fetches of the same source. */
  interRequestMs: number;
}

export const ZERO_DELAY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 0,
  backoffFactor: 1,
  jitterMs: 0,
  interRequestMs: 0,
};

export function retryPolicyFromConfig(
  crawl: Config['crawl'],
  overrides: { sleepMs?: number } = {},
): RetryPolicy {
  return {
    maxAttempts: crawl.max_retries,
    delayMs: crawl.backoff_ms,
    backoffFactor: crawl.backoff_factor,
    jitterMs: crawl.jitter_ms,
    interRequestMs: overrides.sleepMs ?? crawl.sleep_ms,
  };
}

export function retryDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const base = policy.delayMs * Math.pow(policy.backoffFactor, Math.max(0, attempt - 1));
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return base + jitter;
}

/**
 * Run `fn`, retrying on {@link TransientFetchError} until the policy's attempts are spent.
 * Exhaustion is reported as {@link SourceCycleFailed}; any other error passes through untouched.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  label: string,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  let lastError: TransientFetchError | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof TransientFetchError)) throw err;
      lastError = err;
      if (attempt < policy.maxAttempts) {
        const wait = retryDelay(policy, attempt);
        logger.warn(
          { target: label, attempt, maxAttempts: policy.maxAttempts, waitMs: wait, error: err.message },
          'Transient fetch error, backing off',
        );
        await sleep(wait);
      }
    }
  }

  throw new SourceCycleFailed(
    `Gave up on ${label} after ${policy.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
    { target: label, attempts: policy.maxAttempts, ...(lastError?.details ?? {}) },
  );
}
