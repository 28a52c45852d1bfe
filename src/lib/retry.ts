/**
 * Retry policy for network operations
 *
 * Fetch and publish both retry through `withRetry`, driven by an explicit
 * policy object (attempt budget, exponential schedule, retryable-error
 * predicate) so the schedule can be tested without the network.
 */

import { isAbortError, isRetryable } from './errors.js';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_RETRY_DELAY_MS,
  DEFAULT_RETRY_DELAY_MS,
} from './constants.js';

/** Retry policy */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the first retry in ms */
  baseDelayMs: number;
  /** Multiplier applied per retry */
  factor: number;
  /** Cap for a single delay */
  maxDelayMs: number;
  /** Whether a failure should be retried */
  isRetryable: (error: unknown) => boolean;
}

/** Information passed to `onRetry` before sleeping */
export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/** Options for a single `withRetry` call */
export interface RetryOptions {
  signal?: AbortSignal | undefined;
  onRetry?: ((event: RetryEvent) => void) | undefined;
  /** Replaceable sleep, used by tests to skip real delays */
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

/**
 * Create a retry policy with defaults for unspecified fields
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    factor: overrides.factor ?? 2,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS,
    isRetryable: overrides.isRetryable ?? isRetryable,
  };
}

/**
 * Delay before retry number `attempt` (1-based: the delay after the first failure is attempt 1)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * the attempt budget is spent. The last error is rethrown.
 *
 * @example
 * ```typescript
 * const head = await withRetry(policy, () => fetch(url, { method: 'HEAD' }), {
 *   onRetry: ({ attempt, error }) => log.warn('HEAD failed', { attempt, error }),
 * });
 * ```
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, onRetry, sleep = defaultSleep } = options;
  let attempt = 1;

  while (true) {
    throwIfAborted(signal);

    try {
      return await operation(attempt);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(policy, attempt);
      onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
      attempt++;
    }
  }
}

/**
 * Throw an AbortError if the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new DOMException('Operation aborted', 'AbortError');
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
