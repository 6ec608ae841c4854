/**
 * Retry Loop with Per-Failure-Kind Backoff
 *
 * Timeouts and other failures follow separate policies: a timed-out attempt
 * is retried at once, any other failure waits a fixed backoff first. Once
 * the attempts are exhausted the loop resolves to null instead of throwing.
 */

import { classifyFetchFailure, type FailureKind } from '../types/errors.js';
import { TIMEOUTS, sleep as defaultSleep } from './timeouts.js';

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Number of retries after the first attempt.
   * retries: 0 = a single attempt, retries: 2 = up to 3 attempts.
   */
  retries: number;

  /**
   * Delay before the next attempt when an attempt timed out.
   * @default 0
   */
  timeoutBackoffMs?: number;

  /**
   * Delay before the next attempt after any other failure.
   * @default 1000
   */
  errorBackoffMs?: number;

  /**
   * Invoked for every failed attempt, the last one included.
   */
  onFailure?: (failure: AttemptFailure) => void;

  /**
   * Timer used between attempts
   */
  sleep?: (ms: number) => Promise<void>;
}

export interface AttemptFailure {
  attempt: number;
  maxAttempts: number;
  kind: FailureKind;
  error: unknown;
  /** True when no further attempt follows */
  final: boolean;
}

/**
 * Run `fn` up to `retries + 1` times, passing the 1-based attempt number.
 * Resolves to the first successful result, or null when every attempt failed.
 * Rejects with a RangeError when `retries` is not a non-negative integer.
 */
export async function retryAttempts<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T | null> {
  if (!Number.isInteger(options.retries) || options.retries < 0) {
    throw new RangeError(`retries must be a non-negative integer, got ${options.retries}`);
  }

  const maxAttempts = options.retries + 1;
  const timeoutBackoffMs = options.timeoutBackoffMs ?? 0;
  const errorBackoffMs = options.errorBackoffMs ?? TIMEOUTS.RETRY_BACKOFF;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const kind = classifyFetchFailure(error);
      const final = attempt === maxAttempts;

      options.onFailure?.({ attempt, maxAttempts, kind, error, final });

      if (final) {
        return null;
      }

      const delay = kind === 'timeout' ? timeoutBackoffMs : errorBackoffMs;
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  return null;
}
