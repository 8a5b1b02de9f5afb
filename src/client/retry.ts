/**
 * Retry with exponential backoff around one file's annotation call.
 *
 * A retry re-sends the whole batch for that file; retries never span files.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  RetriesExhausted,
  RunCancelledError,
  ThrottledFailure,
  TransientFailure,
  isRetryable,
} from '../utils/errors.ts';

/** Backoff bounds in milliseconds. */
export interface BackoffPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/** 2s, 4s, 8s, ... capped at one minute. */
export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 2000,
  maxDelayMs: 60_000,
};

/** Waits `ms`, rejecting with RunCancelledError if `signal` fires first. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Details of a failed attempt that will be retried. */
export interface RetryNotice {
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: TransientFailure | ThrottledFailure;
}

export interface RetryOptions {
  /** Extra attempts after the first one. */
  readonly maxRetries: number;
  readonly policy?: BackoffPolicy;
  readonly sleep?: Sleep;
  readonly signal?: AbortSignal;
  readonly onRetry?: (notice: RetryNotice) => void;
}

/** Timer-based sleep that honours an abort signal. */
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    throw error;
  }
};

/**
 * Delay before the attempt following failed attempt number `attempt` (1-based).
 *
 * `baseDelayMs * 2^(attempt-1)`, raised to a throttled response's Retry-After,
 * never above `maxDelayMs`.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  retryAfterMs?: number,
): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const requested = Math.max(exponential, retryAfterMs ?? 0);
  return Math.min(requested, policy.maxDelayMs);
}

/**
 * Runs `operation` up to `maxRetries + 1` times.
 *
 * Transient and throttled failures are retried after a backoff delay.
 * Anything else propagates at once.
 *
 * @param operation - Called with the 1-based attempt number
 * @returns The first successful result
 * @throws RetriesExhausted after the last retryable failure
 */
export async function invokeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = options.maxRetries + 1;
  const policy = options.policy ?? DEFAULT_BACKOFF;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetriesExhausted(maxAttempts, error);
      }

      const retryAfterMs = error instanceof ThrottledFailure ? error.retryAfterMs : undefined;
      const delayMs = computeBackoffDelay(attempt, policy, retryAfterMs);
      options.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await wait(delayMs, options.signal);
    }
  }
}
