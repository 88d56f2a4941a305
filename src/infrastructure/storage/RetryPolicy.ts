/**
 * Retryable storage operations
 *
 * Every shard command runs through `withRetry`: bounded attempts, each
 * raced against a timeout, with exponential backoff between attempts.
 *
 * @module infrastructure/storage/RetryPolicy
 */

import { sleep, withTimeout } from '../../utils/timeout.js';

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each attempt after */
  baseDelayMs: number;
  /** Upper bound on a single backoff delay */
  maxDelayMs: number;
  /** Deadline for a single attempt */
  timeoutMs: number;
}

export interface RetryHooks {
  /** Called after a failed attempt that will be retried */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Aborting stops further attempts */
  signal?: AbortSignal;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Operation failed after ${attempts} attempt(s): ${reason}`);
    this.name = 'RetryExhaustedError';
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds or the attempts run out.
 * @throws RetryExhaustedError carrying the last failure
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  label: string,
  hooks: RetryHooks = {}
): Promise<T> {
  let lastError: unknown;
  let attempt = 0;

  while (attempt < policy.maxAttempts) {
    attempt++;
    try {
      return await withTimeout(operation(), policy.timeoutMs, label);
    } catch (error) {
      lastError = error;
    }

    if (attempt >= policy.maxAttempts || hooks.signal?.aborted) {
      break;
    }

    const delayMs = backoffDelay(policy, attempt);
    hooks.onRetry?.(attempt, lastError, delayMs);
    await sleep(delayMs, hooks.signal);
  }

  throw new RetryExhaustedError(attempt, lastError);
}
