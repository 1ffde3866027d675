/**
 * Bounded retry policies.
 *
 * A policy is a plain object (max attempts + delay function + optional
 * wall-clock budget). `runWithRetry` applies it to an operation and
 * returns a typed result instead of throwing, so call sites branch on
 * `ok` / `retryable` rather than on caught exceptions.
 */

import { logger } from './logger.js';
import { DeliveryError, GatewayTransientError, errorMessage } from '../core/errors.js';

export interface RetryPolicy {
  name: string;
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the 1-based attempt that just failed */
  delayMs(attempt: number): number;
  /** Total time allowed for waiting between attempts */
  budgetMs?: number;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number; retryable: boolean };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Same short wait between every attempt (content fetch) */
export function fixedDelay(name: string, maxAttempts: number, delayMs: number): RetryPolicy {
  return { name, maxAttempts, delayMs: () => delayMs };
}

/** baseMs, 2·baseMs, 4·baseMs … bounded by a total budget (gateway send) */
export function exponentialBackoff(name: string, maxAttempts: number, baseMs: number, budgetMs?: number): RetryPolicy {
  return {
    name,
    maxAttempts,
    budgetMs,
    delayMs: (attempt) => baseMs * 2 ** (attempt - 1),
  };
}

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    function onAbort(): void {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error('Aborted'));
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });

function isRetryable(err: unknown): boolean {
  // Anything outside the taxonomy is an unexpected fault: treat as transient
  return err instanceof DeliveryError ? err.retryable : true;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run `op` until it succeeds, fails permanently, runs out of attempts,
 * exhausts the budget, or `signal` aborts.
 *
 * A `retryAfterMs` hint on the error raises the next delay to at least
 * that value.
 */
export async function runWithRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: { sleep?: Sleep; signal?: AbortSignal; context?: Record<string, unknown> } = {},
): Promise<RetryResult<T>> {
  const wait = opts.sleep ?? sleep;
  let waited = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await op(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      const error = toError(err);
      const retryable = isRetryable(err);

      if (!retryable || opts.signal?.aborted) {
        return { ok: false, error, attempts: attempt, retryable };
      }
      if (attempt >= policy.maxAttempts) {
        logger.warn({ ...opts.context, policy: policy.name, attempts: attempt, err: errorMessage(err) }, 'Retries exhausted');
        return { ok: false, error, attempts: attempt, retryable };
      }

      const hint = err instanceof GatewayTransientError ? err.retryAfterMs ?? 0 : 0;
      const delay = Math.max(policy.delayMs(attempt), hint);

      if (policy.budgetMs !== undefined && waited + delay > policy.budgetMs) {
        logger.warn({ ...opts.context, policy: policy.name, attempts: attempt, waited, budgetMs: policy.budgetMs }, 'Retry budget exhausted');
        return { ok: false, error, attempts: attempt, retryable };
      }

      logger.debug({ ...opts.context, policy: policy.name, attempt, retryIn: delay, err: errorMessage(err) }, 'Attempt failed, retrying');
      try {
        await wait(delay, opts.signal);
      } catch {
        return { ok: false, error, attempts: attempt, retryable };
      }
      waited += delay;
    }
  }
}
