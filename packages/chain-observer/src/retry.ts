/**
 * Retrying chain queries.
 *
 * A node or explorer that drops the connection, times out, answers 5xx or
 * rate-limits us with 429 is asked again after the next pause in
 * `delaysMs`. A Retry-After header can stretch that pause up to
 * `maxDelayMs`. Answers the remote side gave on purpose (404, RPC errors,
 * bad credentials) go straight back to the caller.
 */

import { ChainHttpError } from "./errors.js";

export interface RetryPolicy {
  /** Pause before each retry; one retry per entry. Default: [500, 2000] */
  readonly delaysMs: readonly number[];
  /** Upper bound on a pause stretched by Retry-After. Default: 10000 */
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  delaysMs: [500, 2000],
  maxDelayMs: 10_000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry-After in milliseconds. Only the delta-seconds form is understood;
 * HTTP dates are ignored.
 */
export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) return undefined;
  return Number(header.trim()) * 1000;
}

export function isTransientFailure(err: unknown): boolean {
  if (err instanceof ChainHttpError) return err.status === 429 || err.status >= 500;
  // fetch rejects with TypeError when the connection fails
  if (err instanceof TypeError) return true;
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function pauseBefore(err: unknown, delayMs: number, policy: RetryPolicy): number {
  if (err instanceof ChainHttpError && err.retryAfterMs !== undefined) {
    return Math.min(Math.max(delayMs, err.retryAfterMs), policy.maxDelayMs);
  }
  return delayMs;
}

/**
 * Run `query`, retrying transient failures per `policy`. The last error is
 * rethrown unchanged once the pauses run out.
 */
export async function retryTransient<T>(
  query: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await query();
    } catch (err: unknown) {
      const delayMs = policy.delaysMs[attempt];
      if (delayMs === undefined || !isTransientFailure(err)) throw err;
      await sleepFn(pauseBefore(err, delayMs, policy));
    }
  }
}
