/**
 * Retry tests
 *
 * Verifies:
 * - Transient failures are retried on the pause schedule
 * - Deliberate answers (404, RPC errors) are not
 * - Retry-After stretches a pause up to the cap
 * - The last error comes back unchanged when the pauses run out
 */

import { describe, it, expect, vi } from "vitest";
import { ChainHttpError, RpcError } from "../src/errors.js";
import {
  DEFAULT_RETRY_POLICY,
  isTransientFailure,
  parseRetryAfter,
  retryTransient,
} from "../src/retry.js";

const QUERY_URL = "https://esplora.example/api/block-height/1";

function failingThen<T>(errors: unknown[], value: T): () => Promise<T> {
  let calls = 0;
  return vi.fn(async () => {
    const err = errors[calls];
    calls += 1;
    if (err !== undefined) throw err;
    return value;
  });
}

describe("isTransientFailure", () => {
  it.each([
    ["a dropped connection", new TypeError("fetch failed"), true],
    ["a timeout", Object.assign(new Error("timed out"), { name: "TimeoutError" }), true],
    ["HTTP 503", new ChainHttpError(QUERY_URL, 503), true],
    ["HTTP 429", new ChainHttpError(QUERY_URL, 429), true],
    ["HTTP 404", new ChainHttpError(QUERY_URL, 404), false],
    ["an RPC error", new RpcError(-8, "Block height out of range"), false],
  ])("classifies %s", (_label, err, expected) => {
    expect(isTransientFailure(err)).toBe(expected);
  });
});

describe("parseRetryAfter", () => {
  it("reads delta seconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
  });

  it("ignores dates and missing headers", () => {
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:00 GMT")).toBeUndefined();
    expect(parseRetryAfter(null)).toBeUndefined();
  });
});

describe("retryTransient", () => {
  it("retries a dropped connection and returns the answer", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const query = failingThen([new TypeError("fetch failed")], "ok");

    expect(await retryTransient(query, DEFAULT_RETRY_POLICY, sleepFn)).toBe("ok");
    expect(query).toHaveBeenCalledTimes(2);
    expect(sleepFn).toHaveBeenCalledWith(500);
  });

  it("rethrows the last error once the pauses run out", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const last = new ChainHttpError(QUERY_URL, 502);
    const query = failingThen([new ChainHttpError(QUERY_URL, 503), new ChainHttpError(QUERY_URL, 503), last], "ok");

    await expect(retryTransient(query, DEFAULT_RETRY_POLICY, sleepFn)).rejects.toBe(last);
    expect(sleepFn.mock.calls).toEqual([[500], [2000]]);
  });

  it("does not retry a 404", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const query = failingThen([new ChainHttpError(QUERY_URL, 404)], "ok");

    await expect(retryTransient(query, DEFAULT_RETRY_POLICY, sleepFn)).rejects.toBeInstanceOf(
      ChainHttpError,
    );
    expect(query).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("waits as long as Retry-After asks, up to the cap", async () => {
    const sleepFn = vi.fn(async (_ms: number) => {});
    const query = failingThen(
      [new ChainHttpError(QUERY_URL, 429, 3000), new ChainHttpError(QUERY_URL, 429, 60_000)],
      "ok",
    );

    expect(await retryTransient(query, DEFAULT_RETRY_POLICY, sleepFn)).toBe("ok");
    expect(sleepFn.mock.calls).toEqual([[3000], [10_000]]);
  });
});
