/**
 * @chronostamp/calendar — Quorum submission.
 *
 * A new root digest is sent to N calendars at once. Each worker pushes its
 * outcome onto a shared channel; the coordinator receives at most N times,
 * each receive bounded by what is left of one deadline. Every valid
 * fragment is merged into the root. Workers still running at the deadline
 * are abandoned and whatever they produce later is dropped.
 */

import type { Logger } from "pino";
import type { Timestamp } from "@chronostamp/proof";
import { InvalidQuorumError } from "./errors.js";
import type { Calendar, QuorumFailure, QuorumOptions, QuorumResult } from "./types.js";

// =============================================================================
// Result channel
// =============================================================================

/**
 * Unbounded FIFO with a bounded-wait receive.
 */
export class ResultChannel<T> {
  private readonly buffered: T[] = [];
  private readonly waiting: ((value: T) => void)[] = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    const next = this.waiting.shift();
    if (next !== undefined) {
      next(value);
    } else {
      this.buffered.push(value);
    }
  }

  /**
   * Resolve with the next value, or undefined once `timeoutMs` passes.
   */
  receive(timeoutMs: number): Promise<T | undefined> {
    if (this.buffered.length > 0) {
      return Promise.resolve(this.buffered.shift());
    }
    if (this.closed || timeoutMs <= 0) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      const deliver = (value: T): void => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        const index = this.waiting.indexOf(deliver);
        if (index >= 0) this.waiting.splice(index, 1);
        resolve(undefined);
      }, timeoutMs);
      this.waiting.push(deliver);
    });
  }

  /** Drop buffered values and ignore later pushes. */
  close(): void {
    this.closed = true;
    this.buffered.length = 0;
  }
}

// =============================================================================
// Quorum
// =============================================================================

type Outcome =
  | { readonly url: string; readonly stamp: Timestamp }
  | { readonly url: string; readonly error: unknown };

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Submit `root.msg` to every calendar and merge the answers into `root`.
 *
 * @throws InvalidQuorumError unless 1 <= minResponses <= calendars.length
 */
export async function submitToQuorum(
  root: Timestamp,
  calendars: readonly Calendar[],
  options: QuorumOptions,
  logger: Logger,
): Promise<QuorumResult> {
  const required = options.minResponses;
  if (!Number.isInteger(required) || required < 1 || required > calendars.length) {
    throw new InvalidQuorumError(required, calendars.length);
  }

  const now = options.now ?? Date.now;
  const start = now();
  const channel = new ResultChannel<Outcome>();

  for (const calendar of calendars) {
    logger.debug({ calendar: calendar.url }, "submitting to calendar");
    void calendar.submit(root.msg, options.timeoutMs).then(
      (stamp) => channel.push({ url: calendar.url, stamp }),
      (error: unknown) => channel.push({ url: calendar.url, error }),
    );
  }

  const failures: QuorumFailure[] = [];
  const answered = new Set<string>();
  let merged = 0;

  for (let i = 0; i < calendars.length; i++) {
    const remaining = Math.max(0, options.timeoutMs - (now() - start));
    // A zero-wait retry picks up answers that landed as the deadline passed.
    const outcome = (await channel.receive(remaining)) ?? (await channel.receive(0));
    if (outcome === undefined) break;
    answered.add(outcome.url);

    if ("error" in outcome) {
      logger.debug({ calendar: outcome.url, err: reasonOf(outcome.error) }, "calendar failed");
      failures.push({ url: outcome.url, reason: reasonOf(outcome.error) });
      continue;
    }

    try {
      root.merge(outcome.stamp);
      merged += 1;
    } catch (error) {
      logger.debug({ calendar: outcome.url, err: reasonOf(error) }, "calendar response rejected");
      failures.push({ url: outcome.url, reason: reasonOf(error) });
    }
  }
  channel.close();

  for (const calendar of calendars) {
    if (!answered.has(calendar.url)) {
      failures.push({ url: calendar.url, reason: "no response before deadline" });
    }
  }

  logger.debug({ elapsedMs: now() - start, merged, required }, "quorum submission finished");
  return { ok: merged >= required, merged, required, failures };
}
