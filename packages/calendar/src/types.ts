/**
 * @chronostamp/calendar — Types.
 */

import type { Timestamp } from "@chronostamp/proof";

// =============================================================================
// Calendar
// =============================================================================

/**
 * A remote notary that aggregates digests and later reports
 * blockchain-anchored attestations for them.
 */
export interface Calendar {
  /** Base URL, without a trailing slash */
  readonly url: string;

  /**
   * Submit a digest for aggregation.
   * Resolves to a fragment rooted at `digest`, usually holding a pending
   * attestation for this calendar.
   */
  submit(digest: Uint8Array, timeoutMs?: number): Promise<Timestamp>;

  /**
   * Fetch what the calendar currently knows about a commitment.
   *
   * @throws CommitmentNotFoundError when the calendar does not know it
   * @throws CalendarUnreachableError on transport failure
   */
  getTimestamp(commitment: Uint8Array, timeoutMs?: number): Promise<Timestamp>;
}

/** Builds a calendar client for a URL. */
export type CalendarFactory = (url: string) => Calendar;

// =============================================================================
// Configuration
// =============================================================================

export interface RemoteCalendarOptions {
  /** Default request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number | undefined;
  /** Value of the User-Agent header */
  readonly userAgent?: string | undefined;
  /** Custom fetch function (for testing or a proxying transport) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Quorum
// =============================================================================

export interface QuorumOptions {
  /** Minimum number of calendars that must answer (M) */
  readonly minResponses: number;
  /** Shared deadline for all calendars, in milliseconds */
  readonly timeoutMs: number;
  /** Clock (injectable for testing) */
  readonly now?: (() => number) | undefined;
}

export interface QuorumFailure {
  readonly url: string;
  readonly reason: string;
}

export interface QuorumResult {
  /** True when at least `required` fragments were merged */
  readonly ok: boolean;
  /** Number of fragments merged into the root */
  readonly merged: number;
  readonly required: number;
  /** Calendars that failed or did not answer before the deadline */
  readonly failures: readonly QuorumFailure[];
}
