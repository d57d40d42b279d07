/**
 * @chronostamp/calendar — Errors.
 *
 * Per-calendar failures are recoverable: callers log them and move on to
 * the next calendar. Only an invalid quorum is a configuration error.
 */

export type CalendarErrorCode =
  | "COMMITMENT_NOT_FOUND"
  | "CALENDAR_UNREACHABLE"
  | "INVALID_QUORUM";

/**
 * The calendar answered 404 for a commitment it does not know (yet).
 */
export class CommitmentNotFoundError extends Error {
  readonly code: CalendarErrorCode = "COMMITMENT_NOT_FOUND";

  constructor(
    /** Calendar that was asked */
    public readonly url: string,
    /** Sanitised reason sent by the calendar */
    public readonly reason: string,
  ) {
    super(`Commitment not found at ${url}: ${reason}`);
    this.name = "CommitmentNotFoundError";
  }
}

/**
 * Transport failure, timeout, oversized body or unexpected status.
 */
export class CalendarUnreachableError extends Error {
  readonly code: CalendarErrorCode = "CALENDAR_UNREACHABLE";

  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number | undefined,
  ) {
    super(message);
    this.name = "CalendarUnreachableError";
  }
}

export class InvalidQuorumError extends Error {
  readonly code: CalendarErrorCode = "INVALID_QUORUM";

  constructor(
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Quorum of ${required} is impossible with ${available} calendar${available === 1 ? "" : "s"}`,
    );
    this.name = "InvalidQuorumError";
  }
}
