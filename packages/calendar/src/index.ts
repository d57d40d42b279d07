/**
 * @chronostamp/calendar — Calendar clients.
 *
 * HTTP client for remote calendars, the whitelist deciding which calendars
 * an untrusted proof may send us to, and M-of-N quorum submission.
 *
 * @packageDocumentation
 */

// Errors
export {
  CommitmentNotFoundError,
  CalendarUnreachableError,
  InvalidQuorumError,
} from "./errors.js";
export type { CalendarErrorCode } from "./errors.js";

// Remote calendar
export {
  RemoteCalendar,
  remoteCalendarFactory,
  sanitiseReason,
  CALENDAR_ACCEPT,
  MAX_RESPONSE_BYTES,
  MAX_REASON_LENGTH,
  DEFAULT_USER_AGENT,
} from "./remote-calendar.js";

// Whitelist
export {
  UrlWhitelist,
  DEFAULT_CALENDAR_WHITELIST,
  DEFAULT_CALENDAR_URLS,
} from "./whitelist.js";

// Quorum
export { ResultChannel, submitToQuorum } from "./quorum.js";

// Types
export type {
  Calendar,
  CalendarFactory,
  RemoteCalendarOptions,
  QuorumOptions,
  QuorumFailure,
  QuorumResult,
} from "./types.js";
