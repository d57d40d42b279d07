/**
 * @chronostamp/cache — Commitment cache.
 *
 * Remembers the best known proof fragment per commitment so upgrades can
 * skip calendar round-trips for work already done.
 *
 * @packageDocumentation
 */

// Types
export {
  MIN_CACHED_MSG_LENGTH,
  MAX_CACHED_MSG_LENGTH,
  isCacheableLength,
} from "./types.js";
export type { TimestampCache } from "./types.js";

// Implementations
export { InMemoryTimestampCache } from "./in-memory-cache.js";
export { DiskTimestampCache } from "./disk-cache.js";
export type { DiskTimestampCacheOptions } from "./disk-cache.js";
