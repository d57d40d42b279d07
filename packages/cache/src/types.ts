/**
 * @chronostamp/cache — Types.
 */

import type { Timestamp } from "@chronostamp/proof";

/** Shortest commitment worth caching (a sha1/ripemd160 digest). */
export const MIN_CACHED_MSG_LENGTH = 20;

/** Longest commitment worth caching. */
export const MAX_CACHED_MSG_LENGTH = 64;

/**
 * Commitment → best known proof fragment.
 *
 * `get` never touches the network and never throws for a missing entry.
 * `merge` folds a fragment into whatever is already stored under its
 * message; entries only ever gain attestations.
 */
export interface TimestampCache {
  get(msg: Uint8Array): Timestamp | undefined;
  merge(fragment: Timestamp): void;
}

export function isCacheableLength(msg: Uint8Array): boolean {
  return msg.length >= MIN_CACHED_MSG_LENGTH && msg.length <= MAX_CACHED_MSG_LENGTH;
}
