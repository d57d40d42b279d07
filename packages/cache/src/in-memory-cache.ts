/**
 * @chronostamp/cache — In-memory cache.
 *
 * Used when the disk cache is disabled and in tests. Entries live as long
 * as the instance; fragments are cloned on the way in and out so callers
 * cannot mutate cached state by accident.
 */

import { Timestamp, toHex } from "@chronostamp/proof";
import { isCacheableLength, type TimestampCache } from "./types.js";

export class InMemoryTimestampCache implements TimestampCache {
  private readonly _entries = new Map<string, Timestamp>();

  get size(): number {
    return this._entries.size;
  }

  get(msg: Uint8Array): Timestamp | undefined {
    return this._entries.get(toHex(msg))?.clone();
  }

  merge(fragment: Timestamp): void {
    if (!isCacheableLength(fragment.msg)) return;

    const key = toHex(fragment.msg);
    const existing = this._entries.get(key) ?? new Timestamp(fragment.msg);
    existing.merge(fragment);
    this._entries.set(key, existing.clone());
  }

  clear(): void {
    this._entries.clear();
  }
}
