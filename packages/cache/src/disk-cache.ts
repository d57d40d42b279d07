/**
 * @chronostamp/cache — On-disk cache.
 *
 * One file per commitment, holding the serialized fragment rooted at it:
 *
 *   <dir>/<hex[0:2]>/<hex[2:4]>/<hex>
 *
 * Writes go to a temporary file that is renamed over the entry, so a crash
 * mid-write leaves the previous entry intact. An unreadable entry is
 * reported and treated as a miss; the next merge overwrites it.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { dirname, join } from "node:path";
import type { Logger } from "pino";
import {
  MalformedProofError,
  Timestamp,
  deserializeTimestamp,
  serializeTimestamp,
  toHex,
} from "@chronostamp/proof";
import { isCacheableLength, type TimestampCache } from "./types.js";

export interface DiskTimestampCacheOptions {
  /** Root directory of the cache */
  readonly dir: string;
  /** Receives a warning for corrupt entries */
  readonly logger?: Logger | undefined;
}

export class DiskTimestampCache implements TimestampCache {
  private readonly _dir: string;
  private readonly _logger: Logger | undefined;

  constructor(options: DiskTimestampCacheOptions) {
    this._dir = options.dir;
    this._logger = options.logger;
  }

  get dir(): string {
    return this._dir;
  }

  /** Path of the entry for `msg`. */
  pathFor(msg: Uint8Array): string {
    const hex = toHex(msg);
    return join(this._dir, hex.slice(0, 2), hex.slice(2, 4), hex);
  }

  get(msg: Uint8Array): Timestamp | undefined {
    if (!isCacheableLength(msg)) return undefined;

    const path = this.pathFor(msg);
    if (!existsSync(path)) return undefined;

    try {
      return deserializeTimestamp(new Uint8Array(readFileSync(path)), msg);
    } catch (err) {
      if (err instanceof MalformedProofError) {
        this._logger?.warn({ path, err: err.message }, "ignoring corrupt cache entry");
        return undefined;
      }
      throw err;
    }
  }

  merge(fragment: Timestamp): void {
    if (!isCacheableLength(fragment.msg)) return;

    const existing = this.get(fragment.msg) ?? new Timestamp(fragment.msg);
    existing.merge(fragment);
    if (existing.isEmpty()) return;

    const path = this.pathFor(fragment.msg);
    mkdirSync(dirname(path), { recursive: true });

    const tmp = `${path}.${process.pid}.tmp`;
    writeFileSync(tmp, serializeTimestamp(existing));
    renameSync(tmp, path);
  }
}
