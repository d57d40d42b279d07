/**
 * @chronostamp/proof — Detached timestamp files.
 *
 * A `.ots` file pairs the hash operation applied to the original file with
 * the proof DAG rooted at that file's digest. The file itself is not
 * included; verifying requires hashing it again.
 */

import { bytesEqual, fromHex, toHex } from "./bytes.js";
import { MalformedProofError } from "./errors.js";
import {
  DIGEST_LENGTHS,
  SHA256,
  hashBytes,
  isHashOp,
  type HashOp,
} from "./op.js";
import {
  ProofReader,
  ProofWriter,
  readOp,
  readTimestamp,
  writeOp,
  writeTimestamp,
} from "./serialize.js";
import { Timestamp } from "./timestamp.js";

export const HEADER_MAGIC = fromHex(
  "004f70656e54696d657374616d7073000050726f6f6600bf89e2e884e89294",
);

export const MAJOR_VERSION = 1;

export class DetachedTimestampFile {
  constructor(
    public readonly fileHashOp: HashOp,
    public readonly timestamp: Timestamp,
  ) {
    const expected = DIGEST_LENGTHS[fileHashOp.kind];
    if (timestamp.msg.length !== expected) {
      throw new RangeError(
        `${fileHashOp.kind} digest must be ${expected} bytes, got ${timestamp.msg.length}`,
      );
    }
  }

  /** Digest of the timestamped file. */
  get fileDigest(): Uint8Array {
    return this.timestamp.msg;
  }

  /**
   * Start a new (empty) proof for file content.
   */
  static fromContent(content: Uint8Array, fileHashOp: HashOp = SHA256): DetachedTimestampFile {
    return new DetachedTimestampFile(
      fileHashOp,
      new Timestamp(hashBytes(fileHashOp.kind, content)),
    );
  }

  /** True when `content` hashes to this file's digest. */
  matchesContent(content: Uint8Array): boolean {
    return bytesEqual(hashBytes(this.fileHashOp.kind, content), this.fileDigest);
  }

  serialize(): Uint8Array {
    const writer = new ProofWriter();
    writer.writeBytes(HEADER_MAGIC);
    writer.writeVaruint(MAJOR_VERSION);
    writeOp(writer, this.fileHashOp);
    writer.writeBytes(this.fileDigest);
    writeTimestamp(writer, this.timestamp);
    return writer.toBytes();
  }

  /**
   * @throws MalformedProofError for a bad magic, an unsupported version,
   *   a non-hash file operation, a malformed proof or trailing bytes
   */
  static deserialize(bytes: Uint8Array): DetachedTimestampFile {
    const reader = new ProofReader(bytes);

    const magic = reader.readBytes(Math.min(HEADER_MAGIC.length, reader.remaining));
    if (!bytesEqual(magic, HEADER_MAGIC)) {
      throw new MalformedProofError(
        "BAD_MAGIC",
        "Not a timestamp proof file (bad header magic)",
      );
    }

    const version = reader.readVaruint();
    if (version !== MAJOR_VERSION) {
      throw new MalformedProofError(
        "UNSUPPORTED_VERSION",
        `Unsupported proof file major version ${version}`,
      );
    }

    const op = readOp(reader);
    if (!isHashOp(op)) {
      throw new MalformedProofError(
        "MALFORMED_PROOF",
        `File hash operation must be a hash, got ${op.kind}`,
      );
    }

    const digest = reader.readBytes(DIGEST_LENGTHS[op.kind]);
    const timestamp = readTimestamp(reader, digest);
    reader.assertEof();
    return new DetachedTimestampFile(op, timestamp);
  }

  toString(): string {
    return `${this.fileHashOp.kind} ${toHex(this.fileDigest)}`;
  }
}
