/**
 * @chronostamp/proof — Binary codec.
 *
 * Wire format of proof fragments, shared with calendars and `.ots` files:
 *
 *   varuint    base-128, least significant group first, 0x80 = continue
 *   varbytes   varuint length + bytes
 *   op         tag byte [+ varbytes arg for append/prepend]
 *   attest.    8-byte tag + varbytes payload
 *   timestamp  entries separated by 0xff; 0x00 + attestation | op + child
 *
 * Every decode error is a MalformedProofError. Encoding is canonical:
 * attestations then operations, each in sorted order, so equal DAGs encode
 * to identical bytes.
 */

import {
  ATTESTATION_TAG_LENGTH,
  MAX_URI_LENGTH,
  PENDING_TAG,
  attestationTag,
  blockHeader,
  chainForTag,
  checkPendingUri,
  unknownAttestation,
  type Attestation,
} from "./attestation.js";
import { bytesEqual, toHex } from "./bytes.js";
import { MalformedProofError } from "./errors.js";
import {
  MAX_RESULT_LENGTH,
  OP_TAGS,
  applyOp,
  isBinaryOp,
  opKindForTag,
  type Op,
} from "./op.js";
import { Timestamp } from "./timestamp.js";

// =============================================================================
// Limits
// =============================================================================

export const MAX_PAYLOAD_LENGTH = 8192;

export const MAX_RECURSION_DEPTH = 256;

const ENTRY_SEPARATOR = 0xff;
const ATTESTATION_MARKER = 0x00;

// Ten groups cover 64 bits; longer encodings are padding.
const MAX_VARUINT_SHIFT = 63;


// =============================================================================
// Writer
// =============================================================================

export class ProofWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  writeBytes(bytes: Uint8Array): void {
    this.chunks.push(Uint8Array.from(bytes));
    this.length += bytes.length;
  }

  writeByte(value: number): void {
    this.writeBytes(Uint8Array.of(value & 0xff));
  }

  writeVaruint(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`varuint must be a non-negative safe integer, got ${value}`);
    }
    const out: number[] = [];
    let rest = value;
    do {
      let group = rest % 128;
      rest = Math.floor(rest / 128);
      if (rest > 0) group |= 0x80;
      out.push(group);
    } while (rest > 0);
    this.writeBytes(Uint8Array.from(out));
  }

  writeVarbytes(bytes: Uint8Array): void {
    this.writeVaruint(bytes.length);
    this.writeBytes(bytes);
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

// =============================================================================
// Reader
// =============================================================================

export class ProofReader {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  readBytes(count: number): Uint8Array {
    if (count > this.remaining) {
      throw new MalformedProofError(
        "MALFORMED_PROOF",
        `Truncated input: wanted ${count} bytes at offset ${this.offset}, ${this.remaining} left`,
      );
    }
    const out = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  readByte(): number {
    const [value] = this.readBytes(1);
    if (value === undefined) {
      throw new MalformedProofError("MALFORMED_PROOF", "Truncated input");
    }
    return value;
  }

  readVaruint(): number {
    let value = 0;
    let shift = 0;
    for (;;) {
      const byte = this.readByte();
      value += (byte & 0x7f) * 2 ** shift;
      if (value > Number.MAX_SAFE_INTEGER) {
        throw new MalformedProofError("MALFORMED_PROOF", "varuint exceeds safe integer range");
      }
      if ((byte & 0x80) === 0) return value;
      shift += 7;
      if (shift > MAX_VARUINT_SHIFT) {
        throw new MalformedProofError("MALFORMED_PROOF", "varuint too long");
      }
    }
  }

  readVarbytes(maxLength: number, minLength = 0): Uint8Array {
    const length = this.readVaruint();
    if (length > maxLength) {
      throw new MalformedProofError(
        "MALFORMED_PROOF",
        `varbytes length ${length} exceeds limit ${maxLength}`,
      );
    }
    if (length < minLength) {
      throw new MalformedProofError(
        "MALFORMED_PROOF",
        `varbytes length ${length} below minimum ${minLength}`,
      );
    }
    return this.readBytes(length);
  }

  /** @throws MalformedProofError if unread bytes remain */
  assertEof(): void {
    if (this.remaining !== 0) {
      throw new MalformedProofError(
        "TRAILING_GARBAGE",
        `${this.remaining} unexpected trailing bytes`,
      );
    }
  }
}

// =============================================================================
// Operations
// =============================================================================

export function writeOp(writer: ProofWriter, op: Op): void {
  writer.writeByte(OP_TAGS[op.kind]);
  if (isBinaryOp(op)) writer.writeVarbytes(op.arg);
}

export function readOpWithTag(reader: ProofReader, tag: number): Op {
  const kind = opKindForTag(tag);
  switch (kind) {
    case undefined:
      throw new MalformedProofError(
        "MALFORMED_PROOF",
        `Unknown operation tag 0x${tag.toString(16).padStart(2, "0")}`,
      );
    case "append":
    case "prepend":
      return { kind, arg: reader.readVarbytes(MAX_RESULT_LENGTH, 1) };
    default:
      return { kind };
  }
}

export function readOp(reader: ProofReader): Op {
  return readOpWithTag(reader, reader.readByte());
}

// =============================================================================
// Attestations
// =============================================================================

function encodePayload(attestation: Attestation): Uint8Array {
  const payload = new ProofWriter();
  switch (attestation.kind) {
    case "pending":
      payload.writeVarbytes(new TextEncoder().encode(attestation.uri));
      break;
    case "block-header":
      payload.writeVaruint(attestation.height);
      break;
    case "unknown":
      payload.writeBytes(attestation.payload);
      break;
  }
  return payload.toBytes();
}

export function writeAttestation(writer: ProofWriter, attestation: Attestation): void {
  writer.writeBytes(attestationTag(attestation));
  writer.writeVarbytes(encodePayload(attestation));
}

export function readAttestation(reader: ProofReader): Attestation {
  const tag = reader.readBytes(ATTESTATION_TAG_LENGTH);
  const payloadBytes = reader.readVarbytes(MAX_PAYLOAD_LENGTH);
  const payload = new ProofReader(payloadBytes);

  let attestation: Attestation;
  if (bytesEqual(tag, PENDING_TAG)) {
    const uriBytes = payload.readVarbytes(MAX_URI_LENGTH);
    const uri = decodeUri(uriBytes);
    attestation = { kind: "pending", uri };
  } else {
    const chain = chainForTag(tag);
    if (chain !== undefined) {
      const height = payload.readVaruint();
      try {
        attestation = blockHeader(chain, height);
      } catch (err) {
        throw new MalformedProofError(
          "MALFORMED_PROOF",
          `Invalid block header attestation: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    } else {
      return unknownAttestation(tag, payloadBytes);
    }
  }

  payload.assertEof();
  return attestation;
}

function decodeUri(bytes: Uint8Array): string {
  let uri: string;
  try {
    uri = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new MalformedProofError(
      "MALFORMED_PROOF",
      `Pending attestation URI is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const problem = checkPendingUri(uri);
  if (problem !== null) {
    throw new MalformedProofError("MALFORMED_PROOF", `Invalid pending attestation: ${problem}`);
  }
  return uri;
}

// =============================================================================
// Timestamps
// =============================================================================

/**
 * Encode a proof node and everything below it.
 *
 * @throws MalformedProofError if any node in the DAG is empty
 */
export function writeTimestamp(writer: ProofWriter, stamp: Timestamp): void {
  const attestations = stamp.attestations;
  const ops = stamp.ops;
  const entryCount = attestations.length + ops.length;
  if (entryCount === 0) {
    throw new MalformedProofError(
      "MALFORMED_PROOF",
      `Cannot serialize empty timestamp for ${toHex(stamp.msg)}`,
    );
  }

  let written = 0;
  const separate = (): void => {
    written += 1;
    if (written < entryCount) writer.writeByte(ENTRY_SEPARATOR);
  };

  for (const attestation of attestations) {
    separate();
    writer.writeByte(ATTESTATION_MARKER);
    writeAttestation(writer, attestation);
  }
  for (const { op, stamp: child } of ops) {
    separate();
    writeOp(writer, op);
    writeTimestamp(writer, child);
  }
}

/**
 * Decode a proof node for a message already known to the caller.
 */
export function readTimestamp(
  reader: ProofReader,
  msg: Uint8Array,
  depthLeft: number = MAX_RECURSION_DEPTH,
): Timestamp {
  if (depthLeft <= 0) {
    throw new MalformedProofError(
      "RECURSION_LIMIT",
      `Proof nests deeper than ${MAX_RECURSION_DEPTH} levels`,
    );
  }

  const stamp = new Timestamp(msg);
  const readEntry = (tag: number): void => {
    if (tag === ATTESTATION_MARKER) {
      stamp.addAttestation(readAttestation(reader));
      return;
    }
    const op = readOpWithTag(reader, tag);
    const child = readTimestamp(reader, applyOp(op, msg), depthLeft - 1);
    stamp.setOp(op, child);
  };

  let tag = reader.readByte();
  while (tag === ENTRY_SEPARATOR) {
    readEntry(reader.readByte());
    tag = reader.readByte();
  }
  readEntry(tag);
  return stamp;
}

export function serializeTimestamp(stamp: Timestamp): Uint8Array {
  const writer = new ProofWriter();
  writeTimestamp(writer, stamp);
  return writer.toBytes();
}

/**
 * Decode a complete fragment for `msg`; trailing bytes are rejected.
 */
export function deserializeTimestamp(bytes: Uint8Array, msg: Uint8Array): Timestamp {
  const reader = new ProofReader(bytes);
  const stamp = readTimestamp(reader, msg);
  reader.assertEof();
  return stamp;
}
