/**
 * @chronostamp/proof — Operations.
 *
 * An operation is a deterministic transform from one message to the next
 * along a proof path. The set is closed:
 *
 * - binary: append / prepend a fixed argument
 * - unary:  reverse, hexlify
 * - hash:   sha1, ripemd160, sha256, keccak256
 *
 * Operations label the edges of the proof DAG, so each one has a stable
 * string key (for Map lookup), a total order (wire tag, then argument bytes)
 * and a cost used by pruning to prefer shorter paths.
 */

import { createHash } from "node:crypto";
import { keccak256 } from "viem";
import { compareBytes, concatBytes, toHex, utf8Encode } from "./bytes.js";
import { MalformedProofError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export type HashOpKind = "sha1" | "ripemd160" | "sha256" | "keccak256";

export type Op =
  | { readonly kind: "append"; readonly arg: Uint8Array }
  | { readonly kind: "prepend"; readonly arg: Uint8Array }
  | { readonly kind: "reverse" }
  | { readonly kind: "hexlify" }
  | { readonly kind: HashOpKind };

export type OpKind = Op["kind"];

export type BinaryOp = Extract<Op, { kind: "append" | "prepend" }>;

export type HashOp = Extract<Op, { kind: HashOpKind }>;

// =============================================================================
// Constants
// =============================================================================

/** Largest message an operation accepts as input. */
export const MAX_MSG_LENGTH = 4096;

/** Largest message an operation may produce. */
export const MAX_RESULT_LENGTH = 4096;

export const OP_TAGS = {
  sha1: 0x02,
  ripemd160: 0x03,
  sha256: 0x08,
  keccak256: 0x67,
  append: 0xf0,
  prepend: 0xf1,
  reverse: 0xf2,
  hexlify: 0xf3,
} as const satisfies Record<OpKind, number>;

const OP_KINDS: readonly OpKind[] = [
  "sha1",
  "ripemd160",
  "sha256",
  "keccak256",
  "append",
  "prepend",
  "reverse",
  "hexlify",
];

export const DIGEST_LENGTHS = {
  sha1: 20,
  ripemd160: 20,
  sha256: 32,
  keccak256: 32,
} as const satisfies Record<HashOpKind, number>;

export const SHA1: HashOp = { kind: "sha1" };
export const RIPEMD160: HashOp = { kind: "ripemd160" };
export const SHA256: HashOp = { kind: "sha256" };
export const KECCAK256: HashOp = { kind: "keccak256" };
export const REVERSE: Op = { kind: "reverse" };
export const HEXLIFY: Op = { kind: "hexlify" };

// =============================================================================
// Constructors
// =============================================================================

function checkArg(kind: string, arg: Uint8Array): void {
  if (arg.length === 0) {
    throw new RangeError(`${kind}: argument must not be empty`);
  }
  if (arg.length > MAX_RESULT_LENGTH) {
    throw new RangeError(
      `${kind}: argument is ${arg.length} bytes, limit is ${MAX_RESULT_LENGTH}`,
    );
  }
}

export function append(arg: Uint8Array): BinaryOp {
  checkArg("append", arg);
  return { kind: "append", arg: Uint8Array.from(arg) };
}

export function prepend(arg: Uint8Array): BinaryOp {
  checkArg("prepend", arg);
  return { kind: "prepend", arg: Uint8Array.from(arg) };
}

// =============================================================================
// Classification
// =============================================================================

export function isBinaryOp(op: Op): op is BinaryOp {
  return op.kind === "append" || op.kind === "prepend";
}

export function isHashOp(op: Op): op is HashOp {
  return op.kind in DIGEST_LENGTHS;
}

export function opTag(op: Op): number {
  return OP_TAGS[op.kind];
}

/**
 * Look up the operation kind for a wire tag.
 * Returns undefined for tags this client does not understand.
 */
export function opKindForTag(tag: number): OpKind | undefined {
  return OP_KINDS.find((kind) => OP_TAGS[kind] === tag);
}

// =============================================================================
// Identity & Ordering
// =============================================================================

/**
 * Stable map key: two-digit tag, plus the argument for binary ops.
 * Sorting keys as strings gives the same order as compareOps.
 */
export function opKey(op: Op): string {
  const tag = opTag(op).toString(16).padStart(2, "0");
  return isBinaryOp(op) ? `${tag}:${toHex(op.arg)}` : tag;
}

export function compareOps(a: Op, b: Op): number {
  const tagDiff = opTag(a) - opTag(b);
  if (tagDiff !== 0) return tagDiff < 0 ? -1 : 1;
  if (isBinaryOp(a) && isBinaryOp(b)) return compareBytes(a.arg, b.arg);
  return 0;
}

export function opsEqual(a: Op, b: Op): boolean {
  return compareOps(a, b) === 0;
}

/**
 * Cost of an edge: one tag byte plus the argument, if any.
 */
export function opCost(op: Op): number {
  return 1 + (isBinaryOp(op) ? op.arg.length : 0);
}

// =============================================================================
// Application
// =============================================================================

export function hashBytes(kind: HashOpKind, data: Uint8Array): Uint8Array {
  if (kind === "keccak256") {
    return keccak256(data, "bytes");
  }
  return new Uint8Array(createHash(kind).update(data).digest());
}

/**
 * Apply an operation to a message.
 *
 * @throws MalformedProofError if the input or result exceeds the limits
 */
export function applyOp(op: Op, msg: Uint8Array): Uint8Array {
  if (msg.length > MAX_MSG_LENGTH) {
    throw new MalformedProofError(
      "INVALID_OP_RESULT",
      `${op.kind}: message is ${msg.length} bytes, limit is ${MAX_MSG_LENGTH}`,
    );
  }

  let result: Uint8Array;
  switch (op.kind) {
    case "append":
      result = concatBytes(msg, op.arg);
      break;
    case "prepend":
      result = concatBytes(op.arg, msg);
      break;
    case "reverse":
      if (msg.length === 0) {
        throw new MalformedProofError("INVALID_OP_RESULT", "reverse: empty message");
      }
      result = Uint8Array.from(msg).reverse();
      break;
    case "hexlify":
      if (msg.length === 0) {
        throw new MalformedProofError("INVALID_OP_RESULT", "hexlify: empty message");
      }
      if (msg.length > MAX_RESULT_LENGTH / 2) {
        throw new MalformedProofError(
          "INVALID_OP_RESULT",
          `hexlify: message is ${msg.length} bytes, limit is ${MAX_RESULT_LENGTH / 2}`,
        );
      }
      result = utf8Encode(toHex(msg));
      break;
    case "sha1":
    case "ripemd160":
    case "sha256":
    case "keccak256":
      result = hashBytes(op.kind, msg);
      break;
    default: {
      const unreachable: never = op;
      throw new Error(`Unknown op: ${JSON.stringify(unreachable)}`);
    }
  }

  if (result.length > MAX_RESULT_LENGTH) {
    throw new MalformedProofError(
      "INVALID_OP_RESULT",
      `${op.kind}: result is ${result.length} bytes, limit is ${MAX_RESULT_LENGTH}`,
    );
  }
  return result;
}

/** Human-readable form, e.g. `append 0a1b` or `sha256`. */
export function formatOp(op: Op): string {
  return isBinaryOp(op) ? `${op.kind} ${toHex(op.arg)}` : op.kind;
}
