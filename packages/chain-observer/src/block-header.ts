/**
 * Block header check.
 *
 * A block header attestation claims the proof node's message is the merkle
 * root of a block. Chain nodes and explorers print merkle roots byte
 * reversed, so the comparison is against the reversed hex of the message.
 */

import { toReversedHex } from "@chronostamp/proof";
import { ChainVerificationError } from "./errors.js";

export interface BlockHeaderFields {
  /** Merkle root, display order hex */
  readonly merkleRoot: string;
  /** Block time in unix seconds */
  readonly time: number;
}

export const MERKLE_ROOT_LENGTH = 32;

/**
 * @returns the block time
 * @throws ChainVerificationError if `msg` is not the header's merkle root
 */
export function verifyAgainstBlockHeader(msg: Uint8Array, header: BlockHeaderFields): number {
  if (msg.length !== MERKLE_ROOT_LENGTH) {
    throw new ChainVerificationError(
      `Expected digest with length ${MERKLE_ROOT_LENGTH} bytes; got ${msg.length} bytes`,
    );
  }
  const expected = toReversedHex(msg);
  if (header.merkleRoot.toLowerCase() !== expected) {
    throw new ChainVerificationError(
      `Digest does not match merkleroot: block has ${header.merkleRoot}, expected ${expected}`,
    );
  }
  return header.time;
}
