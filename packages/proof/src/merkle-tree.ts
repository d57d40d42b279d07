/**
 * @chronostamp/proof — Leaf & Merkle aggregation.
 *
 * Several files are committed with one calendar round-trip by folding their
 * leaves into a single root:
 *
 * - each file digest gets a random 16-byte nonce appended and is hashed
 *   again, so a detached proof does not reveal the other files' digests
 * - pairs are joined as append(right) / prepend(left), both reaching the
 *   same shared node, which is then hashed with sha256
 * - an odd leftover is promoted unchanged to the next level
 *
 * Every input node ends up an ancestor of the returned root, so merging a
 * calendar response into the root completes all of the inputs at once.
 */

import { randomBytes } from "node:crypto";
import { SHA256, append, prepend } from "./op.js";
import { Timestamp } from "./timestamp.js";

export const NONCE_LENGTH = 16;

export type NonceSource = (length: number) => Uint8Array;

const defaultNonce: NonceSource = (length) => new Uint8Array(randomBytes(length));

/**
 * Extend a file's proof node with `append(nonce)` then `sha256`, returning
 * the leaf to aggregate.
 */
export function nonceLeaf(
  fileStamp: Timestamp,
  nonce: NonceSource = defaultNonce,
): Timestamp {
  return fileStamp.addOp(append(nonce(NONCE_LENGTH))).addOp(SHA256);
}

/**
 * Join two nodes under one shared child and hash it.
 * Returns the hashed node, which becomes the parent in the next level.
 */
export function catThenHash(left: Timestamp, right: Timestamp): Timestamp {
  const joinedFromLeft = left.addOp(append(right.msg));
  const joinedFromRight = right.addOp(prepend(left.msg));

  // Both edges must lead to one node so attestations found later reach
  // both sides of the pair.
  joinedFromLeft.merge(joinedFromRight);
  right.setOp(prepend(left.msg), joinedFromLeft);

  return joinedFromLeft.addOp(SHA256);
}

/**
 * Reduce leaves to a single root.
 *
 * @throws RangeError if no leaves are given
 */
export function makeMerkleTree(leaves: readonly Timestamp[]): Timestamp {
  if (leaves.length === 0) {
    throw new RangeError("Cannot build a merkle tree from zero leaves");
  }

  let level: readonly Timestamp[] = leaves;
  while (level.length > 1) {
    const next: Timestamp[] = [];
    for (let i = 0; i + 1 < level.length; i += 2) {
      next.push(catThenHash(level[i]!, level[i + 1]!));
    }
    if (level.length % 2 === 1) {
      next.push(level[level.length - 1]!);
    }
    level = next;
  }
  return level[0]!;
}
