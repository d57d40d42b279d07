/**
 * @chronostamp/engine — Pruning engine.
 *
 * Shrinks a complete proof to what is worth keeping:
 *
 * 1. verify   every attestation of the requested kinds against its chain
 * 2. discard  attestations matching the discard selectors
 * 3. optimal  per chain, keep only the best block header attestation
 *             (lowest height, then shortest path)
 * 4. rebuild  drop subtrees that no longer lead to any attestation
 *
 * Steps 2 and 3 mutate a private clone; step 4 builds a fresh DAG. The
 * input proof is never modified.
 */

import { ChainVerificationError } from "@chronostamp/chain-observer";
import {
  CHAINS,
  Timestamp,
  chainLabel,
  compareAttestations,
  formatAttestation,
  opCost,
  toHex,
  toReversedHex,
  type BlockHeaderAttestation,
  type Chain,
} from "@chronostamp/proof";
import { formatSelector, matchesAny, type AttestationSelector } from "./attestation-selector.js";
import type { PruneContext, PruneResult } from "./types.js";

// =============================================================================
// Verify
// =============================================================================

/**
 * Check every attestation selected by `selectors` against its chain.
 *
 * @throws ChainVerificationError on the first attestation that cannot be
 *   verified, including kinds no verifier supports
 */
export async function verifyAllAttestations(
  stamp: Timestamp,
  selectors: readonly AttestationSelector[],
  context: PruneContext,
): Promise<void> {
  for (const { msg, attestation } of stamp.allAttestations()) {
    if (!matchesAny(attestation, selectors)) continue;

    if (attestation.kind !== "block-header") {
      throw new ChainVerificationError(
        `Could not verify; verification of ${formatAttestation(attestation)} not supported`,
      );
    }

    const verifier = context.verifiers.find(attestation.chain);
    if (verifier === undefined) {
      throw new ChainVerificationError(
        `${chainLabel(attestation.chain)} lookup disabled, could not check attestations`,
      );
    }

    try {
      const time = await verifier.verify(msg, attestation.height);
      context.logger.debug(
        { chain: attestation.chain, height: attestation.height, time },
        "attestation verified",
      );
    } catch (err) {
      if (err instanceof ChainVerificationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ChainVerificationError(
        `${chainLabel(attestation.chain)} verification of block ${attestation.height} (merkleroot ${toReversedHex(msg)}) failed: ${reason}`,
      );
    }
  }
}

// =============================================================================
// Discard
// =============================================================================

/**
 * Remove matching attestations everywhere in the DAG, in place.
 * Returns the number removed.
 */
export function discardAttestations(
  stamp: Timestamp,
  selectors: readonly AttestationSelector[],
): number {
  let removed = 0;
  for (const node of uniqueNodes(stamp)) {
    for (const attestation of node.attestations) {
      if (matchesAny(attestation, selectors) && node.removeAttestation(attestation)) {
        removed += 1;
      }
    }
  }
  return removed;
}

function uniqueNodes(stamp: Timestamp): Set<Timestamp> {
  return new Set(stamp.nodes());
}

// =============================================================================
// Select optimal
// =============================================================================

interface Candidate {
  readonly attestation: BlockHeaderAttestation;
  readonly owner: Timestamp;
  /** Sum of op costs from the walk's current node down to the owner */
  readonly depth: number;
}

function bestOf(
  stamp: Timestamp,
  chain: Chain,
  onRemove: () => void,
): Candidate | undefined {
  let best: Candidate | undefined;

  const drop = (candidate: Candidate): void => {
    if (candidate.owner.removeAttestation(candidate.attestation)) onRemove();
  };

  for (const { op, stamp: child } of stamp.ops) {
    const found = bestOf(child, chain, onRemove);
    if (found === undefined) continue;
    const current: Candidate = { ...found, depth: found.depth + opCost(op) };

    if (best === undefined) {
      best = current;
      continue;
    }

    const order = compareAttestations(current.attestation, best.attestation);
    if (order === 0 && current.owner === best.owner) {
      // A shared node reached by two paths: same attestation, keep the shorter path.
      if (current.depth < best.depth) best = current;
      continue;
    }
    if (order > 0 || (order === 0 && current.depth >= best.depth)) {
      drop(current);
    } else {
      drop(best);
      best = current;
    }
  }

  for (const attestation of stamp.attestations) {
    if (attestation.kind !== "block-header" || attestation.chain !== chain) continue;
    const current: Candidate = { attestation, owner: stamp, depth: 0 };

    if (best === undefined) {
      best = current;
    } else if (compareAttestations(attestation, best.attestation) > 0) {
      drop(current);
    } else {
      // On this node the path is shortest, so it wins ties.
      drop(best);
      best = current;
    }
  }

  return best;
}

/**
 * Keep only the best block header attestation of `chain`, in place.
 * Returns the number of attestations removed.
 */
export function discardSuboptimal(stamp: Timestamp, chain: Chain): number {
  let removed = 0;
  bestOf(stamp, chain, () => {
    removed += 1;
  });
  return removed;
}

// =============================================================================
// Rebuild
// =============================================================================

/**
 * Copy of `stamp` without subtrees that hold no attestation. Returns
 * undefined when nothing is left at all. Shared nodes stay shared.
 */
export function pruneTree(stamp: Timestamp): Timestamp | undefined {
  return rebuild(stamp, new Map());
}

function rebuild(
  stamp: Timestamp,
  seen: Map<Timestamp, Timestamp | undefined>,
): Timestamp | undefined {
  if (seen.has(stamp)) return seen.get(stamp);

  const copy = new Timestamp(stamp.msg);
  for (const attestation of stamp.attestations) copy.addAttestation(attestation);
  for (const { op, stamp: child } of stamp.ops) {
    const kept = rebuild(child, seen);
    if (kept !== undefined) copy.setOp(op, kept);
  }

  const result = copy.isEmpty() ? undefined : copy;
  seen.set(stamp, result);
  return result;
}

function countNodes(stamp: Timestamp): number {
  return uniqueNodes(stamp).size;
}

// =============================================================================
// Prune
// =============================================================================

/**
 * Verify, discard, keep the best attestation per chain and drop dead
 * subtrees.
 *
 * @throws ChainVerificationError if a requested verification fails
 */
export async function pruneTimestamp(
  stamp: Timestamp,
  toVerify: readonly AttestationSelector[],
  toDiscard: readonly AttestationSelector[],
  context: PruneContext,
): Promise<PruneResult> {
  const { logger } = context;

  await verifyAllAttestations(stamp, toVerify, context);

  const work = stamp.clone();
  let removed = discardAttestations(work, toDiscard);
  logger.debug(
    { removed, selectors: toDiscard.map(formatSelector) },
    "discarded attestations",
  );

  for (const chain of CHAINS) {
    const suboptimal = discardSuboptimal(work, chain);
    if (suboptimal > 0) {
      logger.debug({ chain, removed: suboptimal }, "discarded suboptimal attestations");
    }
    removed += suboptimal;
  }

  const pruned = pruneTree(work);
  if (pruned === undefined) {
    return { timestamp: new Timestamp(stamp.msg), prunable: true, changed: true };
  }

  const droppedNodes = countNodes(work) - countNodes(pruned);
  logger.debug({ root: toHex(stamp.msg), removed, droppedNodes }, "pruned timestamp");

  return {
    timestamp: pruned,
    prunable: false,
    changed: removed > 0 || droppedNodes > 0,
  };
}
