/**
 * @chronostamp/engine — Stamping.
 *
 * Gives each file proof a nonce leaf, folds the leaves into one Merkle
 * root and submits the root to a quorum of calendars. The calendars'
 * fragments are merged into the root, which every file proof reaches.
 */

import { submitToQuorum } from "@chronostamp/calendar";
import { makeMerkleTree, nonceLeaf, toHex, type Timestamp } from "@chronostamp/proof";
import type { StampContext, StampOptions, StampResult } from "./types.js";

/**
 * @throws InvalidQuorumError if `minResponses` is outside 1..calendars
 * @throws RangeError if no file proofs are given
 */
export async function createTimestamp(
  fileStamps: readonly Timestamp[],
  options: StampOptions,
  context: StampContext,
): Promise<StampResult> {
  const { logger } = context;

  const leaves = fileStamps.map((stamp) => nonceLeaf(stamp, context.nonce));
  const root = makeMerkleTree(leaves);
  logger.debug({ root: toHex(root.msg), leaves: leaves.length }, "merkle root built");

  const calendars = options.calendarUrls.map((url) => context.calendarFactory(url));
  const quorum = await submitToQuorum(
    root,
    calendars,
    {
      minResponses: options.minResponses,
      timeoutMs: options.timeoutMs,
      now: context.now,
    },
    logger,
  );

  for (const failure of quorum.failures) {
    logger.warn(`Calendar ${failure.url}: ${failure.reason}`);
  }
  if (!quorum.ok) {
    logger.error(
      `Failed to create timestamp: need at least ${quorum.required} attestation(s) from remote calendars, got ${quorum.merged}`,
    );
  }

  return { root, quorum };
}
