/**
 * @chronostamp/cli — prune
 *
 * Verifies, discards and deduplicates attestations, then rewrites the
 * proof with the previous version kept as `<file>.bak`.
 */

import { ChainVerificationError } from "@chronostamp/chain-observer";
import { pruneTimestamp, type AttestationSelector, type PruneResult } from "@chronostamp/engine";
import { DetachedTimestampFile } from "@chronostamp/proof";
import { readProofFile, replaceWithBackup } from "../files.js";
import type { Runtime } from "../runtime.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export interface PruneCommandOptions {
  readonly proofPath: string;
  readonly verify: readonly AttestationSelector[];
  readonly discard: readonly AttestationSelector[];
}

export async function pruneCommand(
  options: PruneCommandOptions,
  runtime: Runtime,
): Promise<ExitCode> {
  const { logger } = runtime;
  const proof = readProofFile(options.proofPath);

  let result: PruneResult;
  try {
    result = await pruneTimestamp(proof.timestamp, options.verify, options.discard, {
      verifiers: runtime.verifiers,
      logger,
    });
  } catch (err) {
    if (err instanceof ChainVerificationError) {
      logger.error(err.message);
      return EXIT.FAILURE;
    }
    throw err;
  }

  if (result.prunable) {
    logger.warn("Failed! All attestations have been discarded");
    return EXIT.FAILURE;
  }
  if (!result.changed) {
    logger.warn("Failed! Nothing has been discarded");
    return EXIT.FAILURE;
  }

  const pruned = new DetachedTimestampFile(proof.fileHashOp, result.timestamp);
  const backup = replaceWithBackup(options.proofPath, pruned);
  logger.debug(`Prune successful; previous timestamp kept as ${backup}`);
  return EXIT.OK;
}
