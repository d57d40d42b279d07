/**
 * @chronostamp/cli — verify
 *
 * Checks the proof belongs to the target (file or hex digest), upgrades it
 * from the whitelisted calendars it names, then resolves its block header
 * attestations to times.
 */

import { readFileSync } from "node:fs";
import { upgradeTimestamp, verifyTimestamp } from "@chronostamp/engine";
import { bytesEqual, fromHex, toHex } from "@chronostamp/proof";
import { readProofFile, targetOfProof } from "../files.js";
import { formatUnixTime } from "../format.js";
import type { Runtime } from "../runtime.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export interface VerifyCommandOptions {
  readonly proofPath: string;
  /** Original file; defaults to the proof path without `.ots` */
  readonly target?: string | undefined;
  /** Hex digest to check instead of a file */
  readonly digest?: string | undefined;
}

export async function verifyCommand(
  options: VerifyCommandOptions,
  runtime: Runtime,
): Promise<ExitCode> {
  const { config, logger } = runtime;
  const proof = readProofFile(options.proofPath);

  if (options.digest !== undefined) {
    let digest: Uint8Array;
    try {
      digest = fromHex(options.digest);
    } catch {
      logger.error(`Digest must be hex-encoded; got ${options.digest}`);
      return EXIT.USAGE;
    }
    if (!bytesEqual(digest, proof.fileDigest)) {
      logger.error(
        `Digest provided does not match digest in timestamp, ${toHex(proof.fileDigest)} (${proof.fileHashOp.kind})`,
      );
      return EXIT.FAILURE;
    }
  } else {
    const target = options.target ?? targetOfProof(options.proofPath);
    if (target === undefined) {
      logger.error("Timestamp filename does not end in .ots; name the original with -f");
      return EXIT.USAGE;
    }
    logger.debug(`Hashing file ${target}, algorithm ${proof.fileHashOp.kind}`);
    if (!proof.matchesContent(new Uint8Array(readFileSync(target)))) {
      logger.error("File does not match original!");
      return EXIT.FAILURE;
    }
  }

  await upgradeTimestamp(
    proof.timestamp,
    {
      whitelist: runtime.whitelist,
      wait: config.wait,
      waitIntervalMs: config.waitIntervalSeconds * 1000,
    },
    {
      cache: runtime.cache,
      calendarFactory: runtime.calendarFactory,
      logger,
      sleepFn: runtime.sleepFn,
    },
  );

  const useLocalVerifier = runtime.verifiers.has("bitcoin");
  if (!useLocalVerifier) {
    logger.info("Not checking Bitcoin attestation with local node, specify --query-local-bitcoin");
  }
  if (runtime.explorer === undefined) {
    logger.info("Not checking a block explorer for Bitcoin attestation, specify --query-explorer [N]");
  }

  const { earliest } = await verifyTimestamp(
    proof.timestamp,
    { maxExplorerQueries: config.explorerQueries, useLocalVerifier },
    { verifiers: runtime.verifiers, explorer: runtime.explorer, logger },
  );

  if (earliest === undefined) {
    logger.warn("Could not verify timestamp!");
    return EXIT.FAILURE;
  }
  logger.info(`Timestamp attests existence as of ${formatUnixTime(earliest)}`);
  return EXIT.OK;
}
