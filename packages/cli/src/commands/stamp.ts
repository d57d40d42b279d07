/**
 * @chronostamp/cli — stamp
 *
 * Timestamps files through a quorum of calendars. Each FILE gets a
 * FILE.ots proof; with no files, stdin is stamped and the proof goes to
 * stdout.
 */

import { existsSync, readFileSync } from "node:fs";
import { DEFAULT_CALENDAR_URLS } from "@chronostamp/calendar";
import { createTimestamp, upgradeTimestamp } from "@chronostamp/engine";
import { DetachedTimestampFile } from "@chronostamp/proof";
import { PROOF_EXTENSION, ProofFileError, writeProofFileExclusive } from "../files.js";
import type { Runtime } from "../runtime.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export interface StampCommandOptions {
  readonly files: readonly string[];
  /** Empty: the default calendars */
  readonly calendarUrls: readonly string[];
  readonly minResponses: number;
  readonly timeoutSeconds: number;
}

interface Target {
  /** Where the proof is written; undefined for stdout */
  readonly proofPath: string | undefined;
  readonly proof: DetachedTimestampFile;
}

async function collectTargets(
  options: StampCommandOptions,
  runtime: Runtime,
): Promise<Target[]> {
  if (options.files.length === 0) {
    const content = await runtime.readStdin();
    return [{ proofPath: undefined, proof: DetachedTimestampFile.fromContent(content) }];
  }

  return options.files.map((file) => {
    const proofPath = `${file}${PROOF_EXTENSION}`;
    if (existsSync(proofPath)) {
      throw new ProofFileError(proofPath, `File ${proofPath} already exists`);
    }
    const proof = DetachedTimestampFile.fromContent(new Uint8Array(readFileSync(file)));
    runtime.logger.debug({ file, digest: proof.toString() }, "hashed file");
    return { proofPath, proof };
  });
}

export async function stampCommand(
  options: StampCommandOptions,
  runtime: Runtime,
): Promise<ExitCode> {
  const { config, logger } = runtime;
  const targets = await collectTargets(options, runtime);
  const calendarUrls = options.calendarUrls.length > 0 ? options.calendarUrls : DEFAULT_CALENDAR_URLS;

  const { quorum } = await createTimestamp(
    targets.map(({ proof }) => proof.timestamp),
    {
      calendarUrls,
      minResponses: options.minResponses,
      timeoutMs: options.timeoutSeconds * 1000,
    },
    { calendarFactory: runtime.calendarFactory, logger },
  );
  if (!quorum.ok) return EXIT.FAILURE;

  if (config.wait) {
    for (const { proof } of targets) {
      await upgradeTimestamp(
        proof.timestamp,
        {
          whitelist: runtime.whitelist,
          wait: true,
          waitIntervalMs: config.waitIntervalSeconds * 1000,
        },
        { cache: runtime.cache, calendarFactory: runtime.calendarFactory, logger, sleepFn: runtime.sleepFn },
      );
    }
  }

  for (const { proofPath, proof } of targets) {
    if (proofPath === undefined) {
      runtime.stdout.write(proof.serialize());
    } else {
      writeProofFileExclusive(proofPath, proof);
      logger.info(`Wrote ${proofPath}`);
    }
  }
  return EXIT.OK;
}
