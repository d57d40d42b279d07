/**
 * @chronostamp/cli — upgrade
 */

import { upgradeTimestamp } from "@chronostamp/engine";
import { readProofFile, replaceWithBackup } from "../files.js";
import type { Runtime } from "../runtime.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export interface UpgradeCommandOptions {
  readonly files: readonly string[];
  readonly calendarUrls: readonly string[];
  readonly dryRun: boolean;
}

/**
 * Upgrades each proof in place, keeping the previous version as
 * `<file>.bak`. Fails if any proof is still incomplete afterwards.
 */
export async function upgradeCommand(
  options: UpgradeCommandOptions,
  runtime: Runtime,
): Promise<ExitCode> {
  const { config, logger } = runtime;
  let allComplete = true;

  for (const file of options.files) {
    logger.debug(`Upgrading ${file}`);
    const proof = readProofFile(file);

    const { changed, complete } = await upgradeTimestamp(
      proof.timestamp,
      {
        calendarUrls: options.calendarUrls,
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

    if (changed && !options.dryRun) {
      const backup = replaceWithBackup(file, proof);
      logger.debug(`Got new timestamp data; previous timestamp kept as ${backup}`);
    }

    if (complete) {
      logger.info("Success! Timestamp complete");
    } else {
      logger.warn("Failed! Timestamp not complete");
      allComplete = false;
    }
  }

  return allComplete ? EXIT.OK : EXIT.FAILURE;
}
