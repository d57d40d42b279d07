/**
 * @chronostamp/cli — info
 */

import { toHex } from "@chronostamp/proof";
import { readProofFile } from "../files.js";
import { formatTree } from "../format.js";
import type { Runtime } from "../runtime.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export interface InfoCommandOptions {
  readonly proofPath: string;
  /** Show each operation's result */
  readonly verbose: boolean;
}

export function infoCommand(options: InfoCommandOptions, runtime: Runtime): ExitCode {
  const proof = readProofFile(options.proofPath);
  runtime.stdout.write(
    [
      `File ${proof.fileHashOp.kind} hash: ${toHex(proof.fileDigest)}`,
      "Timestamp:",
      formatTree(proof.timestamp, { verbose: options.verbose }),
      "",
    ].join("\n"),
  );
  return EXIT.OK;
}
