/**
 * @chronostamp/cli — Proof files on disk.
 *
 * New proofs are written exclusively; an existing proof is only replaced
 * after the original has been moved to `<file>.bak`.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { DetachedTimestampFile } from "@chronostamp/proof";

export const PROOF_EXTENSION = ".ots";
export const BACKUP_EXTENSION = ".bak";

export class ProofFileError extends Error {
  readonly code = "PROOF_FILE" as const;

  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(message);
    this.name = "ProofFileError";
  }
}

/**
 * @throws MalformedProofError if the file is not a valid proof
 */
export function readProofFile(path: string): DetachedTimestampFile {
  return DetachedTimestampFile.deserialize(new Uint8Array(readFileSync(path)));
}

/** Refuses to overwrite an existing file. */
export function writeProofFileExclusive(path: string, proof: DetachedTimestampFile): void {
  try {
    writeFileSync(path, proof.serialize(), { flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new ProofFileError(path, `File ${path} already exists`);
    }
    throw err;
  }
}

/**
 * Move `path` to `path.bak`, then write `proof` to `path`.
 * Returns the backup path.
 */
export function replaceWithBackup(path: string, proof: DetachedTimestampFile): string {
  const backup = `${path}${BACKUP_EXTENSION}`;
  if (existsSync(backup)) {
    throw new ProofFileError(
      path,
      `Could not backup timestamp: ${backup} already exists`,
    );
  }
  renameSync(path, backup);
  writeProofFileExclusive(path, proof);
  return backup;
}

/** `foo.txt.ots` → `foo.txt`; undefined when the name has no .ots suffix. */
export function targetOfProof(proofPath: string): string | undefined {
  if (!proofPath.endsWith(PROOF_EXTENSION)) return undefined;
  return proofPath.slice(0, -PROOF_EXTENSION.length);
}
