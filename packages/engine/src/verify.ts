/**
 * @chronostamp/engine — Verification engine.
 *
 * Resolves block header attestations to the times they attest. Bitcoin
 * attestations may be checked through a block explorer (bounded number of
 * lookups); everything else goes to the chain verifier registered for the
 * attestation's chain. Attestations nobody can check are reported with
 * instructions for checking them by hand.
 */

import { verifyAgainstBlockHeader } from "@chronostamp/chain-observer";
import {
  chainLabel,
  toReversedHex,
  type BlockHeaderAttestation,
  type Timestamp,
} from "@chronostamp/proof";
import type {
  VerifiedAttestation,
  VerifyContext,
  VerifyOptions,
  VerifyResult,
} from "./types.js";

interface Candidate {
  readonly msg: Uint8Array;
  readonly attestation: BlockHeaderAttestation;
}

/** Block header attestations, lowest height first, without repeats. */
export function blockHeaderAttestations(stamp: Timestamp): Candidate[] {
  const seen = new Set<string>();
  const out: Candidate[] = [];
  for (const { msg, attestation } of stamp.allAttestations()) {
    if (attestation.kind !== "block-header") continue;
    const key = `${attestation.chain}:${attestation.height}:${toReversedHex(msg)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ msg, attestation });
  }
  return out.sort((a, b) => a.attestation.height - b.attestation.height);
}

export function manualInstructions(candidate: Candidate): string {
  const { attestation, msg } = candidate;
  return `To verify manually, check that ${chainLabel(attestation.chain)} block ${attestation.height} has merkleroot ${toReversedHex(msg)}`;
}

/**
 * Verify every block header attestation reachable from `stamp`.
 * Failures are logged, never thrown.
 */
export async function verifyTimestamp(
  stamp: Timestamp,
  options: VerifyOptions,
  context: VerifyContext,
): Promise<VerifyResult> {
  const { logger, explorer } = context;
  const maxExplorerQueries = options.maxExplorerQueries ?? 0;
  const useLocalVerifier = options.useLocalVerifier ?? false;

  const verified: VerifiedAttestation[] = [];
  let explorerVerified = 0;

  for (const candidate of blockHeaderAttestations(stamp)) {
    const { attestation, msg } = candidate;
    const label = chainLabel(attestation.chain);

    // Once the explorer is in use for a chain it is the only source for it.
    if (explorer !== undefined && explorer.chain === attestation.chain && maxExplorerQueries > 0) {
      if (explorerVerified >= maxExplorerQueries) {
        logger.info(manualInstructions(candidate));
        continue;
      }
      try {
        const hash = await explorer.blockHashAtHeight(attestation.height);
        const block = await explorer.block(hash);
        const time = verifyAgainstBlockHeader(msg, block);
        explorerVerified += 1;
        logger.info(
          `${explorer.baseUrl} confirms merkle root of ${label} block ${attestation.height} and ${block.timeField}=${formatTime(time)}`,
        );
        verified.push({ chain: attestation.chain, height: attestation.height, time, source: "explorer" });
      } catch (err) {
        logger.error(`${label} block ${attestation.height} via ${explorer.baseUrl}: ${reasonOf(err)}`);
        logger.info(manualInstructions(candidate));
      }
      continue;
    }

    const verifier = useLocalVerifier ? context.verifiers.find(attestation.chain) : undefined;
    if (verifier === undefined) {
      logger.info(manualInstructions(candidate));
      continue;
    }

    try {
      const time = await verifier.verify(msg, attestation.height);
      logger.info(
        `Success! ${label} block ${attestation.height} attests existence as of ${formatTime(time)}`,
      );
      verified.push({ chain: attestation.chain, height: attestation.height, time, source: "node" });
    } catch (err) {
      logger.error(`${label} verification of block ${attestation.height} failed: ${reasonOf(err)}`);
      logger.info(manualInstructions(candidate));
    }
  }

  const earliest = verified.reduce<number | undefined>(
    (min, { time }) => (min === undefined || time < min ? time : min),
    undefined,
  );
  return { earliest, attestations: verified };
}

function formatTime(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
