/**
 * @chronostamp/engine — Proof lifecycle engines.
 *
 * Stamping, upgrading, pruning and verifying proofs. Every engine takes its
 * collaborators (calendars, cache, chain verifiers, logger) as arguments.
 *
 * @packageDocumentation
 */

// Stamp
export { createTimestamp } from "./stamp.js";

// Upgrade
export { upgradeTimestamp, isTimestampComplete, directlyVerified } from "./upgrade.js";

// Attestation selectors
export {
  parseAttestationSelector,
  matchesSelector,
  matchesAny,
  formatSelector,
  ATTESTATION_SELECTOR_CHOICES,
} from "./attestation-selector.js";
export type { AttestationSelector } from "./attestation-selector.js";

// Prune
export {
  pruneTimestamp,
  pruneTree,
  verifyAllAttestations,
  discardAttestations,
  discardSuboptimal,
} from "./prune.js";

// Verify
export { verifyTimestamp, blockHeaderAttestations, manualInstructions } from "./verify.js";

// Types
export type {
  SleepFn,
  UpgradeOptions,
  UpgradeContext,
  UpgradeResult,
  StampOptions,
  StampContext,
  StampResult,
  PruneContext,
  PruneResult,
  VerifyOptions,
  VerifyContext,
  VerifiedAttestation,
  VerifyResult,
} from "./types.js";
