/**
 * @chronostamp/engine — Types.
 *
 * Collaborators are passed in explicitly; the engines hold no global state
 * and never touch the network except through the calendars, verifiers and
 * explorers they are given.
 */

import type { Logger } from "pino";
import type { TimestampCache } from "@chronostamp/cache";
import type { CalendarFactory, QuorumResult, UrlWhitelist } from "@chronostamp/calendar";
import type { BlockExplorer, VerifierRegistry } from "@chronostamp/chain-observer";
import type { Chain, Timestamp } from "@chronostamp/proof";

export type SleepFn = (ms: number) => Promise<void>;

// =============================================================================
// Upgrade
// =============================================================================

export interface UpgradeOptions {
  /**
   * Ask these calendars instead of the ones named in pending
   * attestations. Empty or absent: follow the attestations, subject to
   * the whitelist.
   */
  readonly calendarUrls?: readonly string[] | undefined;
  readonly whitelist: UrlWhitelist;
  /** Keep polling until the proof is complete */
  readonly wait?: boolean | undefined;
  /** Delay between polls when nothing new arrived (default: 30000) */
  readonly waitIntervalMs?: number | undefined;
  /** Per-request calendar timeout */
  readonly timeoutMs?: number | undefined;
}

export interface UpgradeContext {
  readonly cache: TimestampCache;
  readonly calendarFactory: CalendarFactory;
  readonly logger: Logger;
  readonly sleepFn?: SleepFn | undefined;
}

export interface UpgradeResult {
  /** New attestations were merged from the cache or a calendar */
  readonly changed: boolean;
  /** The proof now holds a block header attestation */
  readonly complete: boolean;
}

// =============================================================================
// Stamp
// =============================================================================

export interface StampOptions {
  readonly calendarUrls: readonly string[];
  /** Minimum number of calendars that must answer */
  readonly minResponses: number;
  readonly timeoutMs: number;
}

export interface StampContext {
  readonly calendarFactory: CalendarFactory;
  readonly logger: Logger;
  /** Nonce source (injectable for testing) */
  readonly nonce?: ((length: number) => Uint8Array) | undefined;
  readonly now?: (() => number) | undefined;
}

export interface StampResult {
  /** Root that was submitted; every input is an ancestor of it */
  readonly root: Timestamp;
  readonly quorum: QuorumResult;
}

// =============================================================================
// Prune
// =============================================================================

export interface PruneContext {
  readonly verifiers: VerifierRegistry;
  readonly logger: Logger;
}

export interface PruneResult {
  /** Pruned copy; the input is left untouched */
  readonly timestamp: Timestamp;
  /** No attestation survived */
  readonly prunable: boolean;
  /** Some attestation or subtree was removed */
  readonly changed: boolean;
}

// =============================================================================
// Verify
// =============================================================================

export interface VerifyOptions {
  /** Successful explorer lookups allowed; 0 disables the explorer */
  readonly maxExplorerQueries?: number | undefined;
  /** Use the chain verifiers in the registry */
  readonly useLocalVerifier?: boolean | undefined;
}

export interface VerifyContext {
  readonly verifiers: VerifierRegistry;
  readonly explorer?: BlockExplorer | undefined;
  readonly logger: Logger;
}

export interface VerifiedAttestation {
  readonly chain: Chain;
  readonly height: number;
  /** Unix seconds */
  readonly time: number;
  readonly source: "explorer" | "node";
}

export interface VerifyResult {
  /** Earliest attested time, unix seconds */
  readonly earliest?: number | undefined;
  readonly attestations: readonly VerifiedAttestation[];
}
