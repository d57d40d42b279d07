/**
 * Chain Observer Interfaces
 *
 * Read-only views of a blockchain used to check block header attestations.
 *
 * Design rules:
 * - All methods are read-only
 * - All methods return Promises (chain queries are inherently async)
 * - Errors are thrown, not returned
 * - Hashes and merkle roots are hex in the byte-reversed order chain
 *   nodes and explorers display
 */

import type { Chain } from "@chronostamp/proof";
import type { RetryPolicy } from "./retry.js";

// =============================================================================
// Verifier
// =============================================================================

/**
 * Resolves a block header attestation to the time it attests.
 */
export interface ChainVerifier {
  readonly chain: Chain;

  /**
   * Check that `msg` is the merkle root of the block at `height`.
   *
   * @returns block time in unix seconds
   * @throws BlockHeightNotFoundError if the chain is not that long
   * @throws ChainVerificationError if the merkle root differs
   */
  verify(msg: Uint8Array, height: number): Promise<number>;
}

// =============================================================================
// Explorer
// =============================================================================

export interface ExplorerBlock {
  /** Block time in unix seconds */
  readonly time: number;
  /** Which field the time came from */
  readonly timeField: "timestamp" | "mediantime";
  /** Merkle root, display order hex */
  readonly merkleRoot: string;
}

/**
 * A public block explorer. Used when no local node is configured.
 */
export interface BlockExplorer {
  readonly chain: Chain;
  readonly baseUrl: string;
  blockHashAtHeight(height: number): Promise<string>;
  block(hash: string): Promise<ExplorerBlock>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface HttpObserverConfig {
  /** Endpoint URL; credentials in it become an Authorization header */
  readonly url: string;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;

  /** Retry policy for transport failures */
  readonly retry?: RetryPolicy | undefined;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;

  /** Sleep function used between retries (for testing) */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}
