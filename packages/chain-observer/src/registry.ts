/**
 * Verifier Registry
 *
 * Maps each chain to the verifier that checks its block header
 * attestations.
 *
 * Design rules:
 * - Verifiers are registered, not auto-discovered
 * - Each chain has at most one verifier
 * - A missing verifier is reported by whoever looked it up
 */

import type { Chain } from "@chronostamp/proof";
import type { ChainVerifier } from "./observer.js";

export class VerifierRegistry {
  private readonly verifiers = new Map<Chain, ChainVerifier>();

  constructor(verifiers: Iterable<ChainVerifier> = []) {
    for (const verifier of verifiers) this.register(verifier);
  }

  /**
   * Throws if a verifier for this chain is already registered.
   */
  register(verifier: ChainVerifier): void {
    if (this.verifiers.has(verifier.chain)) {
      throw new Error(
        `VerifierRegistry: verifier for chain '${verifier.chain}' is already registered`,
      );
    }
    this.verifiers.set(verifier.chain, verifier);
  }

  /** The verifier for `chain`, or undefined. */
  find(chain: Chain): ChainVerifier | undefined {
    return this.verifiers.get(chain);
  }

  has(chain: Chain): boolean {
    return this.verifiers.has(chain);
  }
}
