/**
 * Verifier registry tests
 */

import { describe, it, expect } from "vitest";
import type { Chain } from "@chronostamp/proof";
import { VerifierRegistry } from "../src/registry.js";
import type { ChainVerifier } from "../src/observer.js";

function stubVerifier(chain: Chain): ChainVerifier {
  return { chain, verify: async () => 0 };
}

describe("VerifierRegistry", () => {
  it("finds verifiers by chain", () => {
    const btc = stubVerifier("bitcoin");
    const registry = new VerifierRegistry([btc]);
    expect(registry.find("bitcoin")).toBe(btc);
    expect(registry.has("bitcoin")).toBe(true);
    expect(registry.find("litecoin")).toBeUndefined();
  });

  it("refuses a second verifier for the same chain", () => {
    const registry = new VerifierRegistry([stubVerifier("bitcoin")]);
    expect(() => registry.register(stubVerifier("bitcoin"))).toThrow(/already registered/);
  });

  it("reports chains without a verifier", () => {
    const registry = new VerifierRegistry();
    expect(registry.has("litecoin")).toBe(false);
  });
});
