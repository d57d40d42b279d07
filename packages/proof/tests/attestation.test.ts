/**
 * Attestation tests
 *
 * Verifies:
 * - URI validation for pending attestations
 * - Ordering by tag then per-kind field
 * - Keys and display strings
 */

import { describe, it, expect } from "vitest";
import { fromHex } from "../src/bytes.js";
import {
  attestationKey,
  attestationsEqual,
  blockHeader,
  chainForTag,
  compareAttestations,
  formatAttestation,
  pending,
  unknownAttestation,
  type Attestation,
} from "../src/attestation.js";

describe("pending", () => {
  it("accepts calendar URLs", () => {
    expect(pending("https://alice.example/cal").uri).toBe("https://alice.example/cal");
  });

  it("rejects characters outside the allowed set", () => {
    expect(() => pending("https://a.example/?q=1")).toThrow(RangeError);
    expect(() => pending("https://a example")).toThrow(RangeError);
  });

  it("rejects URIs longer than 1000 characters", () => {
    expect(() => pending("a".repeat(1001))).toThrow(RangeError);
    expect(pending("a".repeat(1000)).uri).toHaveLength(1000);
  });
});

describe("blockHeader", () => {
  it("rejects negative or fractional heights", () => {
    expect(() => blockHeader("bitcoin", -1)).toThrow(RangeError);
    expect(() => blockHeader("bitcoin", 1.5)).toThrow(RangeError);
  });
});

describe("compareAttestations", () => {
  it("orders bitcoin, litecoin, then pending by tag", () => {
    const list: Attestation[] = [
      pending("https://b.example"),
      blockHeader("litecoin", 1),
      blockHeader("bitcoin", 10),
      pending("https://a.example"),
      blockHeader("bitcoin", 2),
    ];
    expect([...list].sort(compareAttestations).map(formatAttestation)).toEqual([
      "Bitcoin block header attestation, height 2",
      "Bitcoin block header attestation, height 10",
      "Litecoin block header attestation, height 1",
      "pending attestation from https://a.example",
      "pending attestation from https://b.example",
    ]);
  });

  it("treats equal fields as equal", () => {
    expect(attestationsEqual(blockHeader("bitcoin", 5), blockHeader("bitcoin", 5))).toBe(true);
    expect(attestationsEqual(blockHeader("bitcoin", 5), blockHeader("litecoin", 5))).toBe(false);
    expect(
      attestationsEqual(
        unknownAttestation(fromHex("0102030405060708"), fromHex("aa")),
        unknownAttestation(fromHex("0102030405060708"), fromHex("aa")),
      ),
    ).toBe(true);
  });
});

describe("keys", () => {
  it("combine tag and field", () => {
    expect(attestationKey(blockHeader("bitcoin", 7))).toBe("0588960d73d71901:7");
    expect(attestationKey(pending("https://a.example"))).toBe(
      "83dfe30d2ef90c8e:https://a.example",
    );
  });

  it("resolve chains from tags", () => {
    expect(chainForTag(fromHex("06869a0d73d71b45"))).toBe("litecoin");
    expect(chainForTag(fromHex("0000000000000000"))).toBeUndefined();
  });

  it("require an eight byte tag for unknown attestations", () => {
    expect(() => unknownAttestation(fromHex("01"), new Uint8Array(0))).toThrow(RangeError);
  });
});
