/**
 * Codec tests
 *
 * Verifies:
 * - varuint encoding against known bytes
 * - Timestamp encoding against hand-built fixtures
 * - Decoding rejects truncation, trailing bytes, unknown tags, deep nesting
 */

import { describe, it, expect } from "vitest";
import { fromHex, toHex, utf8Encode } from "../src/bytes.js";
import { blockHeader, pending, unknownAttestation } from "../src/attestation.js";
import { MalformedProofError } from "../src/errors.js";
import { SHA256, applyOp } from "../src/op.js";
import {
  ProofReader,
  ProofWriter,
  deserializeTimestamp,
  serializeTimestamp,
} from "../src/serialize.js";
import { Timestamp } from "../src/timestamp.js";

const MSG = fromHex("00112233445566778899aabbccddeeff00112233445566778899aabbccddeeff");
const BTC_1 = "00" + "0588960d73d71901" + "01" + "01";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof MalformedProofError) return err.code;
    throw err;
  }
  return undefined;
}

// =============================================================================
// varuint
// =============================================================================

describe("varuint", () => {
  it.each([
    [0, "00"],
    [127, "7f"],
    [128, "8001"],
    [300, "ac02"],
    [500000, "a0c21e"],
  ])("encodes %i as %s", (value, hex) => {
    const writer = new ProofWriter();
    writer.writeVaruint(value);
    expect(toHex(writer.toBytes())).toBe(hex);
    expect(new ProofReader(fromHex(hex)).readVaruint()).toBe(value);
  });

  it("rejects values past the safe integer range", () => {
    expect(codeOf(() => new ProofReader(fromHex("ffffffffffffff7f")).readVaruint())).toBe(
      "MALFORMED_PROOF",
    );
  });

  it("rejects over-long zero padding", () => {
    const hex = "80".repeat(12) + "00";
    expect(codeOf(() => new ProofReader(fromHex(hex)).readVaruint())).toBe("MALFORMED_PROOF");
  });

  it("rejects lengths over the field limit", () => {
    const reader = new ProofReader(fromHex("05aabbccddee"));
    expect(() => reader.readVarbytes(4)).toThrow(MalformedProofError);
  });
});

// =============================================================================
// Timestamps
// =============================================================================

describe("serializeTimestamp", () => {
  it("encodes a single block header attestation", () => {
    const stamp = new Timestamp(MSG);
    stamp.addAttestation(blockHeader("bitcoin", 1));
    expect(toHex(serializeTimestamp(stamp))).toBe(BTC_1);
  });

  it("encodes a pending attestation with its uri", () => {
    const uri = "https://a.example";
    const stamp = new Timestamp(MSG);
    stamp.addAttestation(pending(uri));
    const uriHex = toHex(utf8Encode(uri));
    expect(toHex(serializeTimestamp(stamp))).toBe(
      "00" + "83dfe30d2ef90c8e" + "12" + "11" + uriHex,
    );
  });

  it("separates entries with 0xff, attestations first", () => {
    const stamp = new Timestamp(MSG);
    stamp.addOp(SHA256).addAttestation(blockHeader("bitcoin", 1));
    stamp.addAttestation(blockHeader("bitcoin", 1));
    expect(toHex(serializeTimestamp(stamp))).toBe("ff" + BTC_1 + "08" + BTC_1);
  });

  it("refuses to encode an empty node", () => {
    expect(codeOf(() => serializeTimestamp(new Timestamp(MSG)))).toBe("MALFORMED_PROOF");
  });
});

describe("deserializeTimestamp", () => {
  it("rebuilds children from the known message", () => {
    const stamp = deserializeTimestamp(fromHex("ff" + BTC_1 + "08" + BTC_1), MSG);
    const child = stamp.getOp(SHA256);
    expect(child?.msg).toEqual(applyOp(SHA256, MSG));
    expect(child?.hasAttestation(blockHeader("bitcoin", 1))).toBe(true);
    expect(stamp.hasAttestation(blockHeader("bitcoin", 1))).toBe(true);
  });

  it("keeps unknown attestations verbatim", () => {
    const hex = "00" + "0102030405060708" + "02" + "beef";
    const stamp = deserializeTimestamp(fromHex(hex), MSG);
    expect(stamp.attestations).toEqual([
      unknownAttestation(fromHex("0102030405060708"), fromHex("beef")),
    ]);
    expect(toHex(serializeTimestamp(stamp))).toBe(hex);
  });

  it("rejects trailing bytes after the proof", () => {
    expect(codeOf(() => deserializeTimestamp(fromHex(BTC_1 + "00"), MSG))).toBe(
      "TRAILING_GARBAGE",
    );
  });

  it("rejects trailing bytes inside an attestation payload", () => {
    const hex = "00" + "83dfe30d2ef90c8e" + "03" + "0161" + "00";
    expect(codeOf(() => deserializeTimestamp(fromHex(hex), MSG))).toBe("TRAILING_GARBAGE");
  });

  it("rejects pending URIs with disallowed characters", () => {
    const hex = "00" + "83dfe30d2ef90c8e" + "04" + "03612062";
    expect(codeOf(() => deserializeTimestamp(fromHex(hex), MSG))).toBe("MALFORMED_PROOF");
  });

  it("rejects block heights past the safe integer range", () => {
    const hex = "00" + "0588960d73d71901" + "08" + "ffffffffffffff7f";
    expect(codeOf(() => deserializeTimestamp(fromHex(hex), MSG))).toBe("MALFORMED_PROOF");
  });

  it("rejects unknown operation tags", () => {
    expect(codeOf(() => deserializeTimestamp(fromHex("99"), MSG))).toBe("MALFORMED_PROOF");
  });

  it("rejects truncated input", () => {
    expect(codeOf(() => deserializeTimestamp(fromHex(BTC_1.slice(0, 10)), MSG))).toBe(
      "MALFORMED_PROOF",
    );
  });

  it("stops at the nesting limit", () => {
    const hex = "08".repeat(300) + BTC_1;
    expect(codeOf(() => deserializeTimestamp(fromHex(hex), MSG))).toBe("RECURSION_LIMIT");
  });

  it("accepts nesting just under the limit", () => {
    const hex = "08".repeat(255) + BTC_1;
    expect(() => deserializeTimestamp(fromHex(hex), MSG)).not.toThrow();
  });
});
