/**
 * Detached timestamp file tests
 */

import { describe, it, expect } from "vitest";
import { fromHex, toHex, utf8Encode } from "../src/bytes.js";
import { blockHeader } from "../src/attestation.js";
import { DetachedTimestampFile, HEADER_MAGIC } from "../src/detached.js";
import { MalformedProofError } from "../src/errors.js";
import { SHA1 } from "../src/op.js";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";
const BTC_1 = "00" + "0588960d73d71901" + "0101";

function helloFile(): DetachedTimestampFile {
  const file = DetachedTimestampFile.fromContent(utf8Encode("hello"));
  file.timestamp.addAttestation(blockHeader("bitcoin", 1));
  return file;
}

describe("DetachedTimestampFile", () => {
  it("hashes content with sha256 by default", () => {
    const file = DetachedTimestampFile.fromContent(utf8Encode("hello"));
    expect(toHex(file.fileDigest)).toBe(HELLO_SHA256);
    expect(file.matchesContent(utf8Encode("hello"))).toBe(true);
    expect(file.matchesContent(utf8Encode("hello!"))).toBe(false);
  });

  it("serializes magic, version, op, digest and proof", () => {
    expect(toHex(helloFile().serialize())).toBe(
      toHex(HEADER_MAGIC) + "01" + "08" + HELLO_SHA256 + BTC_1,
    );
  });

  it("reads back what it wrote", () => {
    const bytes = helloFile().serialize();
    const read = DetachedTimestampFile.deserialize(bytes);
    expect(read.fileHashOp.kind).toBe("sha256");
    expect(read.timestamp.equals(helloFile().timestamp)).toBe(true);
  });

  it("supports other file hash ops", () => {
    const file = DetachedTimestampFile.fromContent(utf8Encode("hello"), SHA1);
    expect(file.fileDigest).toHaveLength(20);
  });

  it("rejects a bad magic", () => {
    expect(() => DetachedTimestampFile.deserialize(fromHex("00112233"))).toThrow(
      expect.objectContaining({ code: "BAD_MAGIC" }),
    );
  });

  it("rejects an unknown major version", () => {
    const hex = toHex(HEADER_MAGIC) + "02" + "08" + HELLO_SHA256 + BTC_1;
    expect(() => DetachedTimestampFile.deserialize(fromHex(hex))).toThrow(
      expect.objectContaining({ code: "UNSUPPORTED_VERSION" }),
    );
  });

  it("requires a hash op for the file digest", () => {
    const hex = toHex(HEADER_MAGIC) + "01" + "f2" + HELLO_SHA256 + BTC_1;
    expect(() => DetachedTimestampFile.deserialize(fromHex(hex))).toThrow(MalformedProofError);
  });

  it("rejects trailing bytes", () => {
    const hex = toHex(helloFile().serialize()) + "00";
    expect(() => DetachedTimestampFile.deserialize(fromHex(hex))).toThrow(
      expect.objectContaining({ code: "TRAILING_GARBAGE" }),
    );
  });
});
