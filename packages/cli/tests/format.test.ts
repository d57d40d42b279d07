import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { Timestamp, append, blockHeader, fromHex, pending, prepend } from "@chronostamp/proof";
import { formatTree } from "../src/format.js";

const plain = new Chalk({ level: 0 });
const CALENDAR = "https://a.calendar.test";

describe("formatTree", () => {
  it("prints a single-child chain flat", () => {
    const root = new Timestamp(fromHex("01"));
    root.addOp(append(fromHex("02"))).addAttestation(pending(CALENDAR));

    expect(formatTree(root, { chalk: plain })).toBe(
      ["append 02", `verify pending attestation from ${CALENDAR}`].join("\n"),
    );
  });

  it("indents branches", () => {
    const root = new Timestamp(fromHex("01"));
    root.addOp(append(fromHex("aa"))).addAttestation(pending(CALENDAR));
    root.addOp(prepend(fromHex("bb"))).addAttestation(blockHeader("bitcoin", 5));

    expect(formatTree(root, { chalk: plain })).toBe(
      [
        " -> append aa",
        `    verify pending attestation from ${CALENDAR}`,
        " -> prepend bb",
        "    verify Bitcoin block header attestation, height 5",
        "    # Bitcoin block merkle root 01bb",
      ].join("\n"),
    );
  });

  it("shows operation results when verbose", () => {
    const root = new Timestamp(fromHex("01"));
    root.addOp(append(fromHex("aa"))).addAttestation(pending(CALENDAR));
    root.addOp(prepend(fromHex("bb"))).addAttestation(pending(CALENDAR));

    const lines = formatTree(root, { chalk: plain, verbose: true }).split("\n");
    expect(lines[0]).toBe(" -> append aa == 01aa");
    expect(lines[2]).toBe(" -> prepend bb == bb01");
  });

  it("prints nothing for an empty node", () => {
    expect(formatTree(new Timestamp(fromHex("01")), { chalk: plain })).toBe("");
  });
});
