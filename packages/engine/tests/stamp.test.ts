/**
 * Stamping tests
 *
 * Verifies:
 * - Two files, 2-of-3 calendars with one hanging → root with two pending
 * - Every file proof reaches the calendars' attestations
 * - A quorum that cannot be met reports not ok
 */

import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import type { Calendar, CalendarFactory } from "@chronostamp/calendar";
import { DetachedTimestampFile, Timestamp, pending, utf8Encode } from "@chronostamp/proof";
import { createTimestamp } from "../src/stamp.js";

const logger = pino({ level: "silent" });

const URLS = ["https://a.calendar.test", "https://b.calendar.test", "https://c.calendar.test"];

function factory(hangingUrl: string): CalendarFactory {
  return (url: string): Calendar => ({
    url,
    submit: vi.fn((digest: Uint8Array) => {
      if (url === hangingUrl) return new Promise<Timestamp>(() => {});
      const stamp = new Timestamp(digest);
      stamp.addAttestation(pending(url));
      return Promise.resolve(stamp);
    }),
    getTimestamp: vi.fn(),
  });
}

function fileStamps(): Timestamp[] {
  return ["first file", "second file"].map(
    (content) => DetachedTimestampFile.fromContent(utf8Encode(content)).timestamp,
  );
}

describe("createTimestamp", () => {
  it("commits two files through two of three calendars", async () => {
    const files = fileStamps();
    const { root, quorum } = await createTimestamp(
      files,
      { calendarUrls: URLS, minResponses: 2, timeoutMs: 50 },
      { calendarFactory: factory(URLS[2] ?? ""), logger, nonce: (n) => new Uint8Array(n) },
    );

    expect(quorum.ok).toBe(true);
    expect(quorum.merged).toBe(2);
    expect(root.attestations).toEqual([pending(URLS[0] ?? ""), pending(URLS[1] ?? "")]);

    for (const file of files) {
      const reached = [...file.allAttestations()].map(({ attestation }) => attestation);
      expect(reached).toEqual([pending(URLS[0] ?? ""), pending(URLS[1] ?? "")]);
    }
  });

  it("reports failure when the quorum is not met", async () => {
    const { quorum } = await createTimestamp(
      fileStamps(),
      { calendarUrls: URLS, minResponses: 3, timeoutMs: 50 },
      { calendarFactory: factory(URLS[2] ?? ""), logger },
    );

    expect(quorum.ok).toBe(false);
    expect(quorum.merged).toBe(2);
    expect(quorum.failures).toEqual([
      { url: URLS[2], reason: "no response before deadline" },
    ]);
  });
});
