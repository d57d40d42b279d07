/**
 * Remote calendar tests
 *
 * Verifies:
 * - Request shape for submit and getTimestamp
 * - 404 → CommitmentNotFoundError with sanitised reason
 * - Other statuses, transport errors, timeouts → CalendarUnreachableError
 * - Oversized and malformed bodies are rejected
 */

import { describe, it, expect, vi } from "vitest";
import {
  MalformedProofError,
  Timestamp,
  fromHex,
  pending,
  serializeTimestamp,
} from "@chronostamp/proof";
import { CalendarUnreachableError, CommitmentNotFoundError } from "../src/errors.js";
import { RemoteCalendar, sanitiseReason } from "../src/remote-calendar.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

const DIGEST = fromHex("5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f");
const CAL_URL = "https://cal.example";

function fragmentBytes(): Uint8Array {
  const stamp = new Timestamp(DIGEST);
  stamp.addAttestation(pending(CAL_URL));
  return serializeTimestamp(stamp);
}

function createMockFetch(status: number, body: Uint8Array | string = ""): typeof fetch {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    return new Response(typeof body === "string" ? body : Buffer.from(body), { status });
  }) as unknown as typeof fetch;
}

function hangingFetch(): typeof fetch {
  return vi.fn((_url: string | URL | Request, init?: RequestInit) => {
    return new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => {
        const error = new Error("aborted");
        error.name = "AbortError";
        reject(error);
      });
    });
  }) as unknown as typeof fetch;
}

// =============================================================================
// submit
// =============================================================================

describe("RemoteCalendar.submit", () => {
  it("posts the raw digest and decodes the fragment", async () => {
    const fetchFn = createMockFetch(200, fragmentBytes());
    const calendar = new RemoteCalendar(`${CAL_URL}/`, { fetchFn });

    const stamp = await calendar.submit(DIGEST);

    expect(stamp.attestations).toEqual([pending(CAL_URL)]);
    const [url, init] = vi.mocked(fetchFn).mock.calls[0]!;
    expect(url).toBe("https://cal.example/digest");
    expect(init?.method).toBe("POST");
    expect(init?.body).toEqual(DIGEST);
    expect(init?.headers).toMatchObject({ Accept: "application/vnd.opentimestamps.v1" });
  });

  it("rejects non-200 responses", async () => {
    const calendar = new RemoteCalendar(CAL_URL, { fetchFn: createMockFetch(500) });
    await expect(calendar.submit(DIGEST)).rejects.toBeInstanceOf(CalendarUnreachableError);
  });

  it("rejects bodies over 10000 bytes", async () => {
    const calendar = new RemoteCalendar(CAL_URL, {
      fetchFn: createMockFetch(200, new Uint8Array(10_001)),
    });
    await expect(calendar.submit(DIGEST)).rejects.toThrow(/size limit/);
  });

  it("rejects undecodable bodies", async () => {
    const calendar = new RemoteCalendar(CAL_URL, {
      fetchFn: createMockFetch(200, fromHex("99")),
    });
    await expect(calendar.submit(DIGEST)).rejects.toBeInstanceOf(MalformedProofError);
  });

  it("wraps transport errors", async () => {
    const fetchFn = vi.fn(async () => {
      throw new TypeError("fetch failed");
    }) as unknown as typeof fetch;
    const calendar = new RemoteCalendar(CAL_URL, { fetchFn });
    await expect(calendar.submit(DIGEST)).rejects.toThrow(
      "Calendar https://cal.example unreachable: fetch failed",
    );
  });

  it("times out", async () => {
    const calendar = new RemoteCalendar(CAL_URL, { fetchFn: hangingFetch() });
    await expect(calendar.submit(DIGEST, 20)).rejects.toThrow(
      "Calendar https://cal.example timed out after 20ms",
    );
  });
});

// =============================================================================
// getTimestamp
// =============================================================================

describe("RemoteCalendar.getTimestamp", () => {
  it("requests the commitment by hex", async () => {
    const fetchFn = createMockFetch(200, fragmentBytes());
    const calendar = new RemoteCalendar(CAL_URL, { fetchFn });

    await calendar.getTimestamp(DIGEST);

    const [url, init] = vi.mocked(fetchFn).mock.calls[0]!;
    expect(url).toBe(
      "https://cal.example/timestamp/5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f5e1f",
    );
    expect(init?.method).toBe("GET");
  });

  it("maps 404 to CommitmentNotFoundError", async () => {
    const calendar = new RemoteCalendar(CAL_URL, {
      fetchFn: createMockFetch(404, "Pending confirmation in Bitcoin blockchain"),
    });

    const error = await calendar.getTimestamp(DIGEST).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CommitmentNotFoundError);
    expect(error).toHaveProperty("reason", "Pending confirmation in Bitcoin blockchain");
    expect(error).toHaveProperty("code", "COMMITMENT_NOT_FOUND");
  });

  it("maps other errors to CalendarUnreachableError", async () => {
    const calendar = new RemoteCalendar(CAL_URL, { fetchFn: createMockFetch(503) });
    const error = await calendar.getTimestamp(DIGEST).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CalendarUnreachableError);
    expect(error).toHaveProperty("status", 503);
  });
});

describe("sanitiseReason", () => {
  it("drops non-printable characters", () => {
    expect(sanitiseReason("Not found\u0007\n yet")).toBe("Not found yet");
  });

  it("keeps at most 160 characters", () => {
    expect(sanitiseReason("x".repeat(500))).toHaveLength(160);
  });
});
