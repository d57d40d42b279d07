/**
 * Esplora explorer tests
 */

import { describe, it, expect, vi } from "vitest";
import { EsploraExplorer } from "../src/esplora/esplora-explorer.js";
import { BlockHeightNotFoundError, ExplorerError } from "../src/errors.js";

const BLOCK_HASH = "00000000000000000002a7c4c1e48d76c5a37902165a270156b7a8d72728a054";
const MERKLE_ROOT = "ee6d3267ca080c60e12e3a0b9703f1d348fb3a6c81cde8b89ff2d8e480ca6a49";

function createMockFetch(
  responses: Array<{ status: number; body?: string; error?: Error }>,
): typeof fetch {
  let callIndex = 0;
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    const config = responses[callIndex];
    callIndex++;
    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${callIndex})`);
    }
    if (config.error !== undefined) throw config.error;
    return new Response(config.body ?? "", { status: config.status });
  }) as unknown as typeof fetch;
}

const noSleep = async (_ms: number): Promise<void> => {};

describe("EsploraExplorer", () => {
  it("looks up the block hash at a height", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: `${BLOCK_HASH}\n` }]);
    const explorer = new EsploraExplorer({ url: "https://esplora.example/api/", fetchFn });

    expect(await explorer.blockHashAtHeight(500_000)).toBe(BLOCK_HASH);
    expect(vi.mocked(fetchFn).mock.calls[0]?.[0]).toBe(
      "https://esplora.example/api/block-height/500000",
    );
  });

  it("prefers timestamp over mediantime", async () => {
    const explorer = new EsploraExplorer({
      fetchFn: createMockFetch([
        {
          status: 200,
          body: JSON.stringify({ timestamp: 1500000000, mediantime: 1499999000, merkle_root: MERKLE_ROOT }),
        },
      ]),
    });
    expect(await explorer.block(BLOCK_HASH)).toEqual({
      time: 1500000000,
      timeField: "timestamp",
      merkleRoot: MERKLE_ROOT,
    });
  });

  it("falls back to mediantime", async () => {
    const explorer = new EsploraExplorer({
      fetchFn: createMockFetch([
        { status: 200, body: JSON.stringify({ mediantime: 1499999000, merkle_root: MERKLE_ROOT }) },
      ]),
    });
    const block = await explorer.block(BLOCK_HASH);
    expect(block.timeField).toBe("mediantime");
    expect(block.time).toBe(1499999000);
  });

  it("maps 404 at a height to BlockHeightNotFoundError", async () => {
    const explorer = new EsploraExplorer({
      fetchFn: createMockFetch([{ status: 404, body: "Block not found" }]),
    });
    await expect(explorer.blockHashAtHeight(9_999_999)).rejects.toBeInstanceOf(
      BlockHeightNotFoundError,
    );
  });

  it("rejects bodies that are not JSON", async () => {
    const explorer = new EsploraExplorer({
      fetchFn: createMockFetch([{ status: 200, body: "<html>" }]),
    });
    await expect(explorer.block(BLOCK_HASH)).rejects.toBeInstanceOf(ExplorerError);
  });

  it("rejects blocks without a merkle root", async () => {
    const explorer = new EsploraExplorer({
      fetchFn: createMockFetch([{ status: 200, body: JSON.stringify({ timestamp: 1 }) }]),
    });
    await expect(explorer.block(BLOCK_HASH)).rejects.toThrow(/Invalid block/);
  });

  it("retries server errors then gives up", async () => {
    const fetchFn = createMockFetch([{ status: 502 }, { status: 502 }, { status: 502 }]);
    const explorer = new EsploraExplorer({ fetchFn, sleepFn: noSleep });

    await expect(explorer.blockHashAtHeight(1)).rejects.toBeInstanceOf(ExplorerError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("recovers from a dropped connection", async () => {
    const fetchFn = createMockFetch([
      { status: 0, error: new TypeError("fetch failed") },
      { status: 200, body: BLOCK_HASH },
    ]);
    const explorer = new EsploraExplorer({ fetchFn, sleepFn: noSleep });
    expect(await explorer.blockHashAtHeight(1)).toBe(BLOCK_HASH);
  });
});
