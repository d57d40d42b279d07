/**
 * Esplora Block Explorer
 *
 *   GET <base>/block-height/<h>  → block hash as text
 *   GET <base>/block/<hash>      → JSON with timestamp | mediantime, merkle_root
 *
 * Responses are validated with zod. Network failures, 429 and 5xx
 * responses are retried; other 4xx responses and malformed bodies fail
 * immediately.
 */

import { z } from "zod";
import type { Chain } from "@chronostamp/proof";
import { BlockHeightNotFoundError, ChainHttpError, ExplorerError } from "../errors.js";
import type { BlockExplorer, ExplorerBlock, HttpObserverConfig } from "../observer.js";
import {
  DEFAULT_RETRY_POLICY,
  parseRetryAfter,
  retryTransient,
  type RetryPolicy,
} from "../retry.js";

export const DEFAULT_ESPLORA_URL = "https://blockstream.info/api";

const BlockHashSchema = z
  .string()
  .trim()
  .regex(/^[0-9a-f]{64}$/, "expected a 64 character hex block hash");

const BlockSchema = z
  .object({
    timestamp: z.number().int().positive().optional(),
    mediantime: z.number().int().positive().optional(),
    merkle_root: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .refine((b) => b.timestamp !== undefined || b.mediantime !== undefined, {
    message: "block has neither timestamp nor mediantime",
  });

export class EsploraExplorer implements BlockExplorer {
  readonly chain: Chain = "bitcoin";
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: ((ms: number) => Promise<void>) | undefined;

  constructor(config: Partial<HttpObserverConfig> = {}) {
    this.baseUrl = (config.url ?? DEFAULT_ESPLORA_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.retry = config.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn;
  }

  /**
   * @throws BlockHeightNotFoundError on 404
   * @throws ExplorerError for anything else
   */
  async blockHashAtHeight(height: number): Promise<string> {
    const url = `${this.baseUrl}/block-height/${height}`;
    let text: string;
    try {
      text = await this.get(url);
    } catch (err) {
      if (err instanceof ChainHttpError && err.status === 404) {
        throw new BlockHeightNotFoundError(height);
      }
      throw err;
    }

    const parsed = BlockHashSchema.safeParse(text);
    if (!parsed.success) {
      throw new ExplorerError(url, `Unexpected block hash from ${url}: ${text.slice(0, 80)}`);
    }
    return parsed.data;
  }

  async block(hash: string): Promise<ExplorerBlock> {
    const url = `${this.baseUrl}/block/${hash}`;
    let text: string;
    try {
      text = await this.get(url);
    } catch (err) {
      if (err instanceof ChainHttpError) {
        throw new ExplorerError(url, `Couldn't query ${url}: ${err.message}`);
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ExplorerError(
        url,
        `Can't interpret ${url} response as JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const parsed = BlockSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExplorerError(url, `Invalid block from ${url}: ${parsed.error.message}`);
    }

    const { timestamp, mediantime, merkle_root } = parsed.data;
    if (timestamp !== undefined) {
      return { time: timestamp, timeField: "timestamp", merkleRoot: merkle_root };
    }
    if (mediantime !== undefined) {
      return { time: mediantime, timeField: "mediantime", merkleRoot: merkle_root };
    }
    throw new ExplorerError(url, `Block from ${url} has no time`);
  }

  // ─── Transport ──────────────────────────────────────────────────────

  private async get(url: string): Promise<string> {
    try {
      return await retryTransient(
        async () => {
          const response = await this.fetchFn(url, {
            method: "GET",
            signal: AbortSignal.timeout(this.timeoutMs),
          });
          if (!response.ok) {
            throw new ChainHttpError(
              url,
              response.status,
              parseRetryAfter(response.headers.get("retry-after")),
            );
          }
          return response.text();
        },
        this.retry,
        this.sleepFn,
      );
    } catch (err) {
      if (err instanceof ChainHttpError && err.status === 404) throw err;
      throw new ExplorerError(
        url,
        `Couldn't query ${url}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
