/**
 * @chronostamp/calendar — HTTP calendar client.
 *
 *   POST <url>/digest           body = raw digest → fragment for the digest
 *   GET  <url>/timestamp/<hex>  200 → fragment, 404 → not found (with reason)
 *
 * Bodies are binary proof fragments. Anything over MAX_RESPONSE_BYTES is
 * rejected before decoding. Transport errors, timeouts and unexpected
 * statuses all surface as CalendarUnreachableError; undecodable bodies as
 * MalformedProofError.
 */

import { Timestamp, deserializeTimestamp, toHex } from "@chronostamp/proof";
import { CalendarUnreachableError, CommitmentNotFoundError } from "./errors.js";
import type { Calendar, CalendarFactory, RemoteCalendarOptions } from "./types.js";

export const CALENDAR_ACCEPT = "application/vnd.opentimestamps.v1";

export const MAX_RESPONSE_BYTES = 10_000;

/** Longest not-found reason kept from a calendar. */
export const MAX_REASON_LENGTH = 160;

export const DEFAULT_USER_AGENT = "chronostamp/0.1.0";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Keep printable ASCII only and cap the length, so a hostile calendar
 * cannot inject control sequences into our logs.
 */
export function sanitiseReason(raw: string): string {
  return raw
    .slice(0, MAX_REASON_LENGTH)
    .replace(/[^\x20-\x7e]/g, "")
    .trim();
}

export class RemoteCalendar implements Calendar {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: typeof fetch;

  constructor(url: string, options: RemoteCalendarOptions = {}) {
    this.url = url.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async submit(digest: Uint8Array, timeoutMs?: number): Promise<Timestamp> {
    const response = await this.fetchWithTimeout(
      `${this.url}/digest`,
      { method: "POST", body: digest },
      timeoutMs ?? this.timeoutMs,
    );
    if (response.status !== 200) {
      throw new CalendarUnreachableError(
        this.url,
        `Unexpected response from calendar ${this.url}: HTTP ${response.status}`,
        response.status,
      );
    }
    return deserializeTimestamp(await this.readBody(response), digest);
  }

  async getTimestamp(commitment: Uint8Array, timeoutMs?: number): Promise<Timestamp> {
    const response = await this.fetchWithTimeout(
      `${this.url}/timestamp/${toHex(commitment)}`,
      { method: "GET" },
      timeoutMs ?? this.timeoutMs,
    );

    if (response.status === 404) {
      const reason = sanitiseReason(await response.text());
      throw new CommitmentNotFoundError(this.url, reason);
    }
    if (response.status !== 200) {
      throw new CalendarUnreachableError(
        this.url,
        `Unexpected response from calendar ${this.url}: HTTP ${response.status}`,
        response.status,
      );
    }
    return deserializeTimestamp(await this.readBody(response), commitment);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private async readBody(response: Response): Promise<Uint8Array> {
    const declared = Number(response.headers.get("content-length") ?? "0");
    if (declared > MAX_RESPONSE_BYTES) {
      throw new CalendarUnreachableError(
        this.url,
        `Calendar response exceeded size limit (${declared} > ${MAX_RESPONSE_BYTES} bytes)`,
        response.status,
      );
    }

    const body = new Uint8Array(await response.arrayBuffer());
    if (body.length > MAX_RESPONSE_BYTES) {
      throw new CalendarUnreachableError(
        this.url,
        `Calendar response exceeded size limit (${body.length} > ${MAX_RESPONSE_BYTES} bytes)`,
        response.status,
      );
    }
    return body;
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
    timeoutMs: number,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.fetchFn(url, {
        ...init,
        headers: {
          Accept: CALENDAR_ACCEPT,
          "User-Agent": this.userAgent,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new CalendarUnreachableError(
          this.url,
          `Calendar ${this.url} timed out after ${timeoutMs}ms`,
        );
      }
      throw new CalendarUnreachableError(
        this.url,
        `Calendar ${this.url} unreachable: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/** Default factory: one RemoteCalendar per URL with shared options. */
export function remoteCalendarFactory(options: RemoteCalendarOptions = {}): CalendarFactory {
  return (url) => new RemoteCalendar(url, options);
}
