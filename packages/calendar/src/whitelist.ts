/**
 * @chronostamp/calendar — Calendar URL whitelist.
 *
 * Pending attestations name the calendar to ask for an upgrade. A proof
 * file is untrusted input, so the upgrade engine only follows URLs that
 * match this list. Entries are URLs whose host may be a glob:
 *
 *   https://*.calendar.example.org
 *
 * Scheme and path must match exactly; the host is matched with minimatch.
 * An entry without a scheme allows both http and https.
 */

import { minimatch } from "minimatch";

export const DEFAULT_CALENDAR_WHITELIST: readonly string[] = [
  "https://*.calendar.opentimestamps.org",
  "https://*.calendar.eternitywall.com",
  "https://*.calendar.catallaxy.com",
];

export const DEFAULT_CALENDAR_URLS: readonly string[] = [
  "https://a.pool.opentimestamps.org",
  "https://b.pool.opentimestamps.org",
  "https://a.pool.eternitywall.com",
  "https://ots.btc.catallaxy.com",
];

interface UrlParts {
  readonly scheme: string;
  readonly host: string;
  readonly path: string;
  readonly query: string | undefined;
  readonly fragment: string | undefined;
}

const URL_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

function splitUrl(url: string): UrlParts | undefined {
  const match = URL_PATTERN.exec(url);
  if (match === null) return undefined;
  return {
    scheme: (match[1] ?? "").toLowerCase(),
    host: (match[2] ?? "").toLowerCase(),
    path: match[3] ?? "",
    query: match[4],
    fragment: match[5],
  };
}

export class UrlWhitelist {
  private readonly patterns: UrlParts[] = [];

  constructor(urls: Iterable<string> = []) {
    for (const url of urls) this.add(url);
  }

  get size(): number {
    return this.patterns.length;
  }

  /**
   * @throws RangeError for entries with a query or fragment
   */
  add(url: string): void {
    if (!url.startsWith("http://") && !url.startsWith("https://")) {
      this.add(`http://${url}`);
      this.add(`https://${url}`);
      return;
    }

    const parts = splitUrl(url);
    if (parts === undefined || parts.host === "") {
      throw new RangeError(`Invalid whitelist entry: ${url}`);
    }
    if (parts.query !== undefined || parts.fragment !== undefined) {
      throw new RangeError(`Whitelist entry must not have a query or fragment: ${url}`);
    }
    this.patterns.push(parts);
  }

  contains(url: string): boolean {
    const parts = splitUrl(url);
    if (parts === undefined) return false;

    return this.patterns.some(
      (pattern) =>
        pattern.scheme === parts.scheme &&
        pattern.path === parts.path &&
        minimatch(parts.host, pattern.host),
    );
  }

  toString(): string {
    return this.patterns.map((p) => `${p.scheme}://${p.host}${p.path}`).join(", ");
  }
}
