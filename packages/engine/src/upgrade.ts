/**
 * @chronostamp/engine — Upgrade engine.
 *
 * Turns pending attestations into block header attestations:
 *
 * 1. Cache pass: every node is merged with its cache entry. The cache is
 *    local, so this is done for all nodes, not just the pending ones.
 * 2. Network pass: for the first node on each path that carries
 *    attestations, each pending attestation sends us to a calendar. The
 *    calendar's answer is merged into the node (and the cache) if it holds
 *    anything we did not know.
 * 3. With `wait`, repeat until complete, sleeping between passes that
 *    found nothing.
 */

import {
  CalendarUnreachableError,
  CommitmentNotFoundError,
} from "@chronostamp/calendar";
import {
  MalformedProofError,
  attestationKey,
  formatAttestation,
  toHex,
  type Attestation,
  type Timestamp,
} from "@chronostamp/proof";
import type { UpgradeContext, UpgradeOptions, UpgradeResult } from "./types.js";

const DEFAULT_WAIT_INTERVAL_MS = 30_000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Queries
// =============================================================================

/**
 * A proof is complete once any block header attestation is reachable.
 * The attestation itself is not checked here; that is verification.
 */
export function isTimestampComplete(stamp: Timestamp): boolean {
  for (const { attestation } of stamp.allAttestations()) {
    if (attestation.kind === "block-header") return true;
  }
  return false;
}

/**
 * The first node on each path that carries attestations. Nodes below one
 * of these are only reachable through an already attested message.
 */
export function directlyVerified(stamp: Timestamp): Timestamp[] {
  if (stamp.attestationCount > 0) return [stamp];
  return stamp.ops.flatMap(({ stamp: child }) => directlyVerified(child));
}

function attestationMap(stamp: Timestamp): Map<string, Attestation> {
  const out = new Map<string, Attestation>();
  for (const { attestation } of stamp.allAttestations()) {
    out.set(attestationKey(attestation), attestation);
  }
  return out;
}

// =============================================================================
// Upgrade
// =============================================================================

/**
 * Merge cached and calendar knowledge into `stamp` in place.
 */
export async function upgradeTimestamp(
  stamp: Timestamp,
  options: UpgradeOptions,
  context: UpgradeContext,
): Promise<UpgradeResult> {
  const { cache, logger } = context;
  const sleepFn = context.sleepFn ?? defaultSleep;
  const waitIntervalMs = options.waitIntervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
  const override = options.calendarUrls ?? [];

  let changed = false;

  // ─── Cache pass ─────────────────────────────────────────────────────

  const known = attestationMap(stamp);
  for (const node of [...stamp.nodes()]) {
    const cached = cache.get(node.msg);
    if (cached !== undefined) node.merge(cached);
  }

  const fromCache = [...attestationMap(stamp)].filter(([key]) => !known.has(key));
  if (fromCache.length > 0) {
    changed = true;
    logger.info(`Got ${fromCache.length} attestation(s) from cache`);
    for (const [key, attestation] of fromCache) {
      known.set(key, attestation);
      logger.debug(`    ${formatAttestation(attestation)}`);
    }
  }

  // ─── Network passes ─────────────────────────────────────────────────

  while (!isTimestampComplete(stamp)) {
    let foundNew = false;

    for (const node of directlyVerified(stamp)) {
      for (const attestation of node.attestations) {
        if (attestation.kind !== "pending") continue;

        let urls: readonly string[];
        if (override.length > 0) {
          urls = override;
        } else if (options.whitelist.contains(attestation.uri)) {
          urls = [attestation.uri];
        } else {
          logger.warn(
            `Ignoring attestation from calendar ${attestation.uri}: Calendar not in whitelist`,
          );
          continue;
        }

        for (const url of urls) {
          logger.debug(`Checking calendar ${url} for ${toHex(node.msg)}`);
          const upgraded = await fetchUpgrade(url, node.msg, options, context);
          if (upgraded === undefined) continue;

          const received = attestationMap(upgraded);
          if (received.size > 0) {
            logger.info(`Got ${received.size} attestation(s) from ${url}`);
            for (const att of received.values()) logger.debug(`    ${formatAttestation(att)}`);
          }

          const fresh = [...received].filter(([key]) => !known.has(key));
          if (fresh.length > 0) {
            changed = true;
            foundNew = true;
            for (const [key, att] of fresh) known.set(key, att);

            cache.merge(upgraded);
            node.merge(upgraded);
          }
        }
      }
    }

    if (options.wait !== true) break;
    if (foundNew) continue;

    logger.info(
      `Timestamp not complete; waiting ${Math.round(waitIntervalMs / 1000)} sec before trying again`,
    );
    await sleepFn(waitIntervalMs);
  }

  return { changed, complete: isTimestampComplete(stamp) };
}

/**
 * Ask one calendar; recoverable failures are logged and yield undefined.
 */
async function fetchUpgrade(
  url: string,
  commitment: Uint8Array,
  options: UpgradeOptions,
  context: UpgradeContext,
): Promise<Timestamp | undefined> {
  const calendar = context.calendarFactory(url);
  try {
    return await calendar.getTimestamp(commitment, options.timeoutMs);
  } catch (err) {
    if (err instanceof CommitmentNotFoundError) {
      context.logger.warn(`Calendar ${url}: ${err.reason}`);
      return undefined;
    }
    if (err instanceof CalendarUnreachableError || err instanceof MalformedProofError) {
      context.logger.warn(`Calendar ${url}: ${err.message}`);
      return undefined;
    }
    throw err;
  }
}
