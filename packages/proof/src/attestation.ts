/**
 * @chronostamp/proof — Attestations.
 *
 * An attestation is a claim that the message at a proof node is anchored
 * somewhere:
 *
 * - pending:      a calendar has the commitment but no chain anchor yet
 * - block-header: the message is the merkle root of a block at `height`
 * - unknown:      a tag this client does not understand, kept verbatim
 *
 * Ordering follows the wire format: tag bytes first, then a per-kind field.
 * For block headers that field is the height, so the earliest anchor is the
 * smallest one.
 */

import { compareBytes, fromHex, toHex } from "./bytes.js";

// =============================================================================
// Types
// =============================================================================

export type Chain = "bitcoin" | "litecoin";

export const CHAINS: readonly Chain[] = ["bitcoin", "litecoin"];

export interface PendingAttestation {
  readonly kind: "pending";
  readonly uri: string;
}

export interface BlockHeaderAttestation {
  readonly kind: "block-header";
  readonly chain: Chain;
  readonly height: number;
}

export interface UnknownAttestation {
  readonly kind: "unknown";
  readonly tag: Uint8Array;
  readonly payload: Uint8Array;
}

export type Attestation =
  | PendingAttestation
  | BlockHeaderAttestation
  | UnknownAttestation;

// =============================================================================
// Constants
// =============================================================================

export const ATTESTATION_TAG_LENGTH = 8;

export const PENDING_TAG = fromHex("83dfe30d2ef90c8e");

export const BLOCK_HEADER_TAGS: Readonly<Record<Chain, Uint8Array>> = {
  bitcoin: fromHex("0588960d73d71901"),
  litecoin: fromHex("06869a0d73d71b45"),
};

export const MAX_URI_LENGTH = 1000;

const URI_PATTERN = /^[A-Za-z0-9._/:-]*$/;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Check a calendar URI against the characters and length the wire format
 * allows. Returns a reason string, or null when the URI is acceptable.
 */
export function checkPendingUri(uri: string): string | null {
  if (uri.length > MAX_URI_LENGTH) {
    return `URI is ${uri.length} characters, limit is ${MAX_URI_LENGTH}`;
  }
  if (!URI_PATTERN.test(uri)) {
    return `URI contains characters outside [A-Za-z0-9._/:-]: "${uri.slice(0, 64)}"`;
  }
  return null;
}

export function pending(uri: string): PendingAttestation {
  const problem = checkPendingUri(uri);
  if (problem !== null) {
    throw new RangeError(problem);
  }
  return { kind: "pending", uri };
}

export function blockHeader(chain: Chain, height: number): BlockHeaderAttestation {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw new RangeError(`Block height must be a non-negative integer, got ${height}`);
  }
  return { kind: "block-header", chain, height };
}

export function unknownAttestation(tag: Uint8Array, payload: Uint8Array): UnknownAttestation {
  if (tag.length !== ATTESTATION_TAG_LENGTH) {
    throw new RangeError(`Attestation tag must be ${ATTESTATION_TAG_LENGTH} bytes`);
  }
  return { kind: "unknown", tag: Uint8Array.from(tag), payload: Uint8Array.from(payload) };
}

// =============================================================================
// Classification
// =============================================================================

export function chainForTag(tag: Uint8Array): Chain | undefined {
  return CHAINS.find((chain) => compareBytes(BLOCK_HEADER_TAGS[chain], tag) === 0);
}

export function attestationTag(a: Attestation): Uint8Array {
  switch (a.kind) {
    case "pending":
      return PENDING_TAG;
    case "block-header":
      return BLOCK_HEADER_TAGS[a.chain];
    case "unknown":
      return a.tag;
  }
}

// =============================================================================
// Identity & Ordering
// =============================================================================

/** Set key; equal attestations share a key. */
export function attestationKey(a: Attestation): string {
  const tag = toHex(attestationTag(a));
  switch (a.kind) {
    case "pending":
      return `${tag}:${a.uri}`;
    case "block-header":
      return `${tag}:${a.height}`;
    case "unknown":
      return `${tag}:${toHex(a.payload)}`;
  }
}

/**
 * Total order over attestations.
 *
 * Different kinds order by tag. Within a kind: pending by URI, block headers
 * by height, unknown by payload bytes.
 */
export function compareAttestations(a: Attestation, b: Attestation): number {
  const tagDiff = compareBytes(attestationTag(a), attestationTag(b));
  if (tagDiff !== 0) return tagDiff;

  if (a.kind === "pending" && b.kind === "pending") {
    if (a.uri === b.uri) return 0;
    return a.uri < b.uri ? -1 : 1;
  }
  if (a.kind === "block-header" && b.kind === "block-header") {
    if (a.height === b.height) return 0;
    return a.height < b.height ? -1 : 1;
  }
  if (a.kind === "unknown" && b.kind === "unknown") {
    return compareBytes(a.payload, b.payload);
  }
  return 0;
}

export function attestationsEqual(a: Attestation, b: Attestation): boolean {
  return compareAttestations(a, b) === 0;
}

const CHAIN_LABELS: Readonly<Record<Chain, string>> = {
  bitcoin: "Bitcoin",
  litecoin: "Litecoin",
};

export function chainLabel(chain: Chain): string {
  return CHAIN_LABELS[chain];
}

export function formatAttestation(a: Attestation): string {
  switch (a.kind) {
    case "pending":
      return `pending attestation from ${a.uri}`;
    case "block-header":
      return `${CHAIN_LABELS[a.chain]} block header attestation, height ${a.height}`;
    case "unknown":
      return `unknown attestation ${toHex(a.tag)} (${a.payload.length} byte payload)`;
  }
}
