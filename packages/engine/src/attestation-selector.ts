/**
 * @chronostamp/engine — Attestation selectors.
 *
 * Command-line selectors for attestations:
 *
 *   btc           Bitcoin block header attestations
 *   ltc           Litecoin block header attestations
 *   unknown       attestations of a kind this client does not understand
 *   pending:*     every pending attestation
 *   pending:<uri> pending attestations from one calendar
 */

import type { Attestation, Chain } from "@chronostamp/proof";

export type AttestationSelector =
  | { readonly kind: "block-header"; readonly chain: Chain }
  | { readonly kind: "unknown" }
  | { readonly kind: "pending"; readonly uri: string | "*" };

export const ATTESTATION_SELECTOR_CHOICES = "'btc', 'ltc', 'unknown', 'pending:*', 'pending:uri'";

const PENDING_PREFIX = "pending:";

/**
 * @throws RangeError for an unrecognised selector
 */
export function parseAttestationSelector(text: string): AttestationSelector {
  switch (text) {
    case "btc":
      return { kind: "block-header", chain: "bitcoin" };
    case "ltc":
      return { kind: "block-header", chain: "litecoin" };
    case "unknown":
      return { kind: "unknown" };
  }
  if (text.startsWith(PENDING_PREFIX) && text.length > PENDING_PREFIX.length) {
    return { kind: "pending", uri: text.slice(PENDING_PREFIX.length) };
  }
  throw new RangeError(`invalid choice: '${text}' (choose from ${ATTESTATION_SELECTOR_CHOICES})`);
}

export function matchesSelector(attestation: Attestation, selector: AttestationSelector): boolean {
  switch (selector.kind) {
    case "block-header":
      return attestation.kind === "block-header" && attestation.chain === selector.chain;
    case "unknown":
      return attestation.kind === "unknown";
    case "pending":
      return (
        attestation.kind === "pending" && (selector.uri === "*" || attestation.uri === selector.uri)
      );
  }
}

export function matchesAny(attestation: Attestation, selectors: readonly AttestationSelector[]): boolean {
  return selectors.some((selector) => matchesSelector(attestation, selector));
}

export function formatSelector(selector: AttestationSelector): string {
  switch (selector.kind) {
    case "block-header":
      return selector.chain === "bitcoin" ? "btc" : "ltc";
    case "unknown":
      return "unknown";
    case "pending":
      return `${PENDING_PREFIX}${selector.uri}`;
  }
}
