/**
 * @chronostamp/proof — Errors.
 *
 * A single error class for everything that can go wrong while decoding
 * or applying a proof. The `code` narrows the failure for callers that
 * want to report it differently (e.g. "not a timestamp file").
 */

export type ProofErrorCode =
  | "MALFORMED_PROOF"
  | "BAD_MAGIC"
  | "UNSUPPORTED_VERSION"
  | "TRAILING_GARBAGE"
  | "RECURSION_LIMIT"
  | "INVALID_OP_RESULT";

export class MalformedProofError extends Error {
  constructor(
    public readonly code: ProofErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MalformedProofError";
  }
}
