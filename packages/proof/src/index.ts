/**
 * @chronostamp/proof — Proof DAG model and codec.
 *
 * Operations, attestations and proof nodes, the Merkle aggregator that
 * commits many files under one root, and the binary format shared with
 * calendars and `.ots` files.
 *
 * @packageDocumentation
 */

// Errors
export { MalformedProofError } from "./errors.js";
export type { ProofErrorCode } from "./errors.js";

// Bytes
export {
  toHex,
  fromHex,
  toReversedHex,
  concatBytes,
  compareBytes,
  bytesEqual,
  utf8Encode,
} from "./bytes.js";

// Operations
export {
  MAX_MSG_LENGTH,
  MAX_RESULT_LENGTH,
  OP_TAGS,
  DIGEST_LENGTHS,
  SHA1,
  RIPEMD160,
  SHA256,
  KECCAK256,
  REVERSE,
  HEXLIFY,
  append,
  prepend,
  isBinaryOp,
  isHashOp,
  opTag,
  opKindForTag,
  opKey,
  compareOps,
  opsEqual,
  opCost,
  hashBytes,
  applyOp,
  formatOp,
} from "./op.js";
export type { Op, OpKind, BinaryOp, HashOp, HashOpKind } from "./op.js";

// Attestations
export {
  CHAINS,
  ATTESTATION_TAG_LENGTH,
  PENDING_TAG,
  BLOCK_HEADER_TAGS,
  MAX_URI_LENGTH,
  checkPendingUri,
  pending,
  blockHeader,
  unknownAttestation,
  chainForTag,
  attestationTag,
  attestationKey,
  compareAttestations,
  attestationsEqual,
  chainLabel,
  formatAttestation,
} from "./attestation.js";
export type {
  Chain,
  Attestation,
  PendingAttestation,
  BlockHeaderAttestation,
  UnknownAttestation,
} from "./attestation.js";

// Proof DAG
export { Timestamp } from "./timestamp.js";
export type { OpEdge, AttestedMessage } from "./timestamp.js";

// Codec
export {
  MAX_PAYLOAD_LENGTH,
  MAX_RECURSION_DEPTH,
  ProofWriter,
  ProofReader,
  writeOp,
  readOp,
  readOpWithTag,
  writeAttestation,
  readAttestation,
  writeTimestamp,
  readTimestamp,
  serializeTimestamp,
  deserializeTimestamp,
} from "./serialize.js";

// Detached files
export {
  DetachedTimestampFile,
  HEADER_MAGIC,
  MAJOR_VERSION,
} from "./detached.js";

// Merkle aggregation
export {
  NONCE_LENGTH,
  nonceLeaf,
  catThenHash,
  makeMerkleTree,
} from "./merkle-tree.js";
export type { NonceSource } from "./merkle-tree.js";
