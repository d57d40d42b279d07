/**
 * @chronostamp/chain-observer — Chain verifiers and explorers.
 *
 * Read-only access to blockchains for checking block header attestations:
 * a JSON-RPC verifier for a local node, an Esplora explorer client, and a
 * registry keyed by chain.
 *
 * @packageDocumentation
 */

// Interfaces
export type {
  ChainVerifier,
  BlockExplorer,
  ExplorerBlock,
  HttpObserverConfig,
} from "./observer.js";

// Errors
export {
  ChainVerificationError,
  BlockHeightNotFoundError,
  ExplorerError,
  RpcError,
  ChainHttpError,
} from "./errors.js";
export type { ChainErrorCode } from "./errors.js";

// Block header check
export { verifyAgainstBlockHeader, MERKLE_ROOT_LENGTH } from "./block-header.js";
export type { BlockHeaderFields } from "./block-header.js";

// Bitcoin node
export {
  BitcoinRpcVerifier,
  parseRpcEndpoint,
  defaultNodeUrl,
  DEFAULT_RPC_PORTS,
  RPC_INVALID_PARAMETER,
} from "./bitcoin/rpc-verifier.js";
export type { BitcoinNetwork, RpcEndpoint, RpcBlockHeader } from "./bitcoin/rpc-verifier.js";

// Explorer
export { EsploraExplorer, DEFAULT_ESPLORA_URL } from "./esplora/esplora-explorer.js";

// Registry
export { VerifierRegistry } from "./registry.js";

// Retry
export { DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
