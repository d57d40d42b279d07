/**
 * Chain Observer Errors
 */

export type ChainErrorCode =
  | "CHAIN_VERIFICATION_FAILED"
  | "BLOCK_HEIGHT_NOT_FOUND"
  | "EXPLORER_ERROR"
  | "RPC_ERROR"
  | "HTTP_STATUS";

/**
 * The attestation does not hold against the chain: wrong digest length,
 * merkle root mismatch, missing verifier or unsupported kind.
 */
export class ChainVerificationError extends Error {
  readonly code: ChainErrorCode = "CHAIN_VERIFICATION_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "ChainVerificationError";
  }
}

export class BlockHeightNotFoundError extends Error {
  readonly code: ChainErrorCode = "BLOCK_HEIGHT_NOT_FOUND";

  constructor(
    public readonly height: number,
    /** Highest block the node knows, when it told us */
    public readonly tipHeight?: number | undefined,
  ) {
    super(
      tipHeight === undefined
        ? `Block height ${height} not found`
        : `Block height ${height} not found; ${tipHeight} is highest known block`,
    );
    this.name = "BlockHeightNotFoundError";
  }
}

export class ExplorerError extends Error {
  readonly code: ChainErrorCode = "EXPLORER_ERROR";

  constructor(
    public readonly url: string,
    message: string,
  ) {
    super(message);
    this.name = "ExplorerError";
  }
}

/**
 * Error object returned by a JSON-RPC node.
 */
export class RpcError extends Error {
  readonly code: ChainErrorCode = "RPC_ERROR";

  constructor(
    public readonly rpcCode: number,
    message: string,
  ) {
    super(message);
    this.name = "RpcError";
  }
}

/**
 * Non-2xx answer from a node or explorer.
 */
export class ChainHttpError extends Error {
  readonly code: ChainErrorCode = "HTTP_STATUS";

  constructor(
    public readonly url: string,
    public readonly status: number,
    /** From the Retry-After header, when present */
    public readonly retryAfterMs?: number | undefined,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = "ChainHttpError";
  }
}
