export type StreamEngineErrorCode =
  | 'MALFORMED_EVENT'
  | 'CHAIN_INTEGRITY'
  | 'UNKNOWN_STREAM'
  | 'STORAGE_FAILURE';

/**
 * Base class for every error the engine raises.
 *
 * Tip conflicts are not errors: they come back as a `conflict` result.
 */
export abstract class StreamEngineError extends Error {
  abstract readonly code: StreamEngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Empty or null-containing block set, bad identifiers, or an unreadable payload. */
export class MalformedEventError extends StreamEngineError {
  readonly code = 'MALFORMED_EVENT' as const;

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Malformed event: ${field} ${reason}`);
  }
}

/** Unknown `prev`, mismatched `genesis`, or a cid reused for different content. */
export class ChainIntegrityError extends StreamEngineError {
  readonly code = 'CHAIN_INTEGRITY' as const;

  constructor(
    readonly cid: string,
    readonly reason: string,
  ) {
    super(`Chain integrity violation for ${cid}: ${reason}`);
  }
}

/** Non-genesis event for a stream that has no row (in the submitting dapp). */
export class UnknownStreamError extends StreamEngineError {
  readonly code = 'UNKNOWN_STREAM' as const;

  constructor(readonly streamId: string) {
    super(`Unknown stream: ${streamId}`);
  }
}

/** The transactional store failed; the transaction was rolled back. */
export class StorageFailureError extends StreamEngineError {
  readonly code = 'STORAGE_FAILURE' as const;

  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Storage failure during ${operation}: ${reason}`, { cause });
  }
}

export function isStreamEngineError(err: unknown): err is StreamEngineError {
  return err instanceof StreamEngineError;
}
