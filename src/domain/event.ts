/**
 * Core domain types for the stream resolution model.
 *
 * An Event is an immutable, content-addressed record. A Stream is the
 * mutable projection of one chain of events, identified by a stream id
 * derived from its genesis event. None of these types carry framework
 * dependencies.
 */

/** Opaque JSON document (stream content, signal, header metadata). */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Canonical Event entity.
 *
 * `prev` is null only for the genesis event, whose `genesis` equals its own `cid`.
 * `blocks` is never empty; `blocks[0]` holds the payload envelope.
 */
export interface Event {
  readonly cid: string;
  readonly prev: string | null;
  readonly genesis: string;
  readonly blocks: readonly Uint8Array[];
}

/** Mutable projection of one event chain. */
export interface Stream {
  readonly stream_id: string;
  readonly dapp_id: string;
  readonly tip: string;
  readonly account: string | null;
  readonly model_id: string | null;
  readonly content: JsonValue;
}

/** Secondary index entry kept in lock-step with `Stream.tip`. */
export interface IndexFolder {
  readonly stream_id: string;
  readonly tip: string;
  readonly signal: JsonValue | null;
}

export type LogEntryType = 'genesis' | 'signed' | 'anchor';

export interface LogEntry {
  readonly cid: string;
  readonly type: LogEntryType;
}

/** Fully folded view of a stream at a given commit. */
export interface StreamState {
  readonly stream_id: string;
  readonly tip: string;
  readonly content: JsonValue;
  readonly metadata: JsonObject;
  readonly log: readonly LogEntry[];
}

/** An event together with the tenant context it is submitted under. */
export interface EventSubmission {
  readonly event: Event;
  readonly dapp_id: string;
  /** Stream type used to derive the stream id. Defaults to model instance document. */
  readonly stream_type?: number | undefined;
}

export type SubmitStatus = 'applied' | 'conflict' | 'duplicate';

/**
 * Outcome of a submission.
 *
 * `conflict` means the event is stored but the tip moved on before it
 * could be applied; the caller resubmits against `tip`.
 */
export interface SubmitResult {
  readonly applied: boolean;
  readonly status: SubmitStatus;
  readonly stream_id: string;
  readonly tip: string;
}

/** Payload published after a tip advancement commits. */
export interface TipAdvanced {
  readonly stream_id: string;
  readonly dapp_id: string;
  readonly tip: string;
  readonly prev: string | null;
  readonly model_id: string | null;
}
