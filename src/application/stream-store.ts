import type { Event, IndexFolder, JsonValue, Stream } from '../domain/index.js';

export interface PaginationParams {
  limit: number;
  offset: number;
}

export interface StreamFilters {
  model_id: string;
  account?: string;
  dapp_id?: string;
}

export interface SignalFilters {
  dapp_id?: string;
}

/** Conditional tip update: applies only while the stored tip equals `expected_tip`. */
export interface TipUpdate {
  readonly stream_id: string;
  readonly expected_tip: string;
  readonly tip: string;
  readonly account: string | null;
  readonly model_id: string | null;
  readonly content: JsonValue;
}

/** Point reads available both inside and outside a transaction. */
export interface StoreReader {
  findEvent(cid: string): Promise<Event | undefined>;
  /** Every stored event sharing this genesis, accepted or not, in no particular order. */
  findEventsByGenesis(genesis: string): Promise<Event[]>;
  findStream(streamId: string): Promise<Stream | undefined>;
  findIndexFolder(streamId: string): Promise<IndexFolder | undefined>;
}

/** Writes are only reachable through a transaction. */
export interface StoreTransaction extends StoreReader {
  /** Insert-if-absent on `cid`. Returns false when the cid was already stored. */
  insertEvent(event: Event): Promise<boolean>;
  /** Insert-if-absent on `stream_id`. Returns false when the stream already exists. */
  insertStream(stream: Stream): Promise<boolean>;
  /** Atomic compare-and-swap on `streams.tip`. Returns false when the expected tip no longer matches. */
  compareAndSwapTip(update: TipUpdate): Promise<boolean>;
  upsertIndexFolder(folder: IndexFolder): Promise<void>;
}

/**
 * Transactional storage behind the engine.
 *
 * `transaction` commits when `fn` resolves and rolls back when it throws;
 * driver failures surface as `StorageFailureError`, engine errors pass through.
 */
export interface StreamStore extends StoreReader {
  transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  listStreams(filters: StreamFilters, pagination: PaginationParams): Promise<Stream[]>;
  /** Stream ids whose index signal contains `predicate` (JSON containment). */
  queryBySignal(
    predicate: JsonValue,
    filters: SignalFilters,
    pagination: PaginationParams,
  ): Promise<string[]>;
  /** Throws when the backing store is unreachable. */
  ping(): Promise<void>;
}
