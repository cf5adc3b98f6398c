import type { Event, IndexFolder, JsonValue, Stream } from '../../domain/index.js';
import { StorageFailureError, isStreamEngineError } from '../../domain/index.js';
import type {
  PaginationParams,
  SignalFilters,
  StoreTransaction,
  StreamFilters,
  StreamStore,
  TipUpdate,
} from '../../application/index.js';
import { jsonContains } from '../../application/index.js';

interface Tables {
  events: Map<string, Event>;
  streams: Map<string, Stream>;
  folders: Map<string, IndexFolder>;
}

function emptyTables(): Tables {
  return { events: new Map(), streams: new Map(), folders: new Map() };
}

/**
 * Writes staged on top of the committed tables. Reads see staged rows
 * first; `commit` copies them down.
 */
class MemoryTransaction implements StoreTransaction {
  private readonly staged: Tables = emptyTables();

  constructor(private readonly committed: Tables) {}

  async findEvent(cid: string): Promise<Event | undefined> {
    return this.staged.events.get(cid) ?? this.committed.events.get(cid);
  }

  async findEventsByGenesis(genesis: string): Promise<Event[]> {
    const merged = new Map([...this.committed.events, ...this.staged.events]);
    return [...merged.values()].filter((event) => event.genesis === genesis);
  }

  async findStream(streamId: string): Promise<Stream | undefined> {
    return this.staged.streams.get(streamId) ?? this.committed.streams.get(streamId);
  }

  async findIndexFolder(streamId: string): Promise<IndexFolder | undefined> {
    return this.staged.folders.get(streamId) ?? this.committed.folders.get(streamId);
  }

  async insertEvent(event: Event): Promise<boolean> {
    // Same constraint as the CHECK on events.blocks.
    if (event.blocks.length === 0) {
      throw new Error('events.blocks violates check constraint: empty block array');
    }
    if ((await this.findEvent(event.cid)) !== undefined) return false;
    this.staged.events.set(event.cid, event);
    return true;
  }

  async insertStream(stream: Stream): Promise<boolean> {
    if ((await this.findStream(stream.stream_id)) !== undefined) return false;
    this.staged.streams.set(stream.stream_id, stream);
    return true;
  }

  async compareAndSwapTip(update: TipUpdate): Promise<boolean> {
    const current = await this.findStream(update.stream_id);
    if (current === undefined || current.tip !== update.expected_tip) return false;
    this.staged.streams.set(update.stream_id, {
      ...current,
      tip: update.tip,
      account: update.account,
      model_id: update.model_id,
      content: update.content,
    });
    return true;
  }

  async upsertIndexFolder(folder: IndexFolder): Promise<void> {
    this.staged.folders.set(folder.stream_id, folder);
  }

  commit(): void {
    for (const [cid, event] of this.staged.events) this.committed.events.set(cid, event);
    for (const [id, stream] of this.staged.streams) this.committed.streams.set(id, stream);
    for (const [id, folder] of this.staged.folders) this.committed.folders.set(id, folder);
  }
}

/**
 * In-process `StreamStore` used by tests and local experiments.
 *
 * Transactions are serialized through a promise-chain lock, so a
 * transaction never observes another one half-applied. Throwing inside
 * `fn` discards every staged write.
 */
export class InMemoryStreamStore implements StreamStore {
  private readonly tables: Tables = emptyTables();
  private lock: Promise<void> = Promise.resolve();

  async transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const tx = new MemoryTransaction(this.tables);
      const result = await fn(tx);
      tx.commit();
      return result;
    } catch (err: unknown) {
      if (isStreamEngineError(err)) throw err;
      throw new StorageFailureError('transaction', err);
    } finally {
      release();
    }
  }

  async findEvent(cid: string): Promise<Event | undefined> {
    return this.tables.events.get(cid);
  }

  async findEventsByGenesis(genesis: string): Promise<Event[]> {
    return [...this.tables.events.values()].filter((event) => event.genesis === genesis);
  }

  async findStream(streamId: string): Promise<Stream | undefined> {
    return this.tables.streams.get(streamId);
  }

  async findIndexFolder(streamId: string): Promise<IndexFolder | undefined> {
    return this.tables.folders.get(streamId);
  }

  async listStreams(filters: StreamFilters, pagination: PaginationParams): Promise<Stream[]> {
    return [...this.tables.streams.values()]
      .filter((stream) => stream.model_id === filters.model_id)
      .filter((stream) => filters.account === undefined || stream.account === filters.account)
      .filter((stream) => filters.dapp_id === undefined || stream.dapp_id === filters.dapp_id)
      .sort(byStreamId)
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async queryBySignal(
    predicate: JsonValue,
    filters: SignalFilters,
    pagination: PaginationParams,
  ): Promise<string[]> {
    return [...this.tables.folders.values()]
      .filter((folder) => folder.signal !== null && jsonContains(folder.signal, predicate))
      .filter((folder) => {
        if (filters.dapp_id === undefined) return true;
        return this.tables.streams.get(folder.stream_id)?.dapp_id === filters.dapp_id;
      })
      .map((folder) => folder.stream_id)
      .sort()
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async ping(): Promise<void> {}
}

function byStreamId(a: Stream, b: Stream): number {
  if (a.stream_id < b.stream_id) return -1;
  return a.stream_id > b.stream_id ? 1 : 0;
}
