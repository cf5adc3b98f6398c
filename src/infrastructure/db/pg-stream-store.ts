import { and, asc, eq, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { Event, IndexFolder, JsonValue, Stream } from '../../domain/index.js';
import { StorageFailureError, isStreamEngineError } from '../../domain/index.js';
import type {
  PaginationParams,
  SignalFilters,
  StoreReader,
  StoreTransaction,
  StreamFilters,
  StreamStore,
  TipUpdate,
} from '../../application/index.js';
import type { Database } from './client.js';
import * as schema from './schema.js';
import { events, index_folders, streams } from './schema.js';

/** Either the pooled database or an open transaction. */
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

type EventRow = typeof events.$inferSelect;
type StreamRow = typeof streams.$inferSelect;

function toEvent(row: EventRow): Event {
  return { cid: row.cid, prev: row.prev, genesis: row.genesis, blocks: row.blocks };
}

function toStream(row: StreamRow): Stream {
  return {
    stream_id: row.stream_id,
    dapp_id: row.dapp_id,
    tip: row.tip,
    account: row.account,
    model_id: row.model_id,
    content: row.content,
  };
}

/** `ARRAY[$1, $2, …]::bytea[]`; drizzle's array serializer would stringify the buffers. */
export function byteaArray(blocks: readonly Uint8Array[]): SQL {
  return sql`ARRAY[${sql.join(blocks.map((block) => sql`${Buffer.from(block)}`), sql`, `)}]::bytea[]`;
}

/** Engine errors pass through untouched; anything else is a storage failure. */
function toStorageError(operation: string, err: unknown): Error {
  if (isStreamEngineError(err)) return err;
  return new StorageFailureError(operation, err);
}

class PgReader implements StoreReader {
  constructor(protected readonly db: Executor) {}

  async findEvent(cid: string): Promise<Event | undefined> {
    const [row] = await this.db.select().from(events).where(eq(events.cid, cid)).limit(1);
    return row === undefined ? undefined : toEvent(row);
  }

  async findEventsByGenesis(genesis: string): Promise<Event[]> {
    const rows = await this.db.select().from(events).where(eq(events.genesis, genesis));
    return rows.map(toEvent);
  }

  async findStream(streamId: string): Promise<Stream | undefined> {
    const [row] = await this.db.select().from(streams).where(eq(streams.stream_id, streamId)).limit(1);
    return row === undefined ? undefined : toStream(row);
  }

  async findIndexFolder(streamId: string): Promise<IndexFolder | undefined> {
    const [row] = await this.db
      .select()
      .from(index_folders)
      .where(eq(index_folders.stream_id, streamId))
      .limit(1);
    return row === undefined ? undefined : { stream_id: row.stream_id, tip: row.tip, signal: row.signal };
  }
}

class PgTransactionScope extends PgReader implements StoreTransaction {
  async insertEvent(event: Event): Promise<boolean> {
    const inserted = await this.db
      .insert(events)
      .values({
        cid: event.cid,
        prev: event.prev,
        genesis: event.genesis,
        blocks: byteaArray(event.blocks),
      })
      .onConflictDoNothing({ target: events.cid })
      .returning({ cid: events.cid });
    return inserted.length === 1;
  }

  async insertStream(stream: Stream): Promise<boolean> {
    const inserted = await this.db
      .insert(streams)
      .values({ ...stream })
      .onConflictDoNothing({ target: streams.stream_id })
      .returning({ stream_id: streams.stream_id });
    return inserted.length === 1;
  }

  async compareAndSwapTip(update: TipUpdate): Promise<boolean> {
    const updated = await this.db
      .update(streams)
      .set({
        tip: update.tip,
        account: update.account,
        model_id: update.model_id,
        content: update.content,
      })
      .where(and(eq(streams.stream_id, update.stream_id), eq(streams.tip, update.expected_tip)))
      .returning({ stream_id: streams.stream_id });
    return updated.length === 1;
  }

  async upsertIndexFolder(folder: IndexFolder): Promise<void> {
    await this.db
      .insert(index_folders)
      .values({ stream_id: folder.stream_id, tip: folder.tip, signal: folder.signal })
      .onConflictDoUpdate({
        target: index_folders.stream_id,
        set: { tip: folder.tip, signal: folder.signal },
      });
  }
}

/**
 * PostgreSQL-backed `StreamStore`.
 *
 * Each `transaction` is one drizzle transaction at READ COMMITTED: the
 * conditional UPDATE in `compareAndSwapTip` re-checks `tip` after waiting
 * on a concurrent writer, so exactly one of two racing advances wins.
 */
export class PgStreamStore implements StreamStore {
  private readonly reader: PgReader;

  constructor(private readonly db: Database) {
    this.reader = new PgReader(db);
  }

  async transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((tx) => fn(new PgTransactionScope(tx)));
    } catch (err: unknown) {
      throw toStorageError('transaction', err);
    }
  }

  findEvent(cid: string): Promise<Event | undefined> {
    return this.read('findEvent', () => this.reader.findEvent(cid));
  }

  findEventsByGenesis(genesis: string): Promise<Event[]> {
    return this.read('findEventsByGenesis', () => this.reader.findEventsByGenesis(genesis));
  }

  findStream(streamId: string): Promise<Stream | undefined> {
    return this.read('findStream', () => this.reader.findStream(streamId));
  }

  findIndexFolder(streamId: string): Promise<IndexFolder | undefined> {
    return this.read('findIndexFolder', () => this.reader.findIndexFolder(streamId));
  }

  listStreams(filters: StreamFilters, pagination: PaginationParams): Promise<Stream[]> {
    const conditions: SQL[] = [eq(streams.model_id, filters.model_id)];
    if (filters.account !== undefined) {
      conditions.push(eq(streams.account, filters.account));
    }
    if (filters.dapp_id !== undefined) {
      conditions.push(eq(streams.dapp_id, filters.dapp_id));
    }

    return this.read('listStreams', async () => {
      const rows = await this.db
        .select()
        .from(streams)
        .where(and(...conditions))
        .orderBy(asc(streams.stream_id))
        .limit(pagination.limit)
        .offset(pagination.offset);
      return rows.map(toStream);
    });
  }

  queryBySignal(
    predicate: JsonValue,
    filters: SignalFilters,
    pagination: PaginationParams,
  ): Promise<string[]> {
    const conditions: SQL[] = [sql`${index_folders.signal} @> ${JSON.stringify(predicate)}::jsonb`];
    if (filters.dapp_id !== undefined) {
      conditions.push(eq(streams.dapp_id, filters.dapp_id));
    }

    return this.read('queryBySignal', async () => {
      const rows = await this.db
        .select({ stream_id: index_folders.stream_id })
        .from(index_folders)
        .innerJoin(streams, eq(streams.stream_id, index_folders.stream_id))
        .where(and(...conditions))
        .orderBy(asc(index_folders.stream_id))
        .limit(pagination.limit)
        .offset(pagination.offset);
      return rows.map((row) => row.stream_id);
    });
  }

  async ping(): Promise<void> {
    await this.read('ping', () => this.db.execute(sql`select 1`));
  }

  private async read<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (err: unknown) {
      throw toStorageError(operation, err);
    }
  }
}
