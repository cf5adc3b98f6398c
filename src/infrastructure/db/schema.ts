import { customType, pgTable, uuid, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import type { JsonValue } from '../../domain/index.js';

/**
 * Driver value of a `bytea` to `Uint8Array`. postgres.js hands back Buffers;
 * the hex text form (`\x…`) shows up when an array is returned unparsed.
 */
export function byteaFromDriver(value: Buffer | Uint8Array | string): Uint8Array {
  if (typeof value === 'string') {
    return new Uint8Array(Buffer.from(value.startsWith('\\x') ? value.slice(2) : value, 'hex'));
  }
  return new Uint8Array(value);
}

export const bytea = customType<{ data: Uint8Array; driverData: Buffer | Uint8Array | string }>({
  dataType() {
    return 'bytea';
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver: byteaFromDriver,
});

/**
 * Content-addressed event blocks.
 *
 * `cid` is the natural primary key, so storing the same event twice is an
 * ON CONFLICT DO NOTHING. The non-empty / no-null CHECK on `blocks` lives
 * in the DDL of ensure-schema.ts.
 */
export const events = pgTable('events', {
  cid: varchar('cid', { length: 70 }).primaryKey(),
  prev: varchar('prev', { length: 70 }),
  genesis: varchar('genesis', { length: 70 }).notNull(),
  blocks: bytea('blocks').array().notNull(),
}, (table) => [
  index('idx_events_genesis').on(table.genesis),
]);

/** One row per stream; `tip` only moves by compare-and-swap. */
export const streams = pgTable('streams', {
  stream_id: varchar('stream_id', { length: 70 }).primaryKey(),
  dapp_id: uuid('dapp_id').notNull(),
  tip: varchar('tip', { length: 70 }).notNull(),
  account: varchar('account', { length: 100 }),
  model_id: varchar('model_id', { length: 70 }),
  content: jsonb('content').$type<JsonValue>().notNull(),
}, (table) => [
  index('idx_streams_model_account').on(table.model_id, table.account),
]);

/** Searchable signal per stream, written in the same transaction as `streams.tip`. */
export const index_folders = pgTable('index_folders', {
  stream_id: varchar('stream_id', { length: 70 }).primaryKey(),
  tip: varchar('tip', { length: 70 }).notNull(),
  signal: jsonb('signal').$type<JsonValue>(),
}, (table) => [
  index('idx_index_folders_signal').using('gin', table.signal),
]);
