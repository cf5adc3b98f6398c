import type { SqlClient } from './client.js';

/**
 * Idempotent DDL run at boot by both the server and the worker.
 *
 * drizzle-kit migrations (`npm run db:generate`) produce the same tables
 * from schema.ts; this keeps a fresh local database usable without them.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      cid      VARCHAR(70) PRIMARY KEY,
      prev     VARCHAR(70),
      genesis  VARCHAR(70) NOT NULL,
      blocks   BYTEA[]     NOT NULL
               CHECK (blocks <> '{}' AND array_position(blocks, NULL) IS NULL)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS streams (
      stream_id  VARCHAR(70)  PRIMARY KEY,
      dapp_id    UUID         NOT NULL,
      tip        VARCHAR(70)  NOT NULL,
      account    VARCHAR(100),
      model_id   VARCHAR(70),
      content    JSONB        NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS index_folders (
      stream_id  VARCHAR(70) PRIMARY KEY,
      tip        VARCHAR(70) NOT NULL,
      signal     JSONB
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_genesis ON events (genesis)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_streams_model_account ON streams (model_id, account)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_index_folders_signal ON index_folders USING GIN (signal)`);
}
