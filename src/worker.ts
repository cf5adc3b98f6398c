import { Redis } from 'ioredis';
import pino from 'pino';
import { StreamEngine } from './application/index.js';
import {
  createDbClient,
  ensureSchema,
  loadConfig,
  PgStreamStore,
  RedisTipNotifier,
  startConsumer,
} from './infrastructure/index.js';

/**
 * Standalone worker process that resolves queued submissions from the
 * Redis stream against PostgreSQL.
 *
 * Runs independently of the Fastify HTTP server and can be scaled
 * horizontally by launching multiple instances with different WORKER_ID
 * values; concurrent submissions to one stream are settled by the tip
 * compare-and-swap, not by the queue.
 */
const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });

const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(config.DATABASE_URL);

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql);
  log.info('Database ready (events + streams + index_folders tables)');

  const engine = new StreamEngine(new PgStreamStore(db), {
    log,
    notifier: new RedisTipNotifier(redis, log),
    projectionCacheSize: config.PROJECTION_CACHE_SIZE,
    defaultStreamType: config.DEFAULT_STREAM_TYPE,
  });

  await startConsumer({ redis, engine, log, consumerName: config.WORKER_ID }, ac.signal);
}

async function closeConnections(): Promise<void> {
  const results = await Promise.allSettled([redis.quit(), sql.end()]);
  for (const result of results) {
    if (result.status === 'rejected') {
      log.warn({ err: result.reason }, 'Error while closing connection');
    }
  }
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give the in-flight XREADGROUP (BLOCK 5s) a moment, then force exit
  setTimeout(() => {
    void closeConnections().then(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
