export { redisPlugin, enqueueSubmission, RedisTipNotifier, SUBMISSION_STREAM_KEY, TIP_CHANNEL } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { createDbClient, ensureSchema, PgStreamStore, dbPlugin, events, streams, index_folders } from './db/index.js';
export type { Database, SqlClient, DbPluginOptions } from './db/index.js';
export { InMemoryStreamStore } from './memory/index.js';
export { enginePlugin } from './engine/index.js';
export type { EnginePluginOptions } from './engine/index.js';
export { startConsumer } from './worker/index.js';
export type { ConsumerDeps } from './worker/index.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
