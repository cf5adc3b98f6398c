import Fastify from 'fastify';

import {
  redisPlugin,
  dbPlugin,
  enginePlugin,
  loadConfig,
} from './infrastructure/index.js';

import {
  eventRoutes,
  streamRoutes,
  indexFolderRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration (fails fast on bad env)
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: config.REDIS_URL });
  await fastify.register(dbPlugin, { databaseUrl: config.DATABASE_URL });
  await fastify.register(enginePlugin, {
    projectionCacheSize: config.PROJECTION_CACHE_SIZE,
    defaultStreamType: config.DEFAULT_STREAM_TYPE,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);
  await fastify.register(streamRoutes);
  await fastify.register(indexFolderRoutes);
  await fastify.register(healthRoutes);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down server...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
