import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { StreamEngine } from '../../application/index.js';
import type { StreamTypeCode } from '../../domain/index.js';
import { PgStreamStore } from '../db/index.js';
import { RedisTipNotifier } from '../redis/index.js';

export interface EnginePluginOptions {
  projectionCacheSize: number;
  defaultStreamType: StreamTypeCode;
}

/**
 * Wires the stream engine onto the Postgres store and the Redis tip
 * notifier, and decorates `fastify.engine` for the routes.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  const engine = new StreamEngine(new PgStreamStore(fastify.db), {
    log: fastify.log,
    notifier: new RedisTipNotifier(fastify.redis, fastify.log),
    projectionCacheSize: opts.projectionCacheSize,
    defaultStreamType: opts.defaultStreamType,
  });

  fastify.decorate('engine', engine);
}

export default fp(enginePlugin, {
  name: 'engine',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    engine: StreamEngine;
  }
}
