import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health: database and Redis reachability.
 * 200 when both answer, 503 with the failing side marked otherwise.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let database: 'ok' | 'unreachable' = 'ok';
      let redis: 'ok' | 'unreachable' = 'ok';

      try {
        await fastify.engine.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Database health check failed');
        database = 'unreachable';
      }

      try {
        await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        redis = 'unreachable';
      }

      const healthy = database === 'ok' && redis === 'ok';
      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'ok' : 'degraded',
        database,
        redis,
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['redis', 'engine'],
  fastify: '5.x',
});
