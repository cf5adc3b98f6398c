import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { signalQuerySchema, clampPagination } from '../../application/index.js';
import { replyWithEngineError } from './error-reply.js';

/**
 * POST /api/v1/index-folders/query
 *
 * Body: { signal, dapp_id?, limit?, offset? }. Returns the ids of streams
 * whose index signal contains `signal`.
 */
async function indexFolderRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post(
    '/api/v1/index-folders/query',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = signalQuerySchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { signal, ...params } = parsed.data;
      try {
        const data = await fastify.engine.queryBySignal(signal, params);
        return reply.status(200).send({
          data,
          pagination: { ...clampPagination(params), count: data.length },
        });
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );
}

export default fp(indexFolderRoutes, {
  name: 'index-folder-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
