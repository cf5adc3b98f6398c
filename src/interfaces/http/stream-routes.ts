import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listStreamsQuerySchema, clampPagination } from '../../application/index.js';
import { toEventBody } from './event-routes.js';
import { replyWithEngineError } from './error-reply.js';

type StreamParams = { Params: { stream_id: string } };

/**
 * Read-only stream routes.
 *
 * GET /api/v1/streams: streams of a model, paginated
 * GET /api/v1/streams/:stream_id: stream row
 * GET /api/v1/streams/:stream_id/state: folded state at the tip or `at`
 * GET /api/v1/streams/:stream_id/events: accepted chain, genesis first
 */
async function streamRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/v1/streams
   *
   * Query params: model_id (required), account, dapp_id, limit, offset
   */
  fastify.get(
    '/api/v1/streams',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = listStreamsQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const data = await fastify.engine.listStreams(parsed.data);
        return reply.status(200).send({
          data,
          pagination: { ...clampPagination(parsed.data), count: data.length },
        });
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );

  fastify.get(
    '/api/v1/streams/:stream_id',
    async (request: FastifyRequest<StreamParams>, reply: FastifyReply) => {
      try {
        const stream = await fastify.engine.getStream(request.params.stream_id);
        if (stream === null) {
          return reply.status(404).send({ error: 'Stream not found' });
        }
        return reply.status(200).send(stream);
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );

  /**
   * GET /api/v1/streams/:stream_id/state?at=<cid>
   *
   * `at` may name any stored commit of the stream, including conflict losers.
   */
  fastify.get(
    '/api/v1/streams/:stream_id/state',
    async (
      request: FastifyRequest<StreamParams & { Querystring: { at?: string } }>,
      reply: FastifyReply,
    ) => {
      const at = request.query.at;
      if (at !== undefined && at.length === 0) {
        return reply.status(400).send({ error: 'at must not be empty' });
      }

      try {
        const state = await fastify.engine.getStreamState(request.params.stream_id, at);
        if (state === null) {
          return reply.status(404).send({ error: 'Stream not found' });
        }
        return reply.status(200).send(state);
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );

  fastify.get(
    '/api/v1/streams/:stream_id/events',
    async (request: FastifyRequest<StreamParams>, reply: FastifyReply) => {
      try {
        const log = await fastify.engine.getEventLog(request.params.stream_id);
        if (log === null) {
          return reply.status(404).send({ error: 'Stream not found' });
        }
        return reply.status(200).send({ data: log.map(toEventBody) });
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );
}

export default fp(streamRoutes, {
  name: 'stream-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
