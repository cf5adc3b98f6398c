import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  eventSubmissionSchema,
  eventBatchSchema,
  toSubmission,
  encodeBlock,
} from '../../application/index.js';
import { enqueueSubmission } from '../../infrastructure/index.js';
import type { Event } from '../../domain/index.js';
import { replyWithEngineError } from './error-reply.js';

/** Event as served over HTTP: blocks in base64. */
export function toEventBody(event: Event) {
  return {
    cid: event.cid,
    prev: event.prev,
    genesis: event.genesis,
    blocks: event.blocks.map(encodeBlock),
  };
}

/**
 * Registers the event routes.
 *
 * POST /api/v1/events: synchronous submission
 * POST /api/v1/events/batch: queued submission (Redis stream)
 * GET /api/v1/events/:cid: stored event by cid, accepted or not
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Single submission.
   *
   * Validates → submits in one transaction → returns the SubmitResult.
   * A lost tip race is still a 200; the body says `conflict`.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSubmissionSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const result = await fastify.engine.submitEvent(toSubmission(parsed.data));
        return reply.status(200).send(result);
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );

  /**
   * Batch submission.
   *
   * Validates the full array up-front; on any validation failure the
   * entire batch is rejected. Accepted entries are enqueued in order and
   * resolved by the worker.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      // Sequential: entries of one chain must reach the stream in submission order.
      const entryIds: string[] = [];
      try {
        for (const submission of parsed.data) {
          entryIds.push(await enqueueSubmission(fastify.redis, submission));
        }
      } catch (err: unknown) {
        fastify.log.error({ err, enqueued: entryIds.length }, 'Failed to enqueue submissions');
        return reply.status(503).send({
          error: 'Queue unavailable',
          enqueued: entryIds.length,
        });
      }

      return reply.status(202).send({
        status: 'accepted',
        count: parsed.data.length,
        cids: parsed.data.map((submission) => submission.cid),
      });
    },
  );

  fastify.get(
    '/api/v1/events/:cid',
    async (
      request: FastifyRequest<{ Params: { cid: string } }>,
      reply: FastifyReply,
    ) => {
      try {
        const event = await fastify.engine.getEvent(request.params.cid);
        if (event === null) {
          return reply.status(404).send({ error: 'Event not found' });
        }
        return reply.status(200).send(toEventBody(event));
      } catch (err: unknown) {
        return replyWithEngineError(reply, err);
      }
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['redis', 'engine'],
  fastify: '5.x',
});
