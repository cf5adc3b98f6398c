import type { FastifyReply } from 'fastify';
import { isStreamEngineError } from '../../domain/index.js';
import type { StreamEngineErrorCode } from '../../domain/index.js';

const STATUS_BY_CODE: Record<StreamEngineErrorCode, number> = {
  MALFORMED_EVENT: 400,
  CHAIN_INTEGRITY: 422,
  UNKNOWN_STREAM: 404,
  STORAGE_FAILURE: 503,
};

/**
 * Maps an engine error onto its HTTP status. Anything else is rethrown
 * and ends up in Fastify's default 500 handler.
 */
export function replyWithEngineError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!isStreamEngineError(err)) throw err;

  const status = STATUS_BY_CODE[err.code];
  if (status >= 500) {
    reply.log.error({ err }, 'Storage failure');
  }
  return reply.status(status).send({ error: err.message, code: err.code });
}
