import { z } from 'zod';
import { jsonValueSchema } from './payload.js';

// Out-of-range values are clamped by the engine, not rejected.
const limit = z.coerce.number().int().optional();
const offset = z.coerce.number().int().optional();

/** Body of POST /api/v1/index-folders/query. */
export const signalQuerySchema = z.object({
  signal: jsonValueSchema,
  dapp_id: z.string().uuid().optional(),
  limit,
  offset,
});

export type SignalQueryInput = z.infer<typeof signalQuerySchema>;

/** Querystring of GET /api/v1/streams. */
export const listStreamsQuerySchema = z.object({
  model_id: z.string().min(1).max(70),
  account: z.string().min(1).max(100).optional(),
  dapp_id: z.string().uuid().optional(),
  limit,
  offset,
});

export type ListStreamsQueryInput = z.infer<typeof listStreamsQuerySchema>;
