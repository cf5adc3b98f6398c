import { z } from 'zod';
import type { EventSubmission } from '../domain/index.js';

/**
 * Zod schema for an event submission as it arrives over HTTP or the
 * ingestion queue.
 *
 * Only the wire shape is checked here: strings where strings belong and
 * base64 block bodies. Chain rules (genesis/prev consistency, CID syntax,
 * envelope decoding) are enforced by the engine so that both entry points
 * report them the same way.
 */
export const eventSubmissionSchema = z.object({
  cid: z.string(),
  prev: z.string().nullable(),
  genesis: z.string(),
  blocks: z.array(z.string().base64({ message: 'Must be base64 encoded' })),
  dapp_id: z.string().uuid(),
  stream_type: z.number().int().min(0).optional(),
});

export type EventSubmissionInput = z.infer<typeof eventSubmissionSchema>;

/** A batch is rejected as a whole when any element fails the wire check. */
export const eventBatchSchema = z
  .array(eventSubmissionSchema)
  .min(1, 'Batch must contain at least one event')
  .max(500, 'Batch must contain at most 500 events');

/** Decodes base64 blocks into bytes. */
export function toSubmission(input: EventSubmissionInput): EventSubmission {
  return {
    event: {
      cid: input.cid,
      prev: input.prev,
      genesis: input.genesis,
      blocks: input.blocks.map((block) => new Uint8Array(Buffer.from(block, 'base64'))),
    },
    dapp_id: input.dapp_id,
    stream_type: input.stream_type,
  };
}

export function encodeBlock(block: Uint8Array): string {
  return Buffer.from(block).toString('base64');
}
