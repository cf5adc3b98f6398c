import { CID } from 'multiformats/cid';
import type { Event } from '../domain/index.js';
import { MalformedEventError } from '../domain/index.js';
import { decodeEnvelope } from './payload.js';
import type { Envelope } from './payload.js';

/** Column width of every cid- and stream-id-valued column. */
export const MAX_CID_LENGTH = 70;

function checkCid(field: string, value: unknown): void {
  if (typeof value !== 'string' || value.length === 0) {
    throw new MalformedEventError(field, 'must be a non-empty string');
  }
  if (value.length > MAX_CID_LENGTH) {
    throw new MalformedEventError(field, `must be at most ${MAX_CID_LENGTH} characters`);
  }
  let canonical: string;
  try {
    canonical = CID.parse(value).toString();
  } catch {
    throw new MalformedEventError(field, `is not a valid CID: ${value}`);
  }
  // Chains are looked up by string equality, so only one spelling per cid is accepted
  if (canonical !== value) {
    throw new MalformedEventError(field, `must use the canonical encoding ${canonical}`);
  }
}

/**
 * Structural checks on an incoming event, run before anything is stored.
 *
 * The cid ↔ content binding is not recomputed; only shape and linkage
 * fields are checked. Returns the decoded payload envelope.
 */
export function validateEvent(event: Event): Envelope {
  checkCid('cid', event.cid);
  checkCid('genesis', event.genesis);

  if (event.prev === null) {
    if (event.genesis !== event.cid) {
      throw new MalformedEventError('genesis', 'must equal cid when prev is null');
    }
  } else {
    checkCid('prev', event.prev);
    if (event.genesis === event.cid) {
      throw new MalformedEventError('prev', 'must be null for a genesis event');
    }
    if (event.prev === event.cid) {
      throw new MalformedEventError('prev', 'must not reference the event itself');
    }
  }

  if (!Array.isArray(event.blocks) || event.blocks.length === 0) {
    throw new MalformedEventError('blocks', 'must not be empty');
  }

  // Submissions arrive from untyped JSON and queues; nulls can slip through.
  const blocks: readonly unknown[] = event.blocks;
  blocks.forEach((block, index) => {
    if (block === null || block === undefined) {
      throw new MalformedEventError(`blocks[${index}]`, 'must not be null');
    }
    if (!(block instanceof Uint8Array)) {
      throw new MalformedEventError(`blocks[${index}]`, 'must be binary');
    }
  });

  return decodeEnvelope(event);
}
