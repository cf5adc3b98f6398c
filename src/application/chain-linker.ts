import type { Event } from '../domain/index.js';
import { ChainIntegrityError } from '../domain/index.js';
import type { StoreReader } from './stream-store.js';

export interface Linkage {
  /** The same cid as already stored, if this is a resubmission. */
  readonly existing: Event | undefined;
  /** The stored predecessor; undefined for a genesis event. */
  readonly parent: Event | undefined;
}

/**
 * Checks that an event extends a known chain.
 *
 * A genesis event links to nothing. Any other event needs a stored
 * predecessor with the same genesis. Because the predecessor has to be
 * stored first, a cycle can never be formed.
 */
export async function linkEvent(reader: StoreReader, event: Event): Promise<Linkage> {
  const existing = await reader.findEvent(event.cid);
  if (existing !== undefined && (existing.prev !== event.prev || existing.genesis !== event.genesis)) {
    throw new ChainIntegrityError(event.cid, 'cid is already stored with different prev/genesis');
  }

  if (event.prev === null) {
    return { existing, parent: undefined };
  }

  const parent = await reader.findEvent(event.prev);
  if (parent === undefined) {
    throw new ChainIntegrityError(event.cid, `unknown prev ${event.prev}`);
  }
  if (parent.genesis !== event.genesis) {
    throw new ChainIntegrityError(
      event.cid,
      `prev ${event.prev} belongs to genesis ${parent.genesis}, not ${event.genesis}`,
    );
  }

  return { existing, parent };
}

/** Indexes a set of events by cid. */
export function toChain(events: Iterable<Event>): Map<string, Event> {
  const chain = new Map<string, Event>();
  for (const event of events) {
    chain.set(event.cid, event);
  }
  return chain;
}

/**
 * Cids from `tip` back to the genesis, newest first.
 *
 * Throws if an ancestor is missing from `chain` or a cycle is found.
 */
export function ancestry(chain: ReadonlyMap<string, Event>, tip: string): string[] {
  const path: string[] = [];
  const seen = new Set<string>();
  let cursor: string | null = tip;

  while (cursor !== null) {
    if (seen.has(cursor)) {
      throw new ChainIntegrityError(cursor, 'cycle in prev links');
    }
    const event = chain.get(cursor);
    if (event === undefined) {
      throw new ChainIntegrityError(cursor, 'missing from the stored chain');
    }
    seen.add(cursor);
    path.push(cursor);
    cursor = event.prev;
  }

  return path;
}
