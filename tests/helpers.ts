import { vi } from 'vitest';
import { CID } from 'multiformats/cid';
import * as json from 'multiformats/codecs/json';
import { sha256 } from 'multiformats/hashes/sha2';
import type { Operation } from 'fast-json-patch';
import type { Event, EventSubmission, JsonObject, JsonValue } from '../src/domain/index.js';
import { encodePayload } from '../src/application/index.js';

export const DAPP_ID = 'aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee';
export const OTHER_DAPP_ID = 'bbbbbbbb-cccc-4ddd-8eee-ffffffffffff';

/** Deterministic CIDv1 (json codec, sha2-256) over an arbitrary JSON value. */
export async function cidFor(value: JsonValue): Promise<string> {
  const digest = await sha256.digest(json.encode(value));
  return CID.create(1, json.code, digest).toString();
}

/** Genesis event; vary `header.unique` to mint independent streams. */
export async function makeGenesis(header: JsonObject = {}, data?: JsonValue): Promise<Event> {
  const body: JsonObject = data === undefined ? { header } : { header, data };
  const cid = await cidFor({ prev: null, body });
  return { cid, prev: null, genesis: cid, blocks: [encodePayload(body)] };
}

/** Signed commit applying `ops` on top of `parent`. */
export async function makeSigned(parent: Event, ops: Operation[], header?: JsonObject): Promise<Event> {
  const patch: JsonValue = ops.map(toJson);
  const body: JsonObject = header === undefined ? { data: patch } : { header, data: patch };
  const cid = await cidFor({ prev: parent.cid, body });
  return { cid, prev: parent.cid, genesis: parent.genesis, blocks: [encodePayload(body)] };
}

/** Anchor commit on top of `parent`. */
export async function makeAnchor(parent: Event, proof: string): Promise<Event> {
  const body: JsonObject = { proof };
  const cid = await cidFor({ prev: parent.cid, body });
  return { cid, prev: parent.cid, genesis: parent.genesis, blocks: [encodePayload(body)] };
}

export function submission(event: Event, dappId: string = DAPP_ID): EventSubmission {
  return { event, dapp_id: dappId };
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as import('pino').Logger;
}

function toJson(op: Operation): JsonValue {
  const parsed: JsonValue = JSON.parse(JSON.stringify(op));
  return parsed;
}
