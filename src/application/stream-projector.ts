import jsonpatch from 'fast-json-patch';
import type { Event, JsonObject, JsonValue, LogEntry, StreamState } from '../domain/index.js';
import { ChainIntegrityError, MalformedEventError } from '../domain/index.js';
import { ancestry } from './chain-linker.js';
import { FoldCache } from './fold-cache.js';
import { decodeEnvelope } from './payload.js';
import type { Envelope } from './payload.js';

export const DEFAULT_PROJECTION_CACHE_SIZE = 1024;

const MAX_ACCOUNT_LENGTH = 100;
const MAX_MODEL_ID_LENGTH = 70;

/** Stream-level columns derived from the folded metadata. */
export interface StreamDescriptor {
  readonly account: string | null;
  readonly model_id: string | null;
}

function applyEnvelope(
  streamId: string,
  state: StreamState | undefined,
  event: Event,
  envelope: Envelope,
): StreamState {
  if (envelope.kind === 'genesis') {
    if (state !== undefined) {
      throw new ChainIntegrityError(event.cid, 'genesis envelope after the start of the chain');
    }
    return {
      stream_id: streamId,
      tip: event.cid,
      content: envelope.data ?? {},
      metadata: envelope.header,
      log: [{ cid: event.cid, type: 'genesis' }],
    };
  }

  if (state === undefined) {
    throw new ChainIntegrityError(event.cid, 'chain does not start with a genesis envelope');
  }

  const entry: LogEntry = { cid: event.cid, type: envelope.kind };

  if (envelope.kind === 'anchor') {
    return { ...state, tip: event.cid, log: [...state.log, entry] };
  }

  let content: JsonValue;
  try {
    // validate = true, mutateDocument = false: earlier (cached) states stay untouched
    content = jsonpatch.applyPatch(state.content, envelope.patch, true, false).newDocument;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedEventError('blocks[0]', `patch does not apply: ${reason}`);
  }
  if (content === null) {
    throw new MalformedEventError('blocks[0]', 'patch must not reduce the content to null');
  }

  const metadata: JsonObject = envelope.header === undefined
    ? state.metadata
    : { ...state.metadata, ...envelope.header };

  return { stream_id: streamId, tip: event.cid, content, metadata, log: [...state.log, entry] };
}

/**
 * Folds the accepted chain into stream content.
 *
 * Folding is deterministic: the same target always yields the same content.
 * Intermediate states are cached per (stream, cid) so an advancement by
 * one event only folds that event.
 */
export class StreamProjector {
  private readonly cache: FoldCache<StreamState>;

  constructor(cacheSize: number = DEFAULT_PROJECTION_CACHE_SIZE) {
    this.cache = new FoldCache<StreamState>(cacheSize);
  }

  /**
   * State of `streamId` at `target`, folding from genesis through `chain`
   * (events keyed by cid, containing at least the ancestry of `target`).
   */
  project(streamId: string, chain: ReadonlyMap<string, Event>, target: string): StreamState {
    const path = ancestry(chain, target);

    // Walk forward from the newest cached ancestor (or genesis)
    let state: StreamState | undefined;
    let start = path.length - 1;
    for (let i = 0; i < path.length; i++) {
      const cid = path[i];
      if (cid === undefined) continue;
      const cached = this.cache.get(cacheKey(streamId, cid));
      if (cached !== undefined) {
        state = cached;
        start = i - 1;
        break;
      }
    }

    for (let i = start; i >= 0; i--) {
      const cid = path[i];
      const event = cid === undefined ? undefined : chain.get(cid);
      if (cid === undefined || event === undefined) {
        throw new ChainIntegrityError(target, 'ancestry changed while folding');
      }
      state = applyEnvelope(streamId, state, event, decodeEnvelope(event));
      this.cache.set(cacheKey(streamId, cid), state);
    }

    if (state === undefined) {
      throw new ChainIntegrityError(target, 'empty chain');
    }
    return state;
  }

  /**
   * Folds `event` onto the cached state of its parent. Undefined when that
   * state is not cached, in which case the caller loads the chain and calls
   * `project`.
   */
  extend(streamId: string, event: Event): StreamState | undefined {
    if (event.prev === null) return undefined;
    const parent = this.cache.get(cacheKey(streamId, event.prev));
    if (parent === undefined) return undefined;

    const state = applyEnvelope(streamId, parent, event, decodeEnvelope(event));
    this.cache.set(cacheKey(streamId, event.cid), state);
    return state;
  }

  /** Number of cached intermediate states. */
  get cachedStates(): number {
    return this.cache.size;
  }
}

function cacheKey(streamId: string, cid: string): string {
  return `${streamId}/${cid}`;
}

/**
 * Reads `model` and the first of `controllers` from the folded header.
 */
export function describeState(state: StreamState): StreamDescriptor {
  const model = state.metadata['model'];
  const controllers = state.metadata['controllers'];

  let model_id: string | null = null;
  if (model !== undefined && model !== null) {
    if (typeof model !== 'string' || model.length === 0 || model.length > MAX_MODEL_ID_LENGTH) {
      throw new MalformedEventError('header.model', `must be a string of 1-${MAX_MODEL_ID_LENGTH} characters`);
    }
    model_id = model;
  }

  let account: string | null = null;
  if (Array.isArray(controllers) && controllers.length > 0) {
    const first = controllers[0];
    if (typeof first !== 'string' || first.length === 0 || first.length > MAX_ACCOUNT_LENGTH) {
      throw new MalformedEventError('header.controllers', `must hold strings of 1-${MAX_ACCOUNT_LENGTH} characters`);
    }
    account = first;
  }

  return { account, model_id };
}
