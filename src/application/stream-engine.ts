import type { BaseLogger } from 'pino';
import type {
  Event,
  EventSubmission,
  JsonValue,
  Stream,
  StreamState,
  SubmitResult,
  TipAdvanced,
} from '../domain/index.js';
import {
  ChainIntegrityError,
  DEFAULT_STREAM_TYPE,
  MalformedEventError,
  StreamId,
  isStreamType,
} from '../domain/index.js';
import type { StreamTypeCode } from '../domain/index.js';
import { ancestry, toChain } from './chain-linker.js';
import { MAX_CID_LENGTH, validateEvent } from './event-validator.js';
import { clampPagination } from './pagination.js';
import { DEFAULT_PROJECTION_CACHE_SIZE, StreamProjector } from './stream-projector.js';
import type { StreamStore } from './stream-store.js';
import { resolveTip } from './tip-resolver.js';

/** Receives committed tip advancements. Implementations must not throw for delivery failures. */
export interface TipNotifier {
  publish(update: TipAdvanced): Promise<void>;
}

export interface StreamEngineOptions {
  log?: BaseLogger | undefined;
  notifier?: TipNotifier | undefined;
  projectionCacheSize?: number | undefined;
  defaultStreamType?: StreamTypeCode | undefined;
}

export interface ListStreamsParams {
  model_id: string;
  account?: string | undefined;
  dapp_id?: string | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
}

export interface QueryBySignalParams {
  dapp_id?: string | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
}

/**
 * The stream resolution engine: one handle per serving process, wrapping
 * a store, a projector cache and an optional notifier.
 *
 * `submitEvent` is the only write path. Everything it does for one event
 * (store event, create or advance the stream, update the index folder)
 * commits or rolls back together.
 */
export class StreamEngine {
  private readonly projector: StreamProjector;
  private readonly log: BaseLogger | undefined;
  private readonly notifier: TipNotifier | undefined;
  private readonly defaultStreamType: StreamTypeCode;

  constructor(
    private readonly store: StreamStore,
    options: StreamEngineOptions = {},
  ) {
    this.projector = new StreamProjector(options.projectionCacheSize ?? DEFAULT_PROJECTION_CACHE_SIZE);
    this.log = options.log;
    this.notifier = options.notifier;
    this.defaultStreamType = options.defaultStreamType ?? DEFAULT_STREAM_TYPE;
  }

  /** Stream id an event belongs to under the given (or default) stream type. */
  streamIdOf(event: Event, streamType?: number): string {
    const type = streamType ?? this.defaultStreamType;
    if (!isStreamType(type)) {
      throw new MalformedEventError('stream_type', `unknown stream type ${type}`);
    }
    const streamId = StreamId.fromGenesis(type, event.genesis).toString();
    // The id adds a few bytes to the genesis cid; long cids can overflow the id columns
    if (streamId.length > MAX_CID_LENGTH) {
      throw new MalformedEventError('cid', `derived stream id exceeds ${MAX_CID_LENGTH} characters`);
    }
    return streamId;
  }

  async submitEvent(submission: EventSubmission): Promise<SubmitResult> {
    const { event, dapp_id } = submission;

    validateEvent(event);
    if (dapp_id.length === 0) {
      throw new MalformedEventError('dapp_id', 'must not be empty');
    }
    const streamId = this.streamIdOf(event, submission.stream_type);

    const { result, advanced } = await this.store.transaction((tx) =>
      resolveTip(tx, { event, streamId, dappId: dapp_id, projector: this.projector }),
    );

    if (result.status === 'conflict') {
      this.log?.info(
        { stream_id: streamId, cid: event.cid, prev: event.prev, tip: result.tip },
        'Event stored but not applied: tip has moved',
      );
    } else {
      this.log?.debug({ stream_id: streamId, cid: event.cid, status: result.status }, 'Event submitted');
    }

    if (advanced !== undefined) {
      await this.notify(advanced);
    }

    return result;
  }

  async getStream(streamId: string): Promise<Stream | null> {
    const stream = await this.store.findStream(streamId);
    return stream ?? null;
  }

  /** Stream ids whose index signal contains `predicate`. */
  async queryBySignal(predicate: JsonValue, params: QueryBySignalParams = {}): Promise<string[]> {
    const pagination = clampPagination(params);
    const filters = params.dapp_id === undefined ? {} : { dapp_id: params.dapp_id };
    return this.store.queryBySignal(predicate, filters, pagination);
  }

  async listStreams(params: ListStreamsParams): Promise<Stream[]> {
    const pagination = clampPagination(params);
    return this.store.listStreams(
      {
        model_id: params.model_id,
        ...(params.account === undefined ? {} : { account: params.account }),
        ...(params.dapp_id === undefined ? {} : { dapp_id: params.dapp_id }),
      },
      pagination,
    );
  }

  async getEvent(cid: string): Promise<Event | null> {
    const event = await this.store.findEvent(cid);
    return event ?? null;
  }

  /**
   * Folded state at the tip, or at `at` when given. `at` must be a commit
   * of this stream, accepted or not.
   */
  async getStreamState(streamId: string, at?: string): Promise<StreamState | null> {
    const stream = await this.store.findStream(streamId);
    if (stream === undefined) return null;

    const genesis = StreamId.parse(streamId).genesis.toString();
    const chain = toChain(await this.store.findEventsByGenesis(genesis));
    const target = at ?? stream.tip;

    if (!chain.has(target)) {
      throw new ChainIntegrityError(target, `not a commit of stream ${streamId}`);
    }
    return this.projector.project(streamId, chain, target);
  }

  /** Accepted chain, genesis first. */
  async getEventLog(streamId: string): Promise<Event[] | null> {
    const stream = await this.store.findStream(streamId);
    if (stream === undefined) return null;

    const genesis = StreamId.parse(streamId).genesis.toString();
    const chain = toChain(await this.store.findEventsByGenesis(genesis));

    const events: Event[] = [];
    for (const cid of ancestry(chain, stream.tip).reverse()) {
      const event = chain.get(cid);
      if (event !== undefined) events.push(event);
    }
    return events;
  }

  async ping(): Promise<void> {
    await this.store.ping();
  }

  private async notify(update: TipAdvanced): Promise<void> {
    if (this.notifier === undefined) return;
    try {
      await this.notifier.publish(update);
    } catch (err: unknown) {
      this.log?.warn({ err, stream_id: update.stream_id, tip: update.tip }, 'Tip notification failed');
    }
  }
}
