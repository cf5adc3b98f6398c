import type {
  Event,
  Stream,
  SubmitResult,
  TipAdvanced,
} from '../domain/index.js';
import { StorageFailureError, UnknownStreamError } from '../domain/index.js';
import { ancestry, linkEvent, toChain } from './chain-linker.js';
import { maintainIndex } from './index-maintainer.js';
import type { StreamProjector } from './stream-projector.js';
import { describeState } from './stream-projector.js';
import type { StoreTransaction } from './stream-store.js';

export interface TipResolution {
  readonly result: SubmitResult;
  /** Set only when the tip moved; published after commit. */
  readonly advanced: TipAdvanced | undefined;
}

export interface ResolveTipInput {
  readonly event: Event;
  readonly streamId: string;
  readonly dappId: string;
  readonly projector: StreamProjector;
}

function outcome(status: SubmitResult['status'], streamId: string, tip: string): TipResolution {
  return {
    result: { applied: status === 'applied', status, stream_id: streamId, tip },
    advanced: undefined,
  };
}

/**
 * Decides, inside one store transaction, whether `event` becomes the tip.
 *
 * Policy: compare-and-swap on the current tip. The event is applied only
 * when its `prev` equals the tip at the moment of the attempt; otherwise
 * it is stored and reported as a conflict. There is no reorganisation and
 * no internal retry.
 */
export async function resolveTip(tx: StoreTransaction, input: ResolveTipInput): Promise<TipResolution> {
  const { event, streamId, dappId } = input;

  const { existing } = await linkEvent(tx, event);
  const stream = await tx.findStream(streamId);

  if (stream !== undefined && stream.dapp_id !== dappId) {
    throw new UnknownStreamError(streamId);
  }

  if (event.prev === null) {
    if (stream !== undefined) {
      await tx.insertEvent(event);
      return outcome('duplicate', streamId, stream.tip);
    }
    return createStream(tx, input);
  }

  if (stream === undefined) {
    throw new UnknownStreamError(streamId);
  }

  if (existing !== undefined && event.prev !== stream.tip) {
    const onChain = stream.tip === event.cid
      || ancestry(toChain(await tx.findEventsByGenesis(event.genesis)), stream.tip).includes(event.cid);
    return outcome(onChain ? 'duplicate' : 'conflict', streamId, stream.tip);
  }

  if (event.prev !== stream.tip) {
    await tx.insertEvent(event);
    return outcome('conflict', streamId, stream.tip);
  }

  return advanceTip(tx, input, stream, event.prev);
}

async function createStream(tx: StoreTransaction, input: ResolveTipInput): Promise<TipResolution> {
  const { event, streamId, dappId, projector } = input;

  const state = projector.project(streamId, toChain([event]), event.cid);
  const descriptor = describeState(state);

  await tx.insertEvent(event);
  const created = await tx.insertStream({
    stream_id: streamId,
    dapp_id: dappId,
    tip: event.cid,
    account: descriptor.account,
    model_id: descriptor.model_id,
    content: state.content,
  });

  if (!created) {
    // Another writer created the stream between our read and insert
    const current = await tx.findStream(streamId);
    if (current === undefined) {
      throw new StorageFailureError('insertStream', new Error(`stream ${streamId} neither inserted nor found`));
    }
    return outcome('duplicate', streamId, current.tip);
  }

  await maintainIndex(tx, streamId, event.cid, state.content);

  return {
    result: { applied: true, status: 'applied', stream_id: streamId, tip: event.cid },
    advanced: {
      stream_id: streamId,
      dapp_id: dappId,
      tip: event.cid,
      prev: null,
      model_id: descriptor.model_id,
    },
  };
}

async function advanceTip(
  tx: StoreTransaction,
  input: ResolveTipInput,
  stream: Stream,
  expectedTip: string,
): Promise<TipResolution> {
  const { event, streamId, projector } = input;

  // Folding happens before any write so a patch that does not apply stores nothing
  const state = projector.extend(streamId, event)
    ?? projector.project(streamId, await chainWith(tx, event), event.cid);
  const descriptor = describeState(state);

  await tx.insertEvent(event);
  const swapped = await tx.compareAndSwapTip({
    stream_id: streamId,
    expected_tip: expectedTip,
    tip: event.cid,
    account: descriptor.account,
    model_id: descriptor.model_id,
    content: state.content,
  });

  if (!swapped) {
    // A concurrent writer moved the tip, possibly by applying this same event
    const current = await tx.findStream(streamId);
    const tip = current?.tip ?? stream.tip;
    const onChain = tip === event.cid
      || ancestry(await chainWith(tx, event), tip).includes(event.cid);
    return outcome(onChain ? 'duplicate' : 'conflict', streamId, tip);
  }

  await maintainIndex(tx, streamId, event.cid, state.content);

  return {
    result: { applied: true, status: 'applied', stream_id: streamId, tip: event.cid },
    advanced: {
      stream_id: streamId,
      dapp_id: stream.dapp_id,
      tip: event.cid,
      prev: expectedTip,
      model_id: descriptor.model_id,
    },
  };
}

/** Stored events of the event's genesis, plus the event itself. */
async function chainWith(tx: StoreTransaction, event: Event): Promise<Map<string, Event>> {
  const chain = toChain(await tx.findEventsByGenesis(event.genesis));
  chain.set(event.cid, event);
  return chain;
}
