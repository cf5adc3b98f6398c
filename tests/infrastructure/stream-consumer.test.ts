import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import {
  processEntry,
  processPending,
  parseStreamEntry,
  readEntries,
  GROUP_NAME,
} from '../../src/infrastructure/worker/index.js';
import type { ConsumerDeps } from '../../src/infrastructure/worker/index.js';
import { encodeBlock } from '../../src/application/index.js';
import type { StreamEngine } from '../../src/application/index.js';
import {
  ChainIntegrityError,
  StorageFailureError,
} from '../../src/domain/index.js';
import type { Event, SubmitResult } from '../../src/domain/index.js';
import { DAPP_ID, fakeLogger, makeGenesis } from '../helpers.js';

const STREAM_KEY = 'event_submissions';

function fieldsFor(event: Event): string[] {
  const body = {
    cid: event.cid,
    prev: event.prev,
    genesis: event.genesis,
    blocks: event.blocks.map(encodeBlock),
    dapp_id: DAPP_ID,
  };
  return ['cid', event.cid, 'submission', JSON.stringify(body)];
}

function applied(event: Event): SubmitResult {
  return { applied: true, status: 'applied', stream_id: 'stream-1', tip: event.cid };
}

let redis: { xack: ReturnType<typeof vi.fn>; xreadgroup: ReturnType<typeof vi.fn> };
let submitEvent: ReturnType<typeof vi.fn<StreamEngine['submitEvent']>>;
let deps: ConsumerDeps;

beforeEach(() => {
  redis = {
    xack: vi.fn().mockResolvedValue(1),
    xreadgroup: vi.fn(),
  };
  submitEvent = vi.fn<StreamEngine['submitEvent']>();
  deps = {
    redis: redis as unknown as Redis,
    engine: { submitEvent },
    log: fakeLogger(),
    consumerName: 'worker-test',
  };
});

describe('parseStreamEntry', () => {
  it('decodes the submission body', async () => {
    const genesis = await makeGenesis();

    const parsed = parseStreamEntry(fieldsFor(genesis));

    expect(parsed).toEqual({ event: genesis, dapp_id: DAPP_ID, stream_type: undefined });
  });

  it('reports a missing submission field', () => {
    expect(parseStreamEntry(['cid', 'x'])).toBe('missing submission field');
  });

  it('reports invalid JSON', () => {
    expect(parseStreamEntry(['submission', '{oops'])).toBe('submission is not valid JSON');
  });
});

describe('readEntries', () => {
  it('flattens an XREADGROUP reply', () => {
    const reply = [[STREAM_KEY, [['1-0', ['a', 'b']], ['2-0', null]]]];

    expect(readEntries(reply)).toEqual([['1-0', ['a', 'b']], ['2-0', []]]);
  });

  it('returns nothing for a timeout', () => {
    expect(readEntries(null)).toEqual([]);
  });
});

describe('processEntry', () => {
  it('submits and acknowledges', async () => {
    const genesis = await makeGenesis();
    submitEvent.mockResolvedValueOnce(applied(genesis));

    const outcome = await processEntry(deps, '1-0', fieldsFor(genesis));

    expect(outcome).toBe('submitted');
    expect(submitEvent).toHaveBeenCalledWith({ event: genesis, dapp_id: DAPP_ID, stream_type: undefined });
    expect(redis.xack).toHaveBeenCalledWith(STREAM_KEY, GROUP_NAME, '1-0');
  });

  it('acknowledges a lost tip race and warns', async () => {
    const genesis = await makeGenesis();
    submitEvent.mockResolvedValueOnce({ applied: false, status: 'conflict', stream_id: 'stream-1', tip: 'other' });

    const outcome = await processEntry(deps, '1-0', fieldsFor(genesis));

    expect(outcome).toBe('submitted');
    expect(redis.xack).toHaveBeenCalledTimes(1);
    expect(deps.log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ cid: genesis.cid, tip: 'other' }),
      'Submission lost tip race',
    );
  });

  it('acknowledges permanent rejections', async () => {
    const genesis = await makeGenesis();
    submitEvent.mockRejectedValueOnce(new ChainIntegrityError(genesis.cid, 'unknown prev'));

    const outcome = await processEntry(deps, '1-0', fieldsFor(genesis));

    expect(outcome).toBe('rejected');
    expect(redis.xack).toHaveBeenCalledWith(STREAM_KEY, GROUP_NAME, '1-0');
    expect(deps.log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'CHAIN_INTEGRITY' }),
      'Submission rejected',
    );
  });

  it('acknowledges unparseable entries without submitting', async () => {
    const outcome = await processEntry(deps, '1-0', ['submission', '{"cid":1}']);

    expect(outcome).toBe('rejected');
    expect(submitEvent).not.toHaveBeenCalled();
    expect(redis.xack).toHaveBeenCalledWith(STREAM_KEY, GROUP_NAME, '1-0');
  });

  it('leaves storage failures pending', async () => {
    const genesis = await makeGenesis();
    submitEvent.mockRejectedValueOnce(new StorageFailureError('transaction', new Error('down')));

    const outcome = await processEntry(deps, '1-0', fieldsFor(genesis));

    expect(outcome).toBe('retry');
    expect(redis.xack).not.toHaveBeenCalled();
    expect(deps.log.error).toHaveBeenCalledWith(
      expect.objectContaining({ cid: genesis.cid, entryId: '1-0' }),
      'Failed to submit event',
    );
  });
});

describe('processPending', () => {
  it('replays this consumer\'s pending entries', async () => {
    const genesis = await makeGenesis();
    submitEvent.mockResolvedValue(applied(genesis));
    redis.xreadgroup.mockResolvedValueOnce([[STREAM_KEY, [['1-0', fieldsFor(genesis)], ['2-0', null]]]]);

    const count = await processPending(deps);

    expect(count).toBe(1);
    expect(redis.xreadgroup).toHaveBeenCalledWith(
      'GROUP', GROUP_NAME, 'worker-test',
      'COUNT', 100,
      'STREAMS', STREAM_KEY,
      '0',
    );
    expect(submitEvent).toHaveBeenCalledTimes(1);
  });

  it('does nothing when there is no pending entry', async () => {
    redis.xreadgroup.mockResolvedValueOnce(null);

    expect(await processPending(deps)).toBe(0);
  });
});
