import { describe, it, expect } from 'vitest';
import { StreamProjector, describeState, toChain } from '../../src/application/index.js';
import { ChainIntegrityError, MalformedEventError } from '../../src/domain/index.js';
import type { StreamState } from '../../src/domain/index.js';
import { makeGenesis, makeSigned, makeAnchor } from '../helpers.js';

const STREAM = 'kjzl6kcym7w8y5example';

describe('StreamProjector', () => {
  it('starts from the genesis data and header', async () => {
    const genesis = await makeGenesis({ model: 'model-1' }, { title: 'a' });
    const projector = new StreamProjector();

    const state = projector.project(STREAM, toChain([genesis]), genesis.cid);

    expect(state).toEqual({
      stream_id: STREAM,
      tip: genesis.cid,
      content: { title: 'a' },
      metadata: { model: 'model-1' },
      log: [{ cid: genesis.cid, type: 'genesis' }],
    });
  });

  it('defaults content to an empty object', async () => {
    const genesis = await makeGenesis();
    const state = new StreamProjector().project(STREAM, toChain([genesis]), genesis.cid);

    expect(state.content).toEqual({});
  });

  it('applies signed patches in chain order and leaves anchors as no-ops', async () => {
    const genesis = await makeGenesis({}, { count: 1 });
    const a = await makeSigned(genesis, [{ op: 'replace', path: '/count', value: 2 }]);
    const b = await makeAnchor(a, 'proof-1');
    const c = await makeSigned(b, [{ op: 'add', path: '/done', value: true }], { tag: 'final' });

    const state = new StreamProjector().project(STREAM, toChain([genesis, a, b, c]), c.cid);

    expect(state.content).toEqual({ count: 2, done: true });
    expect(state.metadata).toEqual({ tag: 'final' });
    expect(state.log.map((entry) => entry.type)).toEqual(['genesis', 'signed', 'anchor', 'signed']);
    expect(state.tip).toBe(c.cid);
  });

  it('projects any commit of the chain, not just the newest', async () => {
    const genesis = await makeGenesis({}, { count: 1 });
    const a = await makeSigned(genesis, [{ op: 'replace', path: '/count', value: 2 }]);
    const b = await makeSigned(a, [{ op: 'replace', path: '/count', value: 3 }]);

    const state = new StreamProjector().project(STREAM, toChain([genesis, a, b]), a.cid);

    expect(state.content).toEqual({ count: 2 });
  });

  it('is deterministic with and without the cache', async () => {
    const genesis = await makeGenesis({}, { items: [] });
    const a = await makeSigned(genesis, [{ op: 'add', path: '/items/-', value: 'x' }]);
    const b = await makeSigned(a, [{ op: 'add', path: '/items/-', value: 'y' }]);
    const chain = toChain([genesis, a, b]);

    const cached = new StreamProjector(16);
    cached.project(STREAM, chain, a.cid);
    const warm: StreamState = cached.project(STREAM, chain, b.cid);
    const cold: StreamState = new StreamProjector(0).project(STREAM, chain, b.cid);

    expect(warm).toEqual(cold);
    expect(warm.content).toEqual({ items: ['x', 'y'] });
  });

  it('does not mutate earlier cached states', async () => {
    const genesis = await makeGenesis({}, { n: 1 });
    const a = await makeSigned(genesis, [{ op: 'replace', path: '/n', value: 2 }]);
    const projector = new StreamProjector(16);

    const before = projector.project(STREAM, toChain([genesis]), genesis.cid);
    projector.project(STREAM, toChain([genesis, a]), a.cid);

    expect(before.content).toEqual({ n: 1 });
    expect(projector.cachedStates).toBe(2);
  });

  it('rejects a patch that does not apply', async () => {
    const genesis = await makeGenesis({}, {});
    const bad = await makeSigned(genesis, [{ op: 'remove', path: '/missing' }]);

    expect(() => new StreamProjector().project(STREAM, toChain([genesis, bad]), bad.cid)).toThrow(
      MalformedEventError,
    );
  });

  it('rejects a patch that replaces the whole content with null', async () => {
    const genesis = await makeGenesis({}, { x: 1 });
    const wipe = await makeSigned(genesis, [{ op: 'replace', path: '', value: null }]);

    expect(() => new StreamProjector().project(STREAM, toChain([genesis, wipe]), wipe.cid)).toThrow(
      'Malformed event: blocks[0] patch must not reduce the content to null',
    );
  });

  it('extends a cached parent state without the chain', async () => {
    const genesis = await makeGenesis({}, { n: 1 });
    const a = await makeSigned(genesis, [{ op: 'replace', path: '/n', value: 2 }]);
    const projector = new StreamProjector(16);
    projector.project(STREAM, toChain([genesis]), genesis.cid);

    const state = projector.extend(STREAM, a);

    expect(state?.content).toEqual({ n: 2 });
    expect(state?.tip).toBe(a.cid);
    expect(projector.cachedStates).toBe(2);
  });

  it('does not extend when the parent state is not cached', async () => {
    const genesis = await makeGenesis({}, { n: 1 });
    const a = await makeSigned(genesis, [{ op: 'replace', path: '/n', value: 2 }]);

    expect(new StreamProjector(16).extend(STREAM, a)).toBeUndefined();
    expect(new StreamProjector(16).extend(STREAM, genesis)).toBeUndefined();
  });

  it('rejects a chain with a missing ancestor', async () => {
    const genesis = await makeGenesis();
    const a = await makeSigned(genesis, []);

    expect(() => new StreamProjector().project(STREAM, toChain([a]), a.cid)).toThrow(ChainIntegrityError);
  });
});

describe('describeState', () => {
  function stateWith(metadata: StreamState['metadata']): StreamState {
    return { stream_id: STREAM, tip: 'tip', content: {}, metadata, log: [] };
  }

  it('reads model and the first controller', () => {
    expect(describeState(stateWith({ model: 'model-1', controllers: ['did:key:z6Mkone', 'did:key:z6Mktwo'] })))
      .toEqual({ model_id: 'model-1', account: 'did:key:z6Mkone' });
  });

  it('returns nulls when the header names neither', () => {
    expect(describeState(stateWith({}))).toEqual({ model_id: null, account: null });
  });

  it('rejects a model id longer than the column', () => {
    expect(() => describeState(stateWith({ model: 'm'.repeat(71) }))).toThrow(MalformedEventError);
  });

  it('rejects a non-string controller', () => {
    expect(() => describeState(stateWith({ controllers: [42] }))).toThrow(MalformedEventError);
  });
});
