import { describe, it, expect, vi } from 'vitest';
import { deriveSignal, maintainIndex, jsonContains } from '../../src/application/index.js';
import type { StoreTransaction } from '../../src/application/index.js';

function base64Json(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64');
}

describe('deriveSignal', () => {
  it('reads the signal inside base64 options', () => {
    const content = { options: base64Json({ signal: { kind: 'folder', tags: ['a'] } }) };

    expect(deriveSignal(content)).toEqual({ kind: 'folder', tags: ['a'] });
  });

  it('falls back to a top-level signal', () => {
    expect(deriveSignal({ signal: 'plain' })).toBe('plain');
  });

  it('prefers options over the top-level field', () => {
    const content = { options: base64Json({ signal: 'inner' }), signal: 'outer' };

    expect(deriveSignal(content)).toBe('inner');
  });

  it('falls back when options is not JSON', () => {
    expect(deriveSignal({ options: 'not json at all', signal: 1 })).toBe(1);
  });

  it('returns null when there is no signal', () => {
    expect(deriveSignal({ title: 'x' })).toBeNull();
    expect(deriveSignal(['not', 'an', 'object'])).toBeNull();
  });
});

describe('maintainIndex', () => {
  it('upserts the folder at the new tip', async () => {
    const upsertIndexFolder = vi.fn().mockResolvedValue(undefined);
    const tx = { upsertIndexFolder } as unknown as StoreTransaction;

    const folder = await maintainIndex(tx, 'stream-1', 'tip-1', { signal: { a: 1 } });

    expect(folder).toEqual({ stream_id: 'stream-1', tip: 'tip-1', signal: { a: 1 } });
    expect(upsertIndexFolder).toHaveBeenCalledWith(folder);
  });
});

describe('jsonContains', () => {
  it('matches a subset of object keys recursively', () => {
    expect(jsonContains({ a: 1, b: { c: 2, d: 3 } }, { b: { c: 2 } })).toBe(true);
    expect(jsonContains({ a: 1 }, { a: 2 })).toBe(false);
    expect(jsonContains({ a: 1 }, { b: 1 })).toBe(false);
  });

  it('matches array elements in any order', () => {
    expect(jsonContains(['x', 'y', 'z'], ['z', 'x'])).toBe(true);
    expect(jsonContains(['x'], ['x', 'q'])).toBe(false);
  });

  it('treats the empty object as matching every object', () => {
    expect(jsonContains({ a: 1 }, {})).toBe(true);
    expect(jsonContains('scalar', {})).toBe(false);
  });

  it('lets a top-level array contain a scalar element', () => {
    expect(jsonContains(['a', 'b'], 'a')).toBe(true);
    expect(jsonContains(['a', 'b'], 'c')).toBe(false);
    expect(jsonContains({ tags: ['a'] }, { tags: 'a' })).toBe(false);
  });

  it('compares scalars by value and type', () => {
    expect(jsonContains(1, 1)).toBe(true);
    expect(jsonContains('1', 1)).toBe(false);
  });
});
