import { describe, it, expect } from 'vitest';
import {
  StreamEngineError,
  MalformedEventError,
  ChainIntegrityError,
  UnknownStreamError,
  StorageFailureError,
  isStreamEngineError,
} from '../../src/domain/index.js';

describe('engine errors', () => {
  it('carries a code per class', () => {
    expect(new MalformedEventError('blocks', 'must not be empty').code).toBe('MALFORMED_EVENT');
    expect(new ChainIntegrityError('bafy', 'unknown prev').code).toBe('CHAIN_INTEGRITY');
    expect(new UnknownStreamError('k2t6').code).toBe('UNKNOWN_STREAM');
    expect(new StorageFailureError('transaction', new Error('down')).code).toBe('STORAGE_FAILURE');
  });

  it('keeps the subclass name and prototype chain', () => {
    const err = new ChainIntegrityError('bafy', 'unknown prev');

    expect(err).toBeInstanceOf(ChainIntegrityError);
    expect(err).toBeInstanceOf(StreamEngineError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ChainIntegrityError');
  });

  it('formats field and reason into the message', () => {
    const err = new MalformedEventError('blocks', 'must not be empty');
    expect(err.message).toBe('Malformed event: blocks must not be empty');
    expect(err.field).toBe('blocks');
  });

  it('wraps the storage cause', () => {
    const cause = new Error('connection refused');
    const err = new StorageFailureError('findStream', cause);

    expect(err.message).toBe('Storage failure during findStream: connection refused');
    expect(err.cause).toBe(cause);
  });

  it('distinguishes engine errors from others', () => {
    expect(isStreamEngineError(new UnknownStreamError('k2t6'))).toBe(true);
    expect(isStreamEngineError(new Error('nope'))).toBe(false);
    expect(isStreamEngineError('nope')).toBe(false);
  });
});
