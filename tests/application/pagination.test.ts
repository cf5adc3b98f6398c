import { describe, it, expect } from 'vitest';
import { clampPagination, DEFAULT_LIMIT, MAX_LIMIT } from '../../src/application/index.js';

describe('clampPagination', () => {
  it('uses default limit=50, offset=0 when params omitted', () => {
    expect(clampPagination({})).toEqual({ limit: DEFAULT_LIMIT, offset: 0 });
  });

  it('clamps limit=0 up to 1', () => {
    expect(clampPagination({ limit: 0 }).limit).toBe(1);
  });

  it('clamps limit above 500 down to 500', () => {
    expect(clampPagination({ limit: 9999 }).limit).toBe(MAX_LIMIT);
  });

  it('clamps negative offset to 0', () => {
    expect(clampPagination({ offset: -5 }).offset).toBe(0);
  });

  it('passes values in range through', () => {
    expect(clampPagination({ limit: 20, offset: 40 })).toEqual({ limit: 20, offset: 40 });
  });
});
