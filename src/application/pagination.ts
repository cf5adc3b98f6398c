import type { PaginationParams } from './stream-store.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 500;

/** Clamps limit to [1, 500] (default 50) and offset to >= 0. */
export function clampPagination(params: { limit?: number | undefined; offset?: number | undefined }): PaginationParams {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);
  return { limit, offset };
}
