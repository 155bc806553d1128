import type { Pagination } from './types.js';

export const TWEETS_PER_PAGE = 24;

/**
 * Split `count` records into consecutive 1-based pages of `pageSize`.
 * Page k covers [(k - 1) * pageSize, min(k * pageSize, count)).
 */
export function paginate(count: number, pageSize = TWEETS_PER_PAGE): Pagination {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Record count must be a non-negative integer, got ${count}`);
  }

  const totalPages = Math.ceil(count / pageSize);
  const pages = Array.from({ length: totalPages }, (_, i) => ({
    page: i + 1,
    start: i * pageSize,
    end: Math.min((i + 1) * pageSize, count),
  }));

  return { totalPages, pageSize, pages };
}
