/**
 * Offset pagination.
 *
 * Turns a page request into a LIMIT/OFFSET fetch plus a total count.
 * Pages are 1-based.
 */

import { RepositoryError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

export interface Pagination {
  /** 1-based page number */
  readonly pageNumber: number;
  readonly pageSize: number;
}

export interface PagedResult<T> {
  readonly results: readonly T[];
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly total: number;
  readonly hasMore: boolean;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Throw unless the page number and size are positive integers.
 */
export function assertPagination(pagination: Pagination): void {
  const { pageNumber, pageSize } = pagination;
  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    throw new RepositoryError("INVALID_ARGUMENT", `pageNumber must be >= 1, got ${String(pageNumber)}`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RepositoryError("INVALID_ARGUMENT", `pageSize must be >= 1, got ${String(pageSize)}`);
  }
}

/**
 * Fetch one page and the total count.
 *
 * `fetchPage` receives the LIMIT and OFFSET for the requested page;
 * `countAll` returns the number of rows across all pages.
 */
export async function getPaged<T>(
  pagination: Pagination,
  fetchPage: (limit: number, offset: number) => Promise<readonly T[]> | readonly T[],
  countAll: () => Promise<number> | number,
): Promise<PagedResult<T>> {
  assertPagination(pagination);

  const { pageNumber, pageSize } = pagination;
  const offset = (pageNumber - 1) * pageSize;

  const total = await countAll();
  const results = offset < total ? await fetchPage(pageSize, offset) : [];

  return {
    results,
    pageNumber,
    pageSize,
    total,
    hasMore: offset + results.length < total,
  };
}
