/**
 * Page-number pagination types.
 *
 * List endpoints take ?pageNumber&pageSize and return
 * { data, pagination: { pageNumber, pageSize, total, hasMore } }.
 */

import type { PagedResult } from "@tallybook/data";

// =============================================================================
// Types
// =============================================================================

export interface PaginationMeta {
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly total: number;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Wrap a repository page in the response envelope.
 */
export function toPaginatedResponse<T>(page: PagedResult<T>): PaginatedResponse<T> {
  return {
    data: page.results,
    pagination: {
      pageNumber: page.pageNumber,
      pageSize: page.pageSize,
      total: page.total,
      hasMore: page.hasMore,
    },
  };
}
