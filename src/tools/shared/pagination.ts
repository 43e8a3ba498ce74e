// ============================================================================
// Paginated Results
// ============================================================================

import type { RemotePage } from '../../api/schemas.js';
import { nextCursor, type Filters } from '../../api/cursor.js';

export interface PaginatedResult<T> {
  items: T[];
  /** Present only when more results exist */
  next_cursor?: string;
  total_count?: number;
}

export interface PageRequest {
  offset: number;
  limit: number;
  filters: Filters;
}

/**
 * Assemble the caller-facing page. `items` may be a locally filtered subset
 * of `page.items`; the cursor always advances by the remote page size.
 */
export function buildPage<T>(
  page: RemotePage<unknown>,
  items: T[],
  request: PageRequest,
  options: { reportTotal?: boolean } = {}
): PaginatedResult<T> {
  const cursor = nextCursor(
    {
      offset: request.offset,
      limit: request.limit,
      remoteCount: page.items.length,
      totalCount: page.total_count,
      remoteHasMore: page.next_cursor !== undefined,
    },
    request.filters
  );

  const result: PaginatedResult<T> = { items };
  if (cursor !== undefined) result.next_cursor = cursor;
  if ((options.reportTotal ?? true) && page.total_count !== undefined) {
    result.total_count = page.total_count;
  }
  return result;
}
