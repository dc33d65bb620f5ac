/**
 * Offset Pagination Types and Utilities.
 *
 * The datatracker API pages collections with `limit`/`offset` query
 * parameters and hands back ready-made `previous`/`next` cursors, so a
 * client never has to compute offsets itself past the first request.
 * These helpers cover the page size of the first request and describe
 * fetched pages for logging.
 */

import type { PageMeta } from "./envelope";

// ============================================================================
// Pagination Request Types
// ============================================================================

/**
 * Pagination parameters of a first request.
 *
 * @example
 * ```typescript
 * GET /api/v1/person/person/?limit=20
 * ```
 */
export interface PaginationParams {
  /**
   * Maximum number of items per page.
   * Omitted: the server default applies.
   */
  limit?: number;
}

/**
 * Pagination limits.
 */
export interface PaginationDefaults {
  /** Largest page size the server honours */
  maxLimit: number;
}

/**
 * Standard pagination limits.
 */
export const DEFAULT_PAGINATION: PaginationDefaults = {
  maxLimit: 1000,
};

// ============================================================================
// Pagination Utilities
// ============================================================================

/**
 * Check pagination parameters before the first request.
 * Nothing is adjusted: a page size must be an integer in `[1, maxLimit]`.
 *
 * @returns A description of the first problem, or undefined when valid
 *
 * @example
 * ```typescript
 * findPaginationProblem({ limit: 5000 });
 * // Returns: "Page size must be an integer between 1 and 1000"
 * ```
 */
export function findPaginationProblem(
  params: PaginationParams,
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): string | undefined {
  const { limit } = params;
  if (limit === undefined) {
    return undefined;
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > defaults.maxLimit) {
    return `Page size must be an integer between 1 and ${defaults.maxLimit}`;
  }
  return undefined;
}

/**
 * Append pagination parameters to a query string, as given.
 * An absent limit is left out.
 */
export function appendPaginationQuery(
  query: URLSearchParams,
  params: PaginationParams,
): URLSearchParams {
  if (params.limit !== undefined) {
    query.set("limit", String(params.limit));
  }
  return query;
}

/**
 * Position of a page within its collection.
 */
export interface PagePosition {
  /** 1-based page number */
  page: number;
  /** Number of pages the collection spans at this page size */
  pageCount: number;
  /** Whether more pages follow */
  hasMore: boolean;
}

/**
 * Describe where a page sits in its collection.
 *
 * @example
 * ```typescript
 * describePage({ totalCount: 5, limit: 2, offset: 2, previous: "...", next: "..." });
 * // Returns: { page: 2, pageCount: 3, hasMore: true }
 * ```
 */
export function describePage(meta: PageMeta): PagePosition {
  const hasMore = meta.next !== null;
  if (meta.limit <= 0) {
    return { page: 1, pageCount: 1, hasMore };
  }
  return {
    page: Math.floor(meta.offset / meta.limit) + 1,
    pageCount: Math.max(1, Math.ceil(meta.totalCount / meta.limit)),
    hasMore,
  };
}
