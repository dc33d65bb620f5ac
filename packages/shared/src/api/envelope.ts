/**
 * Collection Response Envelope Types.
 *
 * Every collection endpoint of the datatracker API answers with the same
 * envelope: a `meta` block describing the page and an `objects` array
 * holding the page's items in server order.
 *
 * ```json
 * {
 *   "meta": {
 *     "total_count": 5,
 *     "limit": 2,
 *     "offset": 0,
 *     "previous": null,
 *     "next": "/api/v1/person/person/?limit=2&offset=2"
 *   },
 *   "objects": [ ... ]
 * }
 * ```
 *
 * Single-resource endpoints answer with the bare entity object instead.
 */

// ============================================================================
// Wire Types
// ============================================================================

/**
 * Page metadata exactly as the server sends it.
 */
export interface WirePageMeta {
  total_count: number;
  limit: number;
  offset: number;
  previous: string | null;
  next: string | null;
}

// ============================================================================
// Decoded Types
// ============================================================================

/**
 * Page metadata after decoding.
 */
export interface PageMeta {
  /** Total number of items matching the query, across all pages */
  totalCount: number;
  /** Page size the server applied */
  limit: number;
  /** Index of this page's first item within the whole result set */
  offset: number;
  /**
   * Server-relative path (with query string) of the previous page.
   * `null` on the first page.
   */
  previous: string | null;
  /**
   * Server-relative path (with query string) of the next page.
   * `null` on the last page.
   */
  next: string | null;
}

/**
 * One decoded page of a collection response.
 */
export interface PageEnvelope<T> {
  meta: PageMeta;
  /** Items of this page, in server order */
  objects: T[];
}

// ============================================================================
// Helpers
// ============================================================================

/** Convert wire metadata to its decoded form. */
export function toPageMeta(meta: WirePageMeta): PageMeta {
  return {
    totalCount: meta.total_count,
    limit: meta.limit,
    offset: meta.offset,
    previous: meta.previous,
    next: meta.next,
  };
}
