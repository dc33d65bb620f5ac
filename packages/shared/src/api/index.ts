/**
 * API Types and Utilities.
 *
 * Collection envelope types and pagination helpers shared by the
 * datatracker client packages.
 */

export {
  // Envelope types
  type WirePageMeta,
  type PageMeta,
  type PageEnvelope,
  // Envelope helpers
  toPageMeta,
} from "./envelope";

export {
  // Pagination types
  type PaginationParams,
  type PaginationDefaults,
  type PagePosition,
  DEFAULT_PAGINATION,
  // Pagination utilities
  findPaginationProblem,
  appendPaginationQuery,
  describePage,
} from "./pagination";
