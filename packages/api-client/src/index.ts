/**
 * @dtrack/api-client
 *
 * Read-only client for the datatracker REST API: typed resource URIs,
 * lazily paginated collections and one typed method per endpoint.
 */

export {
  createTrackerClient,
  type TrackerClient,
  type TrackerClientOptions,
} from "./client";
export { decodePageEnvelope, type EnvelopeDecodeResult } from "./envelope";
export {
  type ApiClientErrorKind,
  ApiClientError,
  InvalidFilterError,
  InvalidUriError,
  isApiClientError,
} from "./errors";
export {
  collectionPath,
  type NameFilter,
  type PageSizeFilter,
  QueryBuilder,
  type QueryValue,
  type TimeRangeFilter,
  withQuery,
} from "./filters";
export {
  createFetchTransport,
  type FetchTransportDefaults,
  type HttpRequestOptions,
  type HttpResponse,
  type HttpTransport,
  HttpTransportError,
  type HttpTransportErrorKind,
} from "./http-transport";
export { PaginatedSequence } from "./paginated-sequence";
export {
  createResourceClient,
  type ResourceClient,
  type ResourceClientOptions,
} from "./resource-client";
export * from "./resources/document";
export * from "./resources/email";
export * from "./resources/group";
export * from "./resources/person";
export { formatTimestamp, parseTimestamp, TimestampSchema } from "./timestamp";
export * from "./uri";
