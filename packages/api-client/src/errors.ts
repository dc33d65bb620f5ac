import {
  type ErrorCode,
  TrackerError,
  type TrackerErrorOptions,
} from "@dtrack/shared/errors";

/**
 * Outcome classes a remote call can fail with.
 *
 * - `not_found`: the request completed with a non-success status, or a
 *   lookup matched nothing. Authorization failures and server errors
 *   land here too; the status is kept in `details.status`.
 * - `transport`: the request could not be completed, or its body could
 *   not be decoded into the expected shape.
 */
export type ApiClientErrorKind = "not_found" | "transport";

export class ApiClientError extends TrackerError {
  readonly kind: ApiClientErrorKind;

  constructor(
    kind: ApiClientErrorKind,
    code: ErrorCode,
    message: string,
    options?: TrackerErrorOptions,
  ) {
    super(code, message, options);
    this.name = "ApiClientError";
    this.kind = kind;
  }
}

export function isApiClientError(value: unknown): value is ApiClientError {
  return value instanceof ApiClientError;
}

/** Raised locally when a path does not name a resource of the given kind. */
export class InvalidUriError extends TrackerError {
  constructor(kind: string, path: string) {
    super("INVALID_URI", `Not a ${kind} URI: ${path}`, {
      details: { kind, path },
    });
    this.name = "InvalidUriError";
  }
}

/** Raised before any request when a query filter cannot be encoded. */
export class InvalidFilterError extends TrackerError {
  constructor(field: string, message: string) {
    super("INVALID_FILTER", message, { details: { field } });
    this.name = "InvalidFilterError";
  }
}
