/**
 * Query filters for collection endpoints.
 *
 * Filters are plain configuration objects, validated and encoded into the
 * query string before the first page is requested:
 *
 * | filter         | query parameter        |
 * |----------------|------------------------|
 * | `name`         | `name=<value>`         |
 * | `nameContains` | `name__contains=<value>` |
 * | `since`        | `time__gte=<timestamp>` |
 * | `until`        | `time__lt=<timestamp>`  |
 * | `limit`        | `limit=<page size>`    |
 *
 * Time bounds must fall on whole seconds and page sizes must be integers
 * in `[1, 1000]`; anything else is rejected, never adjusted.
 */

import {
  appendPaginationQuery,
  findPaginationProblem,
} from "@dtrack/shared/api";
import { InvalidFilterError } from "./errors";
import { formatTimestamp } from "./timestamp";
import { type TypedUri, type UriKind, URI_PREFIXES } from "./uri";

export interface PageSizeFilter {
  /** Page size to request; the server default applies when omitted */
  limit?: number;
}

export interface NameFilter {
  /** Exact name match */
  name?: string;
  /** Substring name match */
  nameContains?: string;
}

export interface TimeRangeFilter {
  /** Only records with `time` at or after this instant */
  since?: Date;
  /** Only records with `time` strictly before this instant */
  until?: Date;
}

export type QueryValue = string | number | boolean | TypedUri<UriKind>;

/**
 * Collects query parameters, rejecting values that cannot be sent.
 */
export class QueryBuilder {
  private readonly params = new URLSearchParams();

  /** Exact-match parameter; skipped when the value is undefined. */
  equals(field: string, value: QueryValue | undefined): this {
    if (value === undefined) {
      return this;
    }
    this.params.set(field, encodeValue(field, value));
    return this;
  }

  /** `field__contains` parameter. */
  contains(field: string, value: string | undefined): this {
    return this.equals(`${field}__contains`, value);
  }

  /** `field__gte` / `field__lt` bounds. */
  timeRange(field: string, range: TimeRangeFilter): this {
    const { since, until } = range;
    if (since !== undefined) {
      checkDate(`${field}__gte`, since);
    }
    if (until !== undefined) {
      checkDate(`${field}__lt`, until);
    }
    if (
      since !== undefined &&
      until !== undefined &&
      since.getTime() >= until.getTime()
    ) {
      throw new InvalidFilterError(
        field,
        `Time range for ${field} is empty: since must precede until`,
      );
    }
    if (since !== undefined) {
      this.params.set(`${field}__gte`, formatTimestamp(since));
    }
    if (until !== undefined) {
      this.params.set(`${field}__lt`, formatTimestamp(until));
    }
    return this;
  }

  /** Name equality and substring filters on the `name` field. */
  name(filter: NameFilter): this {
    return this.equals("name", filter.name).contains("name", filter.nameContains);
  }

  /** Page size; sent as given, never adjusted. */
  pageSize(limit: number | undefined): this {
    if (limit === undefined) {
      return this;
    }
    const problem = findPaginationProblem({ limit });
    if (problem !== undefined) {
      throw new InvalidFilterError("limit", problem);
    }
    appendPaginationQuery(this.params, { limit });
    return this;
  }

  toString(): string {
    return this.params.toString();
  }
}

/** Append a query string to a collection path. */
export function withQuery(path: string, query: QueryBuilder): string {
  const encoded = query.toString();
  return encoded === "" ? path : `${path}?${encoded}`;
}

/** Collection path of a resource kind, e.g. `/api/v1/doc/state/`. */
export function collectionPath(kind: UriKind): string {
  return URI_PREFIXES[kind];
}

function encodeValue(field: string, value: QueryValue): string {
  if (typeof value === "string") {
    if (value.length === 0) {
      throw new InvalidFilterError(field, `Filter ${field} must not be empty`);
    }
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidFilterError(field, `Filter ${field} must be finite`);
    }
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  // Related resources are filtered by their identifier
  if (value.isEmpty) {
    throw new InvalidFilterError(field, `Filter ${field} names no resource`);
  }
  return value.id;
}

function checkDate(field: string, value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidFilterError(field, `Filter ${field} is not a valid date`);
  }
  // Bounds are sent with whole-second precision
  if (value.getUTCMilliseconds() !== 0) {
    throw new InvalidFilterError(
      field,
      `Filter ${field} must be a whole second, got ${value.toISOString()}`,
    );
  }
}
