/**
 * Typed resource URIs.
 *
 * Cross-resource references arrive from the server as server-relative
 * paths. Each kind of resource gets its own URI type so a document
 * reference cannot be handed to a method that expects a person.
 */

import { z } from "zod";
import { InvalidUriError } from "./errors";

export const URI_PREFIXES = {
  person: "/api/v1/person/person/",
  "historical-person": "/api/v1/person/historicalperson/",
  "person-alias": "/api/v1/person/alias/",
  email: "/api/v1/person/email/",
  "historical-email": "/api/v1/person/historicalemail/",
  document: "/api/v1/doc/document/",
  "doc-state": "/api/v1/doc/state/",
  "doc-state-type": "/api/v1/doc/statetype/",
  submission: "/api/v1/submit/submission/",
  group: "/api/v1/group/group/",
  "group-type": "/api/v1/name/grouptypename/",
  "group-state": "/api/v1/name/groupstatename/",
} as const;

export type UriKind = keyof typeof URI_PREFIXES;

export class TypedUri<K extends UriKind> {
  readonly kind: K;
  readonly path: string;

  private constructor(kind: K, path: string) {
    this.kind = kind;
    this.path = path;
    Object.freeze(this);
  }

  /**
   * Wrap a path, checking that it sits under the kind's prefix.
   * An empty path is accepted and names nothing.
   *
   * @throws InvalidUriError
   */
  static of<K extends UriKind>(kind: K, path: string): TypedUri<K> {
    const uri = TypedUri.tryParse(kind, path);
    if (!uri) {
      throw new InvalidUriError(kind, path);
    }
    return uri;
  }

  /** Like {@link TypedUri.of}, returning undefined instead of throwing. */
  static tryParse<K extends UriKind>(
    kind: K,
    path: string,
  ): TypedUri<K> | undefined {
    if (path !== "" && !isUnderPrefix(URI_PREFIXES[kind], path)) {
      return undefined;
    }
    return new TypedUri(kind, path);
  }

  /** Hashable identity, usable as a Map or Set key. */
  get key(): string {
    return `${this.kind}:${this.path}`;
  }

  /** Last path segment, e.g. "20209" for a person. Empty for an empty path. */
  get id(): string {
    const rest = this.path.slice(URI_PREFIXES[this.kind].length);
    const segment = rest.split("/").find((part) => part.length > 0);
    return segment === undefined ? "" : safeDecode(segment);
  }

  get isEmpty(): boolean {
    return this.path === "";
  }

  equals(other: TypedUri<UriKind>): boolean {
    return this.kind === other.kind && this.path === other.path;
  }

  toString(): string {
    return this.path;
  }

  toJSON(): string {
    return this.path;
  }
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function isUnderPrefix(prefix: string, path: string): boolean {
  return path.startsWith(prefix) && path.length > prefix.length;
}

export type PersonUri = TypedUri<"person">;
export type HistoricalPersonUri = TypedUri<"historical-person">;
export type PersonAliasUri = TypedUri<"person-alias">;
export type EmailUri = TypedUri<"email">;
export type HistoricalEmailUri = TypedUri<"historical-email">;
export type DocumentUri = TypedUri<"document">;
export type DocStateUri = TypedUri<"doc-state">;
export type DocStateTypeUri = TypedUri<"doc-state-type">;
export type SubmissionUri = TypedUri<"submission">;
export type GroupUri = TypedUri<"group">;
export type GroupTypeUri = TypedUri<"group-type">;
export type GroupStateUri = TypedUri<"group-state">;

/** @throws InvalidUriError */
export function typedUri<K extends UriKind>(kind: K, path: string): TypedUri<K> {
  return TypedUri.of(kind, path);
}

/** Build the URI of a resource from its identifier (numeric id or slug). */
export function uriForId<K extends UriKind>(
  kind: K,
  id: number | string,
): TypedUri<K> {
  const segment = String(id);
  if (segment.length === 0 || segment.includes("/")) {
    throw new InvalidUriError(kind, `${URI_PREFIXES[kind]}${segment}`);
  }
  return TypedUri.of(kind, `${URI_PREFIXES[kind]}${encodePathSegment(segment)}/`);
}

export const personUri = (path: string): PersonUri => typedUri("person", path);
export const emailUri = (path: string): EmailUri => typedUri("email", path);
export const documentUri = (path: string): DocumentUri =>
  typedUri("document", path);
export const docStateUri = (path: string): DocStateUri =>
  typedUri("doc-state", path);
export const groupUri = (path: string): GroupUri => typedUri("group", path);

/**
 * Decoder for a URI field of the given kind. A path outside the kind's
 * prefix is reported as a decode issue.
 */
export function uriSchema<K extends UriKind>(kind: K) {
  return z.string().transform((path, ctx): TypedUri<K> => {
    const uri = TypedUri.tryParse(kind, path);
    if (!uri) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a ${kind} URI under ${URI_PREFIXES[kind]}, got: ${path}`,
      });
      return z.NEVER;
    }
    return uri;
  });
}

/**
 * Encode one path segment. `@` stays readable since email addresses are
 * used as identifiers.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(/%40/g, "@");
}

/**
 * Resolve a server-relative path or cursor against the API origin.
 * Returns undefined when the result would leave that origin, or when
 * either part is not a URL.
 */
export function resolveUrl(origin: string, pathOrUrl: string): string | undefined {
  let base: URL;
  let resolved: URL;
  try {
    base = new URL(origin);
    resolved = new URL(pathOrUrl, base);
  } catch {
    return undefined;
  }
  return resolved.origin === base.origin ? resolved.href : undefined;
}
