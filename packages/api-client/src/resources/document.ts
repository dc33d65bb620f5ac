/**
 * Documents, document states and state types.
 */

import { z } from "zod";
import { freezeEntity, nullableField } from "../entity";
import { InvalidFilterError } from "../errors";
import {
  collectionPath,
  type NameFilter,
  type PageSizeFilter,
  QueryBuilder,
  type TimeRangeFilter,
  withQuery,
} from "../filters";
import { PaginatedSequence } from "../paginated-sequence";
import type { ResourceClient } from "../resource-client";
import { TimestampSchema } from "../timestamp";
import {
  type DocStateTypeUri,
  type DocStateUri,
  type DocumentUri,
  type GroupUri,
  type PersonUri,
  uriForId,
  uriSchema,
} from "../uri";

// ============================================================================
// Zod Schemas
// ============================================================================

export const DocumentSchema = z
  .object({
    id: z.number().int(),
    resource_uri: uriSchema("document"),
    name: z.string(),
    title: z.string(),
    pages: nullableField(z.number().int()),
    words: nullableField(z.number().int()),
    time: TimestampSchema,
    notify: z.string(),
    expires: nullableField(TimestampSchema),
    /** Document type path, e.g. "/api/v1/name/doctypename/draft/" */
    type: z.string(),
    rfc: nullableField(z.number().int()),
    rev: z.string(),
    abstract: z.string(),
    internal_comments: z.string(),
    order: z.number().int(),
    note: z.string(),
    ad: nullableField(uriSchema("person")),
    shepherd: nullableField(uriSchema("email")),
    group: nullableField(uriSchema("group")),
    stream: nullableField(z.string()),
    std_level: nullableField(z.string()),
    intended_std_level: nullableField(z.string()),
    states: z.array(uriSchema("doc-state")),
    submissions: z.array(uriSchema("submission")),
    tags: z.array(z.string()),
    uploaded_filename: z.string(),
    external_url: z.string(),
  })
  .transform(freezeEntity);

export const DocStateSchema = z
  .object({
    id: z.number().int(),
    resource_uri: uriSchema("doc-state"),
    name: z.string(),
    desc: z.string(),
    slug: z.string(),
    next_states: z.array(uriSchema("doc-state")),
    used: z.boolean(),
    order: z.number().int(),
    type: uriSchema("doc-state-type"),
  })
  .transform(freezeEntity);

export const DocStateTypeSchema = z
  .object({
    resource_uri: uriSchema("doc-state-type"),
    slug: z.string(),
    label: z.string(),
  })
  .transform(freezeEntity);

// ============================================================================
// Exported Types
// ============================================================================

export type Document = z.infer<typeof DocumentSchema>;
export type DocState = z.infer<typeof DocStateSchema>;
export type DocStateType = z.infer<typeof DocStateTypeSchema>;

// ============================================================================
// Filter Types
// ============================================================================

export interface DocumentFilter
  extends NameFilter,
    TimeRangeFilter,
    PageSizeFilter {
  /** Only documents of this group */
  group?: GroupUri;
  /** Only documents currently in this state */
  state?: DocStateUri;
  /** Only documents with this area director */
  ad?: PersonUri;
}

export interface DocStateFilter extends PageSizeFilter {
  /** Only states of this state type */
  stateType?: DocStateTypeUri;
  slug?: string;
}

// ============================================================================
// Endpoint Interface
// ============================================================================

export interface DocumentApi {
  /** Fetch the document a URI names */
  document: (uri: DocumentUri) => Promise<Document>;

  /** Fetch a document by name, e.g. "draft-ietf-quic-transport" */
  documentByName: (name: string) => Promise<Document>;

  /** Documents matching the filter */
  documents: (filter?: DocumentFilter) => PaginatedSequence<Document>;

  /** Fetch one document state */
  docState: (uri: DocStateUri) => Promise<DocState>;

  /** Document states matching the filter */
  docStates: (filter?: DocStateFilter) => PaginatedSequence<DocState>;

  /** Fetch one document state type */
  docStateType: (uri: DocStateTypeUri) => Promise<DocStateType>;

  /** All document state types */
  docStateTypes: (filter?: PageSizeFilter) => PaginatedSequence<DocStateType>;
}

// ============================================================================
// Implementation
// ============================================================================

export function createDocumentApi(client: ResourceClient): DocumentApi {
  return {
    document: async (uri) => client.fetchResource(uri, DocumentSchema),

    documentByName: async (name) => {
      if (name.trim().length === 0) {
        throw new InvalidFilterError("name", "Document name must not be empty");
      }
      return client.fetchResource(uriForId("document", name), DocumentSchema);
    },

    documents: (filter = {}) => {
      const query = new QueryBuilder()
        .name(filter)
        .equals("group", filter.group)
        .equals("states", filter.state)
        .equals("ad", filter.ad)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("document"), query));
      return new PaginatedSequence(client, url, DocumentSchema);
    },

    docState: async (uri) => client.fetchResource(uri, DocStateSchema),

    docStates: (filter = {}) => {
      const query = new QueryBuilder()
        .equals("type", filter.stateType)
        .equals("slug", filter.slug)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("doc-state"), query));
      return new PaginatedSequence(client, url, DocStateSchema);
    },

    docStateType: async (uri) => client.fetchResource(uri, DocStateTypeSchema),

    docStateTypes: (filter = {}) => {
      const query = new QueryBuilder().pageSize(filter.limit);
      const url = client.resolve(
        withQuery(collectionPath("doc-state-type"), query),
      );
      return new PaginatedSequence(client, url, DocStateTypeSchema);
    },
  };
}
