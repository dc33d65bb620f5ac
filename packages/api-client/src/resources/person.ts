/**
 * People, their historical records, and name aliases.
 */

import { z } from "zod";
import { freezeEntity, nullableField } from "../entity";
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
  type HistoricalPersonUri,
  type PersonAliasUri,
  type PersonUri,
  uriForId,
  uriSchema,
} from "../uri";

// ============================================================================
// Zod Schemas
// ============================================================================

const personFields = {
  id: z.number().int(),
  name: z.string(),
  name_from_draft: nullableField(z.string()),
  biography: z.string(),
  ascii: z.string(),
  ascii_short: nullableField(z.string()),
  time: TimestampSchema,
  /** Photo URL */
  photo: nullableField(z.string()),
  /** Thumbnail URL */
  photo_thumb: nullableField(z.string()),
  user: nullableField(z.string()),
  consent: nullableField(z.boolean()),
};

export const PersonSchema = z
  .object({
    ...personFields,
    resource_uri: uriSchema("person"),
  })
  .transform(freezeEntity);

export const HistoricalPersonSchema = z
  .object({
    ...personFields,
    resource_uri: uriSchema("historical-person"),
    history_change_reason: nullableField(z.string()),
    history_user: nullableField(z.string()),
    history_id: z.number().int(),
    /** "+" created, "~" changed, "-" deleted */
    history_type: z.string(),
    history_date: TimestampSchema,
  })
  .transform(freezeEntity);

export const PersonAliasSchema = z
  .object({
    id: z.number().int(),
    resource_uri: uriSchema("person-alias"),
    person: uriSchema("person"),
    name: z.string(),
  })
  .transform(freezeEntity);

// ============================================================================
// Exported Types
// ============================================================================

export type Person = z.infer<typeof PersonSchema>;
export type HistoricalPerson = z.infer<typeof HistoricalPersonSchema>;
export type PersonAlias = z.infer<typeof PersonAliasSchema>;

// ============================================================================
// Filter Types
// ============================================================================

export interface PersonFilter extends NameFilter, TimeRangeFilter, PageSizeFilter {}

export interface HistoricalPersonFilter
  extends NameFilter,
    TimeRangeFilter,
    PageSizeFilter {
  /** Only the history of this person */
  person?: PersonUri;
}

export interface PersonAliasFilter extends NameFilter, PageSizeFilter {
  /** Only aliases of this person */
  person?: PersonUri;
}

// ============================================================================
// Endpoint Interface
// ============================================================================

export interface PersonApi {
  /** Fetch the person a URI names */
  person: (uri: PersonUri) => Promise<Person>;

  /** Fetch a person by numeric identifier */
  personById: (id: number) => Promise<Person>;

  /** All people matching the filter */
  people: (filter?: PersonFilter) => PaginatedSequence<Person>;

  /** Fetch one historical person record */
  historicalPerson: (uri: HistoricalPersonUri) => Promise<HistoricalPerson>;

  /** Historical person records matching the filter */
  historicalPeople: (
    filter?: HistoricalPersonFilter,
  ) => PaginatedSequence<HistoricalPerson>;

  /** Fetch one alias */
  personAlias: (uri: PersonAliasUri) => Promise<PersonAlias>;

  /** Aliases matching the filter */
  personAliases: (filter?: PersonAliasFilter) => PaginatedSequence<PersonAlias>;
}

// ============================================================================
// Implementation
// ============================================================================

export function createPersonApi(client: ResourceClient): PersonApi {
  const person = (uri: PersonUri) => client.fetchResource(uri, PersonSchema);

  return {
    person,

    personById: async (id) => person(uriForId("person", id)),

    people: (filter = {}) => {
      const query = new QueryBuilder()
        .name(filter)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("person"), query));
      return new PaginatedSequence(client, url, PersonSchema);
    },

    historicalPerson: async (uri) =>
      client.fetchResource(uri, HistoricalPersonSchema),

    historicalPeople: (filter = {}) => {
      // Historical rows carry the id of the person they snapshot
      const query = new QueryBuilder()
        .equals("id", filter.person)
        .name(filter)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(
        withQuery(collectionPath("historical-person"), query),
      );
      return new PaginatedSequence(client, url, HistoricalPersonSchema);
    },

    personAlias: async (uri) => client.fetchResource(uri, PersonAliasSchema),

    personAliases: (filter = {}) => {
      const query = new QueryBuilder()
        .equals("person", filter.person)
        .name(filter)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("person-alias"), query));
      return new PaginatedSequence(client, url, PersonAliasSchema);
    },
  };
}
