/**
 * Groups, group types and group states.
 */

import { z } from "zod";
import { freezeEntity, nullableField } from "../entity";
import { ApiClientError, InvalidFilterError } from "../errors";
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
  type GroupStateUri,
  type GroupTypeUri,
  type GroupUri,
  type PersonUri,
  uriSchema,
} from "../uri";

// ============================================================================
// Zod Schemas
// ============================================================================

export const GroupSchema = z
  .object({
    id: z.number().int(),
    resource_uri: uriSchema("group"),
    acronym: z.string(),
    name: z.string(),
    description: z.string(),
    charter: nullableField(uriSchema("document")),
    ad: nullableField(uriSchema("person")),
    time: TimestampSchema,
    type: uriSchema("group-type"),
    comments: z.string(),
    /** Top-level groups have no parent */
    parent: nullableField(uriSchema("group")),
    state: uriSchema("group-state"),
    unused_states: z.array(uriSchema("doc-state")),
    unused_tags: z.array(z.string()),
    list_email: z.string(),
    list_subscribe: z.string(),
    list_archive: z.string(),
  })
  .transform(freezeEntity);

export const GroupTypeSchema = z
  .object({
    resource_uri: uriSchema("group-type"),
    name: z.string(),
    verbose_name: z.string(),
    slug: z.string(),
    desc: z.string(),
    used: z.boolean(),
    order: z.number().int(),
  })
  .transform(freezeEntity);

export const GroupStateSchema = z
  .object({
    resource_uri: uriSchema("group-state"),
    name: z.string(),
    desc: z.string(),
    slug: z.string(),
    used: z.boolean(),
    order: z.number().int(),
  })
  .transform(freezeEntity);

// ============================================================================
// Exported Types
// ============================================================================

export type Group = z.infer<typeof GroupSchema>;
export type GroupType = z.infer<typeof GroupTypeSchema>;
export type GroupState = z.infer<typeof GroupStateSchema>;

// ============================================================================
// Filter Types
// ============================================================================

export interface GroupFilter extends NameFilter, TimeRangeFilter, PageSizeFilter {
  /** Only groups in this state, e.g. active */
  state?: GroupStateUri;
  /** Only groups of this type, e.g. wg */
  type?: GroupTypeUri;
  /** Only direct children of this group */
  parent?: GroupUri;
  /** Only groups with this area director */
  ad?: PersonUri;
}

// ============================================================================
// Endpoint Interface
// ============================================================================

export interface GroupApi {
  /** Fetch the group a URI names */
  group: (uri: GroupUri) => Promise<Group>;

  /**
   * Find the group with this acronym.
   * @throws ApiClientError `not_found` when no group has the acronym
   */
  groupByAcronym: (acronym: string) => Promise<Group>;

  /** Groups matching the filter */
  groups: (filter?: GroupFilter) => PaginatedSequence<Group>;

  /** Fetch one group type */
  groupType: (uri: GroupTypeUri) => Promise<GroupType>;

  /** All group types */
  groupTypes: (filter?: PageSizeFilter) => PaginatedSequence<GroupType>;

  /** Fetch one group state */
  groupState: (uri: GroupStateUri) => Promise<GroupState>;

  /** All group states */
  groupStates: (filter?: PageSizeFilter) => PaginatedSequence<GroupState>;
}

// ============================================================================
// Implementation
// ============================================================================

export function createGroupApi(client: ResourceClient): GroupApi {
  return {
    group: async (uri) => client.fetchResource(uri, GroupSchema),

    groupByAcronym: async (acronym) => {
      if (acronym.trim().length === 0) {
        throw new InvalidFilterError("acronym", "Acronym must not be empty");
      }
      const query = new QueryBuilder().equals("acronym", acronym);
      const url = client.resolve(withQuery(collectionPath("group"), query));
      const page = await client.fetchPage(url, GroupSchema);
      const [group] = page.objects;
      if (group === undefined) {
        throw new ApiClientError(
          "not_found",
          "RESOURCE_NOT_FOUND",
          `No group with acronym ${acronym}`,
          { details: { resourceType: "group", acronym }, context: { url } },
        );
      }
      return group;
    },

    groups: (filter = {}) => {
      const query = new QueryBuilder()
        .name(filter)
        .equals("state", filter.state)
        .equals("type", filter.type)
        .equals("parent", filter.parent)
        .equals("ad", filter.ad)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("group"), query));
      return new PaginatedSequence(client, url, GroupSchema);
    },

    groupType: async (uri) => client.fetchResource(uri, GroupTypeSchema),

    groupTypes: (filter = {}) => {
      const query = new QueryBuilder().pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("group-type"), query));
      return new PaginatedSequence(client, url, GroupTypeSchema);
    },

    groupState: async (uri) => client.fetchResource(uri, GroupStateSchema),

    groupStates: (filter = {}) => {
      const query = new QueryBuilder().pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("group-state"), query));
      return new PaginatedSequence(client, url, GroupStateSchema);
    },
  };
}
