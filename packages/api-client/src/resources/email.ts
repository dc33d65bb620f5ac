/**
 * Email addresses and their history.
 *
 * Addresses double as identifiers: an email resource lives at
 * `/api/v1/person/email/<address>/`.
 */

import { z } from "zod";
import { freezeEntity, nullableField } from "../entity";
import { InvalidFilterError } from "../errors";
import {
  collectionPath,
  type PageSizeFilter,
  QueryBuilder,
  type TimeRangeFilter,
  withQuery,
} from "../filters";
import { PaginatedSequence } from "../paginated-sequence";
import type { ResourceClient } from "../resource-client";
import { TimestampSchema } from "../timestamp";
import {
  type EmailUri,
  type HistoricalEmailUri,
  type PersonUri,
  uriForId,
  uriSchema,
} from "../uri";
import { type Person, PersonSchema } from "./person";

// ============================================================================
// Zod Schemas
// ============================================================================

const emailFields = {
  address: z.string(),
  person: uriSchema("person"),
  time: TimestampSchema,
  /** Where the address was learned from, e.g. "author: draft-..." */
  origin: z.string(),
  primary: z.boolean(),
  active: z.boolean(),
};

export const EmailSchema = z
  .object({
    ...emailFields,
    resource_uri: uriSchema("email"),
  })
  .transform(freezeEntity);

export const HistoricalEmailSchema = z
  .object({
    ...emailFields,
    resource_uri: uriSchema("historical-email"),
    history_change_reason: nullableField(z.string()),
    history_user: nullableField(z.string()),
    history_id: z.number().int(),
    history_type: z.string(),
    history_date: TimestampSchema,
  })
  .transform(freezeEntity);

// ============================================================================
// Exported Types
// ============================================================================

export type Email = z.infer<typeof EmailSchema>;
export type HistoricalEmail = z.infer<typeof HistoricalEmailSchema>;

// ============================================================================
// Filter Types
// ============================================================================

export interface EmailFilter extends TimeRangeFilter, PageSizeFilter {
  /** Only primary (true) or only secondary (false) addresses */
  primary?: boolean;
  /** Only active (true) or only inactive (false) addresses */
  active?: boolean;
}

export interface HistoricalEmailFilter extends TimeRangeFilter, PageSizeFilter {
  address?: string;
  person?: PersonUri;
}

// ============================================================================
// Endpoint Interface
// ============================================================================

export interface EmailApi {
  /** Look up an email record by address */
  email: (address: string) => Promise<Email>;

  /** Fetch the email record a URI names */
  emailByUri: (uri: EmailUri) => Promise<Email>;

  /**
   * Look up the person owning an address: the email record first, then the
   * person it references. A failed first step skips the second.
   */
  personFromEmail: (address: string) => Promise<Person>;

  /** Addresses belonging to a person */
  emailsForPerson: (
    person: PersonUri,
    filter?: EmailFilter,
  ) => PaginatedSequence<Email>;

  /** Fetch one historical email record */
  historicalEmail: (uri: HistoricalEmailUri) => Promise<HistoricalEmail>;

  /** Historical email records matching the filter */
  historicalEmails: (
    filter?: HistoricalEmailFilter,
  ) => PaginatedSequence<HistoricalEmail>;
}

// ============================================================================
// Implementation
// ============================================================================

function checkAddress(address: string): void {
  if (address.trim().length === 0) {
    throw new InvalidFilterError("address", "Email address must not be empty");
  }
}

export function createEmailApi(client: ResourceClient): EmailApi {
  const email = async (address: string) => {
    checkAddress(address);
    return client.fetchResource(uriForId("email", address), EmailSchema);
  };

  return {
    email,

    emailByUri: async (uri) => client.fetchResource(uri, EmailSchema),

    personFromEmail: async (address) => {
      const record = await email(address);
      return client.fetchResource(record.person, PersonSchema);
    },

    emailsForPerson: (person, filter = {}) => {
      const query = new QueryBuilder()
        .equals("person", person)
        .equals("primary", filter.primary)
        .equals("active", filter.active)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(withQuery(collectionPath("email"), query));
      return new PaginatedSequence(client, url, EmailSchema);
    },

    historicalEmail: async (uri) =>
      client.fetchResource(uri, HistoricalEmailSchema),

    historicalEmails: (filter = {}) => {
      const query = new QueryBuilder()
        .equals("address", filter.address)
        .equals("person", filter.person)
        .timeRange("time", filter)
        .pageSize(filter.limit);
      const url = client.resolve(
        withQuery(collectionPath("historical-email"), query),
      );
      return new PaginatedSequence(client, url, HistoricalEmailSchema);
    },
  };
}
