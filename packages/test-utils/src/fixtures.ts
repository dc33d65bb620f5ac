/**
 * Wire-format fixtures.
 *
 * Records are built the way the server sends them: snake_case keys,
 * server-relative URIs and zone-less UTC timestamps.
 */

export type WireRecord = Record<string, unknown>;

export const FIXTURE_TIME = "2012-02-26T00:03:54";

// ============================================================================
// Pages
// ============================================================================

export interface PageBodyOptions {
  /** Collection path, e.g. `/api/v1/person/person/` */
  path: string;
  objects: WireRecord[];
  limit: number;
  offset?: number;
  /** Defaults to offset + objects.length when this is the last page */
  totalCount?: number;
  /** Extra query parameters carried in cursors, e.g. `name__contains=x` */
  query?: string;
}

export function pageCursor(
  path: string,
  limit: number,
  offset: number,
  query?: string,
): string {
  const params = [query, `limit=${limit}`, offset > 0 ? `offset=${offset}` : undefined]
    .filter((part) => part !== undefined && part !== "")
    .join("&");
  return `${path}?${params}`;
}

export function pageBody(options: PageBodyOptions): WireRecord {
  const offset = options.offset ?? 0;
  const totalCount = options.totalCount ?? offset + options.objects.length;
  const nextOffset = offset + options.limit;
  return {
    meta: {
      total_count: totalCount,
      limit: options.limit,
      offset,
      previous:
        offset > 0
          ? pageCursor(options.path, options.limit, Math.max(0, offset - options.limit), options.query)
          : null,
      next:
        nextOffset < totalCount
          ? pageCursor(options.path, options.limit, nextOffset, options.query)
          : null,
    },
    objects: options.objects,
  };
}

/**
 * Routes serving `items` as consecutive pages of `limit` items, keyed by
 * the cursor of each page (the first page has no offset).
 */
export function paginatedRoutes(
  path: string,
  items: WireRecord[],
  limit: number,
  query?: string,
): Record<string, { body: WireRecord }> {
  const routes: Record<string, { body: WireRecord }> = {};
  const totalCount = items.length;
  let offset = 0;
  do {
    routes[pageCursor(path, limit, offset, query)] = {
      body: pageBody({
        path,
        objects: items.slice(offset, offset + limit),
        limit,
        offset,
        totalCount,
        ...(query !== undefined && { query }),
      }),
    };
    offset += limit;
  } while (offset < totalCount);
  return routes;
}

// ============================================================================
// People
// ============================================================================

export function personRecord(id: number, overrides: WireRecord = {}): WireRecord {
  return {
    id,
    resource_uri: `/api/v1/person/person/${id}/`,
    name: `Person ${id}`,
    name_from_draft: null,
    biography: "",
    ascii: `Person ${id}`,
    ascii_short: null,
    time: FIXTURE_TIME,
    photo: null,
    photo_thumb: null,
    user: "",
    consent: true,
    ...overrides,
  };
}

export function historicalPersonRecord(
  historyId: number,
  personId: number,
  overrides: WireRecord = {},
): WireRecord {
  return {
    ...personRecord(personId),
    resource_uri: `/api/v1/person/historicalperson/${historyId}/`,
    history_change_reason: null,
    history_user: null,
    history_id: historyId,
    history_type: "~",
    history_date: FIXTURE_TIME,
    ...overrides,
  };
}

export function personAliasRecord(
  id: number,
  personId: number,
  overrides: WireRecord = {},
): WireRecord {
  return {
    id,
    resource_uri: `/api/v1/person/alias/${id}/`,
    person: `/api/v1/person/person/${personId}/`,
    name: `Alias ${id}`,
    ...overrides,
  };
}

// ============================================================================
// Email
// ============================================================================

export function emailRecord(
  address: string,
  personId: number,
  overrides: WireRecord = {},
): WireRecord {
  return {
    address,
    resource_uri: `/api/v1/person/email/${address}/`,
    person: `/api/v1/person/person/${personId}/`,
    time: FIXTURE_TIME,
    origin: "",
    primary: true,
    active: true,
    ...overrides,
  };
}

export function historicalEmailRecord(
  historyId: number,
  address: string,
  personId: number,
  overrides: WireRecord = {},
): WireRecord {
  return {
    ...emailRecord(address, personId),
    resource_uri: `/api/v1/person/historicalemail/${historyId}/`,
    history_change_reason: null,
    history_user: null,
    history_id: historyId,
    history_type: "+",
    history_date: FIXTURE_TIME,
    ...overrides,
  };
}

// ============================================================================
// Documents
// ============================================================================

export function documentRecord(name: string, overrides: WireRecord = {}): WireRecord {
  return {
    id: 1,
    resource_uri: `/api/v1/doc/document/${name}/`,
    name,
    title: `Title of ${name}`,
    pages: 12,
    words: 3400,
    time: FIXTURE_TIME,
    notify: "",
    expires: null,
    type: "/api/v1/name/doctypename/draft/",
    rfc: null,
    rev: "00",
    abstract: "",
    internal_comments: "",
    order: 1,
    note: "",
    ad: null,
    shepherd: null,
    group: "/api/v1/group/group/1/",
    stream: null,
    std_level: null,
    intended_std_level: null,
    states: ["/api/v1/doc/state/1/"],
    submissions: [],
    tags: [],
    uploaded_filename: "",
    external_url: "",
    ...overrides,
  };
}

export function docStateRecord(
  id: number,
  slug: string,
  overrides: WireRecord = {},
): WireRecord {
  return {
    id,
    resource_uri: `/api/v1/doc/state/${id}/`,
    name: slug,
    desc: "",
    slug,
    next_states: [],
    used: true,
    order: 0,
    type: "/api/v1/doc/statetype/draft/",
    ...overrides,
  };
}

export function docStateTypeRecord(slug: string, overrides: WireRecord = {}): WireRecord {
  return {
    resource_uri: `/api/v1/doc/statetype/${slug}/`,
    slug,
    label: `${slug} state`,
    ...overrides,
  };
}

// ============================================================================
// Groups
// ============================================================================

export function groupRecord(
  id: number,
  acronym: string,
  overrides: WireRecord = {},
): WireRecord {
  return {
    id,
    resource_uri: `/api/v1/group/group/${id}/`,
    acronym,
    name: `${acronym} Working Group`,
    description: "",
    charter: null,
    ad: null,
    time: FIXTURE_TIME,
    type: "/api/v1/name/grouptypename/wg/",
    comments: "",
    parent: null,
    state: "/api/v1/name/groupstatename/active/",
    unused_states: [],
    unused_tags: [],
    list_email: "",
    list_subscribe: "",
    list_archive: "",
    ...overrides,
  };
}

export function groupTypeRecord(slug: string, overrides: WireRecord = {}): WireRecord {
  return {
    resource_uri: `/api/v1/name/grouptypename/${slug}/`,
    name: slug.toUpperCase(),
    verbose_name: `${slug} group`,
    slug,
    desc: "",
    used: true,
    order: 0,
    ...overrides,
  };
}

export function groupStateRecord(slug: string, overrides: WireRecord = {}): WireRecord {
  return {
    resource_uri: `/api/v1/name/groupstatename/${slug}/`,
    name: slug,
    desc: "",
    slug,
    used: true,
    order: 0,
    ...overrides,
  };
}
