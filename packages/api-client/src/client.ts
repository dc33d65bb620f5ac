/**
 * Tracker Client
 *
 * One entry point over every resource family. All endpoint methods share
 * a single resource client, so sequences created from the same tracker
 * client share its transport, origin and logger.
 *
 * ```typescript
 * const tracker = createTrackerClient();
 * const person = await tracker.personFromEmail("someone@example.org");
 * for await (const group of tracker.groups({ nameContains: "QUIC" })) {
 *   console.log(group.acronym);
 * }
 * ```
 */

import {
  type ConfigEnv,
  createLogger,
  type Logger,
  loadTrackerConfig,
  type TrackerConfig,
  type TrackerConfigInput,
} from "@dtrack/shared";
import type { PageSizeFilter } from "./filters";
import { createFetchTransport, type HttpTransport } from "./http-transport";
import {
  createResourceClient,
  type ResourceClient,
} from "./resource-client";
import { createDocumentApi, type DocumentApi } from "./resources/document";
import { createEmailApi, type EmailApi } from "./resources/email";
import { createGroupApi, type GroupApi } from "./resources/group";
import { createPersonApi, type PersonApi } from "./resources/person";

export interface TrackerClientOptions {
  /** HTTP transport (default: fetch-based, configured from `config`) */
  transport?: HttpTransport;
  /** Programmatic configuration, applied under environment overrides */
  config?: TrackerConfigInput;
  /** Environment read for overrides (default: process.env) */
  env?: ConfigEnv;
  /** Logger (default: pino at the configured level) */
  logger?: Logger;
}

export interface TrackerClient
  extends PersonApi,
    EmailApi,
    DocumentApi,
    GroupApi {
  /** Resolved configuration the client was built with */
  readonly config: TrackerConfig;
  /** Underlying resource client, for requests outside the typed methods */
  readonly resources: ResourceClient;
}

export function createTrackerClient(
  options: TrackerClientOptions = {},
): TrackerClient {
  const config = loadTrackerConfig(options.config, options.env);
  const { api } = config;

  const logger =
    options.logger ??
    createLogger({ name: "dtrack-client", level: config.logging.level });

  const transport =
    options.transport ??
    createFetchTransport({
      timeoutMs: api.timeoutMs,
      ...(api.userAgent !== undefined && { userAgent: api.userAgent }),
    });

  const resources = createResourceClient({
    transport,
    origin: api.origin,
    timeoutMs: api.timeoutMs,
    logger,
  });

  logger.debug(
    { origin: api.origin, timeoutMs: api.timeoutMs },
    "[CLIENT] Tracker client created",
  );

  const people = createPersonApi(resources);
  const email = createEmailApi(resources);
  const documents = createDocumentApi(resources);
  const groups = createGroupApi(resources);

  // The configured page size applies wherever a filter names none
  const pageDefaults: PageSizeFilter =
    api.defaultPageSize !== undefined ? { limit: api.defaultPageSize } : {};

  return {
    config,
    resources,
    ...people,
    ...email,
    ...documents,
    ...groups,

    people: (filter) => people.people({ ...pageDefaults, ...filter }),
    historicalPeople: (filter) => people.historicalPeople({ ...pageDefaults, ...filter }),
    personAliases: (filter) => people.personAliases({ ...pageDefaults, ...filter }),
    emailsForPerson: (person, filter) =>
      email.emailsForPerson(person, { ...pageDefaults, ...filter }),
    historicalEmails: (filter) => email.historicalEmails({ ...pageDefaults, ...filter }),
    documents: (filter) => documents.documents({ ...pageDefaults, ...filter }),
    docStates: (filter) => documents.docStates({ ...pageDefaults, ...filter }),
    docStateTypes: (filter) => documents.docStateTypes({ ...pageDefaults, ...filter }),
    groups: (filter) => groups.groups({ ...pageDefaults, ...filter }),
    groupTypes: (filter) => groups.groupTypes({ ...pageDefaults, ...filter }),
    groupStates: (filter) => groups.groupStates({ ...pageDefaults, ...filter }),
  };
}
