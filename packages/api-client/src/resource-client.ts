/**
 * Resource Client
 *
 * Issues single GET requests against the API and decodes the body either
 * as one entity or as one page of a collection. Holds no per-request
 * state, so one client can back any number of sequences at once.
 */

import type { PageEnvelope } from "@dtrack/shared/api";
import { createSilentLogger, type Logger } from "@dtrack/shared";
import type { z } from "zod";
import { decodePageEnvelope } from "./envelope";
import { ApiClientError } from "./errors";
import {
  type HttpResponse,
  type HttpTransport,
  HttpTransportError,
} from "./http-transport";
import { resolveUrl, type TypedUri, type UriKind } from "./uri";

export interface ResourceClientOptions {
  transport: HttpTransport;
  /** Scheme and host server-relative paths resolve against */
  origin: string;
  /** Per-request timeout passed to the transport */
  timeoutMs?: number;
  logger?: Logger;
}

export interface ResourceClient {
  readonly origin: string;
  readonly logger: Logger;

  /**
   * Absolute URL for a server-relative path or cursor.
   * @throws ApiClientError `transport` when it points outside the origin
   */
  resolve: (pathOrUrl: string) => string;

  /**
   * GET one entity.
   * @throws ApiClientError `not_found` on a non-2xx status, `transport` otherwise
   */
  fetchOne: <T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) => Promise<T>;

  /** GET the entity a typed URI names. */
  fetchResource: <T>(
    uri: TypedUri<UriKind>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) => Promise<T>;

  /**
   * GET one page of a collection.
   * @throws ApiClientError `not_found` on a non-2xx status, `transport` otherwise
   */
  fetchPage: <T>(
    url: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) => Promise<PageEnvelope<T>>;
}

const MAX_BODY_SNIPPET = 500;

export function createResourceClient(
  options: ResourceClientOptions,
): ResourceClient {
  const { transport, origin } = options;
  const logger = options.logger ?? createSilentLogger();

  const requestOptions =
    options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {};

  /** One GET; returns the parsed JSON body of a 2xx response. */
  const getJson = async (url: string): Promise<unknown> => {
    const startTime = Date.now();

    let response: HttpResponse;
    try {
      response = await transport.get(url, requestOptions);
    } catch (error) {
      const timedOut =
        error instanceof HttpTransportError && error.kind === "timeout";
      logger.warn(
        { url, kind: "transport", error: String(error) },
        "[HTTP] Request failed",
      );
      throw new ApiClientError(
        "transport",
        timedOut ? "TRANSPORT_TIMEOUT" : "TRANSPORT_FAILED",
        timedOut ? "Request timed out" : "Request could not be completed",
        { cause: error, context: { url } },
      );
    }

    const durationMs = Date.now() - startTime;
    logger.debug(
      { url, status: response.status, durationMs },
      "[HTTP] Response received",
    );

    if (response.status < 200 || response.status > 299) {
      logger.warn(
        { url, kind: "not_found", status: response.status },
        "[HTTP] Request was not successful",
      );
      throw new ApiClientError(
        "not_found",
        "RESOURCE_NOT_FOUND",
        `Request failed with status ${response.status}`,
        { details: { status: response.status }, context: { url } },
      );
    }

    try {
      return JSON.parse(response.body);
    } catch (error) {
      logger.warn({ url, kind: "transport" }, "[HTTP] Body is not JSON");
      throw new ApiClientError(
        "transport",
        "RESPONSE_INVALID",
        "Failed to parse response body",
        {
          cause: error,
          context: { url },
          details: { body: response.body.slice(0, MAX_BODY_SNIPPET) },
        },
      );
    }
  };

  const invalidResponse = (url: string, issues: z.ZodIssue[]) => {
    logger.warn(
      { url, kind: "transport", issues: issues.length },
      "[HTTP] Response did not match the expected shape",
    );
    return new ApiClientError(
      "transport",
      "RESPONSE_INVALID",
      "Invalid response body",
      { details: { issues }, context: { url } },
    );
  };

  const resolve = (pathOrUrl: string): string => {
    const url = resolveUrl(origin, pathOrUrl);
    if (url === undefined) {
      logger.warn(
        { origin, target: pathOrUrl, kind: "transport" },
        "[HTTP] Refusing URL outside the API origin",
      );
      throw new ApiClientError(
        "transport",
        "RESPONSE_INVALID",
        `URL is outside the API origin: ${pathOrUrl}`,
        { details: { origin, target: pathOrUrl } },
      );
    }
    return url;
  };

  const fetchOne = async <T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> => {
    const body = await getJson(url);
    const result = schema.safeParse(body);
    if (!result.success) {
      throw invalidResponse(url, result.error.issues);
    }
    return result.data;
  };

  return {
    origin,
    logger,
    resolve,
    fetchOne,

    fetchResource: async (uri, schema) => {
      if (uri.isEmpty) {
        throw new ApiClientError(
          "not_found",
          "RESOURCE_NOT_FOUND",
          `Empty ${uri.kind} URI names no resource`,
          { details: { kind: uri.kind } },
        );
      }
      return fetchOne(resolve(uri.path), schema);
    },

    fetchPage: async (url, itemSchema) => {
      const body = await getJson(url);
      const result = decodePageEnvelope(body, itemSchema);
      if (!result.success) {
        throw invalidResponse(url, result.issues);
      }
      return result.data;
    },
  };
}
