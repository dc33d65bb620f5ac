/**
 * HTTP transport.
 *
 * The one seam through which the client talks to the network. The
 * default implementation wraps the global `fetch`; tests substitute an
 * in-process transport.
 */

export type HttpTransportErrorKind = "network" | "timeout";

export class HttpTransportError extends Error {
  readonly kind: HttpTransportErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: HttpTransportErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HttpTransportError";
    this.kind = kind;
    if (details) {
      this.details = details;
    }
  }
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpRequestOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface HttpTransport {
  get: (url: string, options?: HttpRequestOptions) => Promise<HttpResponse>;
}

export interface FetchTransportDefaults {
  timeoutMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
  /** fetch implementation (default: the global fetch) */
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export function createFetchTransport(
  defaults: FetchTransportDefaults = {},
): HttpTransport {
  const fetchImpl = defaults.fetch ?? fetch;

  return {
    get: async (url, options) => {
      const timeoutMs =
        options?.timeoutMs ?? defaults.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      const headers: Record<string, string> = {
        Accept: "application/json",
        ...(defaults.headers ?? {}),
        ...(options?.headers ?? {}),
      };
      if (defaults.userAgent) {
        headers["User-Agent"] = defaults.userAgent;
      }

      const controller = new AbortController();
      const timeoutId =
        timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

      try {
        const response = await fetchImpl(url, {
          method: "GET",
          headers,
          signal: controller.signal,
        });
        const body = await response.text();
        return { status: response.status, body };
      } catch (error) {
        if (controller.signal.aborted) {
          throw new HttpTransportError("timeout", "Request timed out", {
            url,
            timeoutMs,
          });
        }
        throw new HttpTransportError("network", "Request failed", {
          url,
          cause: error instanceof Error ? error.message : String(error),
        });
      } finally {
        if (timeoutId !== undefined) {
          clearTimeout(timeoutId);
        }
      }
    },
  };
}
