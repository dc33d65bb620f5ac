/**
 * In-process HTTP transport for tests.
 *
 * Serves canned responses from a route table keyed by URL and records
 * every requested URL, so tests can assert exactly which requests were
 * made and in which order. Nothing leaves the process.
 */

export const TEST_ORIGIN = "https://datatracker.test";

export interface FakeResponse {
  status?: number;
  /** JSON-serialized before it is returned */
  body?: unknown;
  /** Returned verbatim; takes precedence over `body` */
  rawBody?: string;
  /** Thrown instead of returning a response */
  error?: Error;
}

export type FakeRoute =
  | FakeResponse
  | ((url: string) => FakeResponse | Promise<FakeResponse>);

export interface FakeTransportOptions {
  origin?: string;
  /** Routes keyed by absolute URL or by server-relative path and query */
  routes?: Record<string, FakeRoute>;
}

export interface FakeTransport {
  get: (
    url: string,
    options?: { timeoutMs?: number; headers?: Record<string, string> },
  ) => Promise<{ status: number; body: string }>;
  /** Every URL requested, in order */
  calls: string[];
  /** Add or replace a route */
  route: (pathOrUrl: string, route: FakeRoute) => void;
}

export function createFakeTransport(
  options: FakeTransportOptions = {},
): FakeTransport {
  const origin = options.origin ?? TEST_ORIGIN;
  const routes = new Map<string, FakeRoute>();
  const calls: string[] = [];

  const absolute = (pathOrUrl: string) =>
    /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${origin}${pathOrUrl}`;

  const route = (pathOrUrl: string, entry: FakeRoute) => {
    routes.set(absolute(pathOrUrl), entry);
  };

  for (const [key, entry] of Object.entries(options.routes ?? {})) {
    route(key, entry);
  }

  return {
    calls,
    route,
    get: async (url) => {
      calls.push(url);
      const entry = routes.get(url);
      if (entry === undefined) {
        return { status: 404, body: "" };
      }
      const response = typeof entry === "function" ? await entry(url) : entry;
      if (response.error) {
        throw response.error;
      }
      const body =
        response.rawBody ??
        (response.body === undefined ? "" : JSON.stringify(response.body));
      return { status: response.status ?? 200, body };
    },
  };
}
