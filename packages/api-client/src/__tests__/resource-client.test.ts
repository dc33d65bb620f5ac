import {
  assertLogContains,
  captureLogs,
  createFakeTransport,
  type FakeRoute,
  pageBody,
  TEST_ORIGIN,
} from "@dtrack/test-utils";
import { describe, expect, test } from "vitest";
import { z } from "zod";
import { ApiClientError } from "../errors";
import { HttpTransportError } from "../http-transport";
import { createResourceClient } from "../resource-client";
import { typedUri } from "../uri";

const ItemSchema = z.object({ id: z.number(), name: z.string() });

async function rejectionOf(promise: Promise<unknown>): Promise<ApiClientError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ApiClientError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the request to fail");
}

function setup(routes: Record<string, FakeRoute> = {}) {
  const transport = createFakeTransport({ routes });
  const { logger, lines } = captureLogs();
  const client = createResourceClient({
    transport,
    origin: TEST_ORIGIN,
    logger,
  });
  return { transport, client, lines };
}

describe("fetchOne", () => {
  test("decodes a single entity", async () => {
    const { client, transport } = setup({
      "/api/v1/doc/state/1/": { body: { id: 1, name: "Active" } },
    });

    const item = await client.fetchOne(
      `${TEST_ORIGIN}/api/v1/doc/state/1/`,
      ItemSchema,
    );

    expect(item).toEqual({ id: 1, name: "Active" });
    expect(transport.calls).toEqual([`${TEST_ORIGIN}/api/v1/doc/state/1/`]);
  });

  test("a non-2xx status is not_found and keeps the status", async () => {
    const { client, lines } = setup({
      "/api/v1/doc/state/1/": { status: 403, body: {} },
    });

    const error = await rejectionOf(
      client.fetchOne(`${TEST_ORIGIN}/api/v1/doc/state/1/`, ItemSchema),
    );

    expect(error.kind).toBe("not_found");
    expect(error.code).toBe("RESOURCE_NOT_FOUND");
    expect(error.details).toEqual({ status: 403 });
    expect(error.context?.url).toBe(`${TEST_ORIGIN}/api/v1/doc/state/1/`);
    assertLogContains(lines, { level: "warn", message: "not successful" });
  });

  test("a transport failure is a transport error with its cause", async () => {
    const cause = new HttpTransportError("network", "Request failed");
    const { client } = setup({ "/x/": { error: cause } });

    const error = await rejectionOf(
      client.fetchOne(`${TEST_ORIGIN}/x/`, ItemSchema),
    );

    expect(error.kind).toBe("transport");
    expect(error.code).toBe("TRANSPORT_FAILED");
    expect(error.cause).toBe(cause);
  });

  test("a timeout keeps its own code", async () => {
    const { client } = setup({
      "/x/": { error: new HttpTransportError("timeout", "Request timed out") },
    });

    const error = await rejectionOf(
      client.fetchOne(`${TEST_ORIGIN}/x/`, ItemSchema),
    );

    expect(error.kind).toBe("transport");
    expect(error.code).toBe("TRANSPORT_TIMEOUT");
  });

  test("a body that is not JSON is a transport error", async () => {
    const { client } = setup({ "/x/": { rawBody: "<html>oops</html>" } });

    const error = await rejectionOf(
      client.fetchOne(`${TEST_ORIGIN}/x/`, ItemSchema),
    );

    expect(error.kind).toBe("transport");
    expect(error.code).toBe("RESPONSE_INVALID");
    expect(error.details).toEqual({ body: "<html>oops</html>" });
  });

  test("a body of the wrong shape is a transport error", async () => {
    const { client } = setup({ "/x/": { body: { id: "1" } } });

    const error = await rejectionOf(
      client.fetchOne(`${TEST_ORIGIN}/x/`, ItemSchema),
    );

    expect(error.kind).toBe("transport");
    expect(error.message).toBe("Invalid response body");
  });

  test("logs each response at debug level", async () => {
    const { client, lines } = setup({ "/x/": { body: { id: 1, name: "a" } } });

    await client.fetchOne(`${TEST_ORIGIN}/x/`, ItemSchema);

    const line = lines.find((entry) => entry.msg === "[HTTP] Response received");
    expect(line?.level).toBe("debug");
    expect(line?.fields["url"]).toBe(`${TEST_ORIGIN}/x/`);
    expect(line?.fields["status"]).toBe(200);
  });
});

describe("fetchResource", () => {
  test("resolves the URI path against the origin", async () => {
    const { client, transport } = setup({
      "/api/v1/group/group/1/": { body: { id: 1, name: "IETF" } },
    });

    await client.fetchResource(typedUri("group", "/api/v1/group/group/1/"), ItemSchema);

    expect(transport.calls).toEqual([`${TEST_ORIGIN}/api/v1/group/group/1/`]);
  });

  test("an empty URI is not_found without a request", async () => {
    const { client, transport } = setup();

    const error = await rejectionOf(
      client.fetchResource(typedUri("group", ""), ItemSchema),
    );

    expect(error.kind).toBe("not_found");
    expect(transport.calls).toEqual([]);
  });
});

describe("fetchPage", () => {
  test("decodes a page envelope", async () => {
    const { client } = setup({
      "/api/v1/doc/state/?limit=1": {
        body: pageBody({
          path: "/api/v1/doc/state/",
          objects: [{ id: 1, name: "Active" }],
          limit: 1,
          totalCount: 3,
        }),
      },
    });

    const page = await client.fetchPage(
      `${TEST_ORIGIN}/api/v1/doc/state/?limit=1`,
      ItemSchema,
    );

    expect(page.objects).toEqual([{ id: 1, name: "Active" }]);
    expect(page.meta.totalCount).toBe(3);
    expect(page.meta.next).toBe("/api/v1/doc/state/?limit=1&offset=1");
  });

  test("issues exactly one request per call", async () => {
    const { client, transport } = setup({
      "/p/": { body: pageBody({ path: "/p/", objects: [], limit: 20 }) },
    });

    await client.fetchPage(`${TEST_ORIGIN}/p/`, ItemSchema);
    await client.fetchPage(`${TEST_ORIGIN}/p/`, ItemSchema);

    expect(transport.calls).toHaveLength(2);
  });
});

describe("resolve", () => {
  test("turns a cursor into an absolute URL", () => {
    const { client } = setup();
    expect(client.resolve("/api/v1/doc/state/?offset=20")).toBe(
      `${TEST_ORIGIN}/api/v1/doc/state/?offset=20`,
    );
  });

  test("refuses a URL on another origin", () => {
    const { client, lines } = setup();
    try {
      client.resolve("https://elsewhere.test/api/v1/doc/state/");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiClientError);
      expect(error).toMatchObject({ kind: "transport", code: "RESPONSE_INVALID" });
    }
    assertLogContains(lines, { level: "warn", message: "outside the API origin" });
  });
});
