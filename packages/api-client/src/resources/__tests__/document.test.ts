import {
  createFakeTransport,
  docStateRecord,
  docStateTypeRecord,
  documentRecord,
  type FakeRoute,
  pageBody,
  TEST_ORIGIN,
} from "@dtrack/test-utils";
import { describe, expect, test } from "vitest";
import { InvalidFilterError } from "../../errors";
import { createResourceClient } from "../../resource-client";
import { docStateUri, documentUri, groupUri, typedUri } from "../../uri";
import { createDocumentApi } from "../document";

const DRAFT = "draft-ietf-example-protocol";

function setup(routes: Record<string, FakeRoute> = {}) {
  const transport = createFakeTransport({ routes });
  const api = createDocumentApi(
    createResourceClient({ transport, origin: TEST_ORIGIN }),
  );
  return { transport, api };
}

describe("document", () => {
  test("decodes cross-resource references as typed URIs", async () => {
    const { api } = setup({
      [`/api/v1/doc/document/${DRAFT}/`]: {
        body: documentRecord(DRAFT, {
          expires: "2020-10-01T00:00:00",
          shepherd: "/api/v1/person/email/shepherd@example.org/",
        }),
      },
    });

    const doc = await api.document(documentUri(`/api/v1/doc/document/${DRAFT}/`));

    expect(doc.name).toBe(DRAFT);
    expect(doc.group?.equals(groupUri("/api/v1/group/group/1/"))).toBe(true);
    expect(doc.states.map((state) => state.path)).toEqual(["/api/v1/doc/state/1/"]);
    expect(doc.shepherd?.kind).toBe("email");
    expect(doc.expires?.toISOString()).toBe("2020-10-01T00:00:00.000Z");
    expect(Object.isFrozen(doc.states)).toBe(true);
  });

  test("a reference of the wrong kind fails decoding", async () => {
    const { api } = setup({
      [`/api/v1/doc/document/${DRAFT}/`]: {
        body: documentRecord(DRAFT, { group: "/api/v1/person/person/1/" }),
      },
    });

    await expect(api.documentByName(DRAFT)).rejects.toMatchObject({
      kind: "transport",
      code: "RESPONSE_INVALID",
    });
  });

  test("documentByName requests the document's path", async () => {
    const { api, transport } = setup({
      [`/api/v1/doc/document/${DRAFT}/`]: { body: documentRecord(DRAFT) },
    });

    await api.documentByName(DRAFT);

    expect(transport.calls).toEqual([`${TEST_ORIGIN}/api/v1/doc/document/${DRAFT}/`]);
  });

  test("documentByName rejects a blank name", async () => {
    await expect(setup().api.documentByName("")).rejects.toBeInstanceOf(
      InvalidFilterError,
    );
  });
});

describe("documents", () => {
  test("encodes group, state and name filters", async () => {
    const path = "/api/v1/doc/document/";
    const query = "name__contains=example&group=1&states=3&limit=50";
    const { api, transport } = setup({
      [`${path}?${query}`]: {
        body: pageBody({ path, objects: [documentRecord(DRAFT)], limit: 50 }),
      },
    });

    const docs = await api
      .documents({
        nameContains: "example",
        group: groupUri("/api/v1/group/group/1/"),
        state: docStateUri("/api/v1/doc/state/3/"),
        limit: 50,
      })
      .collect();

    expect(docs).toHaveLength(1);
    expect(transport.calls).toEqual([`${TEST_ORIGIN}${path}?${query}`]);
  });
});

describe("document states", () => {
  test("docState decodes its successor states", async () => {
    const { api } = setup({
      "/api/v1/doc/state/3/": {
        body: docStateRecord(3, "active", { next_states: ["/api/v1/doc/state/4/"] }),
      },
    });

    const state = await api.docState(docStateUri("/api/v1/doc/state/3/"));

    expect(state.slug).toBe("active");
    expect(state.next_states[0]?.id).toBe("4");
    expect(state.type.kind).toBe("doc-state-type");
  });

  test("docStates filters by state type and slug", async () => {
    const path = "/api/v1/doc/state/";
    const { api } = setup({
      [`${path}?type=draft&slug=active`]: {
        body: pageBody({ path, objects: [docStateRecord(3, "active")], limit: 20 }),
      },
    });

    const states = await api
      .docStates({
        stateType: typedUri("doc-state-type", "/api/v1/doc/statetype/draft/"),
        slug: "active",
      })
      .collect();

    expect(states.map((state) => state.id)).toEqual([3]);
  });

  test("docStateType and docStateTypes", async () => {
    const path = "/api/v1/doc/statetype/";
    const { api } = setup({
      [`${path}draft/`]: { body: docStateTypeRecord("draft") },
      [path]: {
        body: pageBody({
          path,
          objects: [docStateTypeRecord("draft"), docStateTypeRecord("charter")],
          limit: 20,
        }),
      },
    });

    const single = await api.docStateType(
      typedUri("doc-state-type", `${path}draft/`),
    );
    const all = await api.docStateTypes().collect();

    expect(single.label).toBe("draft state");
    expect(all.map((type) => type.slug)).toEqual(["draft", "charter"]);
  });
});
