import {
  createFakeTransport,
  emailRecord,
  type FakeRoute,
  historicalEmailRecord,
  pageBody,
  personRecord,
  TEST_ORIGIN,
} from "@dtrack/test-utils";
import { describe, expect, test } from "vitest";
import { ApiClientError, InvalidFilterError } from "../../errors";
import { createResourceClient } from "../../resource-client";
import { emailUri, personUri, typedUri } from "../../uri";
import { createEmailApi } from "../email";

const ADDRESS = "person@example.org";

function setup(routes: Record<string, FakeRoute> = {}) {
  const transport = createFakeTransport({ routes });
  const api = createEmailApi(createResourceClient({ transport, origin: TEST_ORIGIN }));
  return { transport, api };
}

describe("email", () => {
  test("looks up a record by address", async () => {
    const { api, transport } = setup({
      [`/api/v1/person/email/${ADDRESS}/`]: { body: emailRecord(ADDRESS, 20209) },
    });

    const email = await api.email(ADDRESS);

    expect(email.address).toBe(ADDRESS);
    expect(email.person.equals(personUri("/api/v1/person/person/20209/"))).toBe(true);
    expect(transport.calls).toEqual([
      `${TEST_ORIGIN}/api/v1/person/email/${ADDRESS}/`,
    ]);
  });

  test("emailByUri fetches the named record", async () => {
    const { api } = setup({
      [`/api/v1/person/email/${ADDRESS}/`]: {
        body: emailRecord(ADDRESS, 1, { primary: false }),
      },
    });

    const email = await api.emailByUri(emailUri(`/api/v1/person/email/${ADDRESS}/`));

    expect(email.primary).toBe(false);
  });

  test("an unknown address is not_found", async () => {
    const { api } = setup();

    const error = await api.email("nobody@example.org").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiClientError);
    expect(error).toMatchObject({ kind: "not_found", details: { status: 404 } });
  });

  test("a blank address fails locally", async () => {
    const { api, transport } = setup();
    await expect(api.email("  ")).rejects.toBeInstanceOf(InvalidFilterError);
    expect(transport.calls).toEqual([]);
  });
});

describe("personFromEmail", () => {
  test("follows the email's person reference", async () => {
    const { api, transport } = setup({
      [`/api/v1/person/email/${ADDRESS}/`]: { body: emailRecord(ADDRESS, 20209) },
      "/api/v1/person/person/20209/": {
        body: personRecord(20209, { name: "Test Person" }),
      },
    });

    const person = await api.personFromEmail(ADDRESS);

    expect(person.id).toBe(20209);
    expect(person.name).toBe("Test Person");
    expect(transport.calls).toEqual([
      `${TEST_ORIGIN}/api/v1/person/email/${ADDRESS}/`,
      `${TEST_ORIGIN}/api/v1/person/person/20209/`,
    ]);
  });

  test("stops after a failed email lookup", async () => {
    const { api, transport } = setup();

    await expect(api.personFromEmail(ADDRESS)).rejects.toMatchObject({
      kind: "not_found",
    });
    expect(transport.calls).toHaveLength(1);
  });

  test("a missing person is not_found", async () => {
    const { api } = setup({
      [`/api/v1/person/email/${ADDRESS}/`]: { body: emailRecord(ADDRESS, 5) },
    });

    await expect(api.personFromEmail(ADDRESS)).rejects.toMatchObject({
      kind: "not_found",
    });
  });
});

describe("emailsForPerson", () => {
  test("filters by person and flags", async () => {
    const path = "/api/v1/person/email/";
    const { api, transport } = setup({
      [`${path}?person=20209&primary=true`]: {
        body: pageBody({
          path,
          objects: [emailRecord(ADDRESS, 20209)],
          limit: 20,
        }),
      },
    });

    const emails = await api
      .emailsForPerson(personUri("/api/v1/person/person/20209/"), { primary: true })
      .collect();

    expect(emails.map((email) => email.address)).toEqual([ADDRESS]);
    expect(transport.calls).toHaveLength(1);
  });
});

describe("historical email", () => {
  test("historicalEmails filters by address", async () => {
    const path = "/api/v1/person/historicalemail/";
    const { api } = setup({
      [`${path}?address=${encodeURIComponent(ADDRESS)}`]: {
        body: pageBody({
          path,
          objects: [historicalEmailRecord(11, ADDRESS, 20209)],
          limit: 20,
        }),
      },
    });

    const [record] = await api.historicalEmails({ address: ADDRESS }).collect();

    expect(record?.history_id).toBe(11);
    expect(record?.history_date.getUTCFullYear()).toBe(2012);
  });

  test("historicalEmail fetches one record", async () => {
    const { api } = setup({
      "/api/v1/person/historicalemail/11/": {
        body: historicalEmailRecord(11, ADDRESS, 1),
      },
    });

    const record = await api.historicalEmail(
      typedUri("historical-email", "/api/v1/person/historicalemail/11/"),
    );

    expect(record.address).toBe(ADDRESS);
  });
});
