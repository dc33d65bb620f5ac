import { describe, expect, test } from "vitest";
import { formatTimestamp, parseTimestamp, TimestampSchema } from "../timestamp";

describe("parseTimestamp", () => {
  test("reads whole seconds as UTC", () => {
    expect(parseTimestamp("2012-02-26T00:03:54")?.toISOString()).toBe(
      "2012-02-26T00:03:54.000Z",
    );
  });

  test("keeps milliseconds of a microsecond fraction", () => {
    expect(parseTimestamp("2019-05-01T12:30:00.123456")?.toISOString()).toBe(
      "2019-05-01T12:30:00.123Z",
    );
  });

  test("pads a short fraction", () => {
    expect(parseTimestamp("2019-05-01T12:30:00.5")?.getUTCMilliseconds()).toBe(500);
  });

  test("reads years before 100 literally", () => {
    expect(parseTimestamp("0050-01-01T00:00:00")?.toISOString()).toBe(
      "0050-01-01T00:00:00.000Z",
    );
  });

  test("accepts a leap day and rejects a missing one", () => {
    expect(parseTimestamp("2000-02-29T00:00:00")?.getUTCDate()).toBe(29);
    expect(parseTimestamp("1900-02-29T00:00:00")).toBeUndefined();
  });

  test.each([
    ["2012-02-30T00:00:00"],
    ["2012-02-26 00:03:54"],
    ["2012-02-26T00:03:54Z"],
    ["2012-02-26T24:00:00"],
    [""],
  ])("rejects %j", (value) => {
    expect(parseTimestamp(value)).toBeUndefined();
  });
});

describe("formatTimestamp", () => {
  test("writes UTC without fraction or zone", () => {
    expect(formatTimestamp(new Date(Date.UTC(2020, 0, 2, 3, 4, 5, 678)))).toBe(
      "2020-01-02T03:04:05",
    );
  });
});

describe("TimestampSchema", () => {
  test("decodes to a Date", () => {
    const result = TimestampSchema.safeParse("2001-09-09T01:46:40");
    expect(result.success && result.data.getTime()).toBe(1_000_000_000_000);
  });

  test("fails on malformed input", () => {
    const result = TimestampSchema.safeParse("yesterday");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Invalid timestamp: yesterday");
    }
  });
});
