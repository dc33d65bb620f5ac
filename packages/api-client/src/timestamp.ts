/**
 * Server timestamps.
 *
 * The API writes times as `YYYY-MM-DDTHH:MM:SS` with an optional
 * fractional part and no zone designator. They are UTC.
 */

import { z } from "zod";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;

/**
 * Parse a server timestamp as UTC.
 * Returns undefined for anything that is not a real calendar time.
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second, fraction] = match;
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y = 0, mo = 0, d = 0, h = 0, mi = 0, s = 0] = parts;
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;

  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, ms);
  // Out-of-range fields roll over (Feb 30 -> Mar 2)
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi ||
    date.getUTCSeconds() !== s
  ) {
    return undefined;
  }
  return date;
}

/**
 * Format a date the way the server writes timestamps (UTC, whole seconds).
 * Any fraction of a second is dropped.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export const TimestampSchema = z.string().transform((value, ctx): Date => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid timestamp: ${value}`,
    });
    return z.NEVER;
  }
  return date;
});
