/**
 * Collection envelope decoding.
 *
 * A page decodes as a whole or not at all: one malformed item fails the
 * page, so callers never see a partial page. `total_count` is not
 * checked against the number of objects; the two can disagree while the
 * collection changes under a running query.
 */

import { type PageEnvelope, toPageMeta } from "@dtrack/shared/api";
import { z } from "zod";

const PageMetaSchema = z.object({
  total_count: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
  previous: z.string().nullable(),
  next: z.string().nullable(),
});

const RawEnvelopeSchema = z.object({
  meta: PageMetaSchema,
  objects: z.array(z.unknown()),
});

export type EnvelopeDecodeResult<T> =
  | { success: true; data: PageEnvelope<T> }
  | { success: false; issues: z.ZodIssue[] };

export function decodePageEnvelope<T>(
  body: unknown,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
): EnvelopeDecodeResult<T> {
  const envelope = RawEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    return { success: false, issues: envelope.error.issues };
  }

  const objects = z.array(itemSchema).safeParse(envelope.data.objects);
  if (!objects.success) {
    return {
      success: false,
      issues: objects.error.issues.map((issue) => ({
        ...issue,
        path: ["objects", ...issue.path],
      })),
    };
  }

  return {
    success: true,
    data: {
      meta: toPageMeta(envelope.data.meta),
      objects: objects.data,
    },
  };
}
