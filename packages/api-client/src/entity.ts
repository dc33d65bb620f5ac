import type { z } from "zod";

/**
 * Freeze a decoded record and its array fields.
 * Entities are snapshots; callers never see them change.
 */
export function freezeEntity<T extends object>(value: T): Readonly<T> {
  for (const field of Object.values(value)) {
    if (Array.isArray(field)) {
      Object.freeze(field);
    }
  }
  return Object.freeze(value);
}

/**
 * Optional field: absent and `null` both decode to `null`.
 */
export function nullableField<S extends z.ZodTypeAny>(schema: S) {
  return schema
    .nullish()
    .transform((value): NonNullable<z.output<S>> | null => value ?? null);
}
