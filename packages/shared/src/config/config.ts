/**
 * Client Configuration
 *
 * Precedence (highest to lowest):
 * 1. Environment variables (override everything)
 * 2. Programmatic overrides passed to loadTrackerConfig
 * 3. Default values
 */

import { z } from "zod";
import { createValidationError } from "../errors/factory";

// ============================================================================
// Configuration Schema
// ============================================================================

export const DEFAULT_API_ORIGIN = "https://datatracker.ietf.org";

/**
 * API connection configuration schema.
 */
const apiConfigSchema = z.object({
  /** Scheme and host every server-relative path is resolved against */
  origin: z
    .string()
    .url()
    .default(DEFAULT_API_ORIGIN)
    .transform((origin) => origin.replace(/\/+$/, "")),
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs: z.number().int().min(1000).default(30_000),
  userAgent: z.string().min(1).optional(),
  /** Page size requested by collection endpoints; server default when unset */
  defaultPageSize: z.number().int().min(1).max(1000).optional(),
});

/**
 * Logging configuration schema.
 */
const loggingConfigSchema = z.object({
  level: z
    .enum(["trace", "debug", "info", "warn", "error", "silent"])
    .default("info"),
});

/**
 * Complete client configuration schema.
 */
export const trackerConfigSchema = z.object({
  api: apiConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type TrackerConfig = z.infer<typeof trackerConfigSchema>;
export type TrackerConfigInput = z.input<typeof trackerConfigSchema>;
export type ApiConfig = z.infer<typeof apiConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

export type ConfigEnv = Record<string, string | undefined>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Apply environment variable overrides on top of the given input.
 * Values stay unvalidated here; the schema checks the merged result.
 */
function applyEnvOverrides(
  input: TrackerConfigInput,
  env: ConfigEnv,
): { api: Record<string, unknown>; logging: Record<string, unknown> } {
  const api: Record<string, unknown> = { ...input.api };
  const logging: Record<string, unknown> = { ...input.logging };

  if (env["DTRACK_API_ORIGIN"]) {
    api["origin"] = env["DTRACK_API_ORIGIN"];
  }
  if (env["DTRACK_TIMEOUT_MS"]) {
    api["timeoutMs"] = Number(env["DTRACK_TIMEOUT_MS"]);
  }
  if (env["DTRACK_USER_AGENT"]) {
    api["userAgent"] = env["DTRACK_USER_AGENT"];
  }
  if (env["DTRACK_PAGE_SIZE"]) {
    api["defaultPageSize"] = Number(env["DTRACK_PAGE_SIZE"]);
  }
  if (env["LOG_LEVEL"]) {
    logging["level"] = env["LOG_LEVEL"];
  }

  return { api, logging };
}

/**
 * Load and validate the client configuration.
 *
 * @param overrides - Programmatic values, applied over the defaults
 * @param env - Environment to read overrides from (default: process.env)
 * @throws TrackerError with code CONFIG_INVALID and field-level details
 */
export function loadTrackerConfig(
  overrides: TrackerConfigInput = {},
  env: ConfigEnv = process.env,
): TrackerConfig {
  const merged = applyEnvOverrides(overrides, env);
  const parseResult = trackerConfigSchema.safeParse(merged);

  if (!parseResult.success) {
    throw createValidationError(
      "CONFIG_INVALID",
      parseResult.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    );
  }

  return parseResult.data;
}
