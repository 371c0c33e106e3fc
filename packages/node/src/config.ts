/**
 * @strongbox/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_MAX_ATTEMPTS } from "@strongbox/access-ledger";

/** Largest plaintext accepted by PUT /api/v1/objects/:objectId */
export const DEFAULT_MAX_OBJECT_BYTES = 10 * 1024 * 1024;

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  STORAGE_DRIVER: z.enum(["memory", "file"]).default("memory"),
  DATA_DIR: z.string().min(1).default("./data"),

  // Ledger
  LEDGER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_MAX_ATTEMPTS),

  // Limits
  MAX_OBJECT_BYTES: z.coerce.number().int().min(1).default(DEFAULT_MAX_OBJECT_BYTES),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
