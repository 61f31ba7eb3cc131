/**
 * @tallybook/server: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),
    JWT_SECRET: z.string().min(1).optional(),
    JWT_ISSUER: z.string().default("tallybook"),

    // Unsecured mode defaults
    DEFAULT_TENANT_ID: z.string().optional(),
    DEFAULT_USER_ID: z.string().optional(),

    // Persistence
    DATABASE_PATH: z.string().default("./tallybook.db"),

    // Paging
    DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).default(25),
    MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(100),
  })
  .refine((c) => c.DEFAULT_PAGE_SIZE <= c.MAX_PAGE_SIZE, {
    message: "DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE",
    path: ["DEFAULT_PAGE_SIZE"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly tenantId: string;
  readonly userId: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:tenant1:user1,key2:role2:tenant2:user2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, tenantId, userId] = parts;
    if (
      parts.length !== 4 ||
      key === undefined ||
      role === undefined ||
      tenantId === undefined ||
      userId === undefined
    ) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:tenantId:userId`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (tenantId === "") {
      throw new Error("Tenant ID cannot be empty in API_KEYS");
    }
    if (userId === "") {
      throw new Error("User ID cannot be empty in API_KEYS");
    }

    keys.push({ key, role, tenantId, userId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
