/**
 * @classbank/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { ROLES } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  /** Tenant used in unsecured mode when no X-Tenant-Id header is sent */
  DEFAULT_TENANT_ID: z.string().min(1).default("default"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly tenantId: string;
  readonly actorId: string;
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:tenant1:actor1,key2:role2:tenant2:actor2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, tenantId, actorId] = parts;
    if (
      parts.length !== 4 ||
      key === undefined ||
      role === undefined ||
      tenantId === undefined ||
      actorId === undefined
    ) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:tenantId:actorId`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be one of: ${ROLES.join(", ")}`,
      );
    }
    if (tenantId === "") {
      throw new Error("Tenant ID cannot be empty in API_KEYS");
    }
    if (actorId === "") {
      throw new Error("Actor ID cannot be empty in API_KEYS");
    }

    keys.push({ key, role, tenantId, actorId });
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
