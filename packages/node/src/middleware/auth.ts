/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key header → looked up in the configured key
 * registry. Unsecured mode (no keys configured): the tenant comes from
 * X-Tenant-Id (or the default tenant), the actor from X-Actor-Id, and
 * the role is teacher.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, Permission, ApiKeyRecord } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope, RequestError } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export const TENANT_HEADER = "X-Tenant-Id";
export const ACTOR_HEADER = "X-Actor-Id";

/**
 * Create API-key authentication middleware.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    const auth: AuthContext = {
      type: "api-key",
      actorId: record.actorId,
      role: record.role,
      tenantId: record.tenantId,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Development stand-in for authMiddleware when no API keys are configured.
 */
export function unsecuredAuthMiddleware(defaultTenantId: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth: AuthContext = {
      type: "unsecured",
      actorId: c.req.header(ACTOR_HEADER) ?? "anonymous",
      role: "teacher",
      tenantId: c.req.header(TENANT_HEADER) ?? defaultTenantId,
    };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

// =============================================================================
// Subject access
// =============================================================================

/**
 * Students act only on their own subject id.
 *
 * @throws {RequestError} FORBIDDEN
 */
export function assertSubjectAccess(auth: AuthContext, subjectId: string): void {
  if (auth.role === "student" && auth.actorId !== subjectId) {
    throw new RequestError(
      "FORBIDDEN",
      403,
      `Student '${auth.actorId}' cannot act for subject '${subjectId}'`,
    );
  }
}

/**
 * The subject filter a list query runs with: students always see only
 * their own records.
 */
export function subjectFilter(auth: AuthContext, requested: string | undefined): string | undefined {
  if (auth.role !== "student") return requested;
  if (requested !== undefined) assertSubjectAccess(auth, requested);
  return auth.actorId;
}
