/**
 * Audit routes.
 *
 * GET /api/v1/audit       : The caller's tenant's audit entries, newest first
 * GET /api/v1/audit/verify: Recompute the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAuditRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("review"), (c) => {
    const query = parseQuery(c, AuditQuerySchema);
    const entries = c.get("economy").auditLog.query({
      ...query,
      tenantId: c.get("auth").tenantId,
    });
    return c.json({ data: entries });
  });

  // The chain spans every tenant, so only its verdict is returned
  routes.get("/verify", requirePermission("review"), (c) => {
    return c.json({ data: c.get("economy").auditLog.verify() });
  });

  return routes;
}
