/**
 * Helpers shared by the route modules.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";

/**
 * Record a successful mutation in the audit log, attributed to the
 * authenticated actor in the caller's tenant.
 */
export function auditMutation(
  c: Context<AppEnv>,
  action: string,
  resourceType: string,
  resourceId: string,
  detail?: string,
): void {
  const auth = c.get("auth");
  c.get("economy").auditLog.append({
    tenantId: auth.tenantId,
    action,
    resourceType,
    resourceId,
    actor: auth.actorId,
    detail,
  });
}
