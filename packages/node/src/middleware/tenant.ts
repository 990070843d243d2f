/**
 * Multi-tenancy middleware.
 *
 * Turns the authenticated tenant into the TenantScope every economy
 * operation takes as its first argument, and exposes the shared
 * EconomyService.
 */

import type { MiddlewareHandler } from "hono";
import { TenantScope } from "@classbank/types";
import type { AppEnv } from "../types/api-contract.js";
import type { EconomyService } from "../services/economy-service.js";
import { RequestError } from "../types/error.js";

/**
 * Must run AFTER an auth middleware.
 */
export function tenantMiddleware(economy: EconomyService): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth.tenantId.trim() === "") {
      throw new RequestError("UNAUTHORIZED", 401, "Tenant ID must not be empty");
    }
    c.set("scope", TenantScope.of(auth.tenantId));
    c.set("economy", economy);
    return next();
  };
}
