/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { Logger } from "pino";
import type { TenantScope } from "@classbank/types";
import type { EconomyService } from "../services/economy-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-context middleware) */
    requestId: string;

    /** Request-scoped child logger carrying the request id */
    logger: Logger;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;

    /** Caller's tenant scope (set by tenant middleware) */
    scope: TenantScope;

    /** The economy core shared by all tenants */
    economy: EconomyService;
  };
}
