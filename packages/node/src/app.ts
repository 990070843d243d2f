/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { EconomyService } from "./services/economy-service.js";
import {
  authMiddleware,
  createErrorHandler,
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  loggerMiddleware,
  requestContextMiddleware,
  tenantMiddleware,
  unsecuredAuthMiddleware,
} from "./middleware/index.js";
import type { AuthConfig } from "./middleware/index.js";
import {
  createAuditRoutes,
  createClaimRoutes,
  createEnrollmentRoutes,
  createHealthRoutes,
  createLedgerRoutes,
  createPolicyRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Defaults to a fresh in-memory economy */
  readonly economy?: EconomyService | undefined;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Tenant used in unsecured mode when no X-Tenant-Id header is sent */
  readonly defaultTenantId?: string | undefined;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig | undefined;
  /** Clock for idempotency expiry */
  readonly now?: (() => number) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly economy: EconomyService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const economy = options.economy ?? new EconomyService({ logger });
  const now = options.now ?? Date.now;
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
    now,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContextMiddleware(logger));
  app.use("*", loggerMiddleware());

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler({ auditLog: economy.auditLog }));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(economy));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Tenant-Id header or default tenant
    app.use("/api/*", unsecuredAuthMiddleware(options.defaultTenantId ?? "default"));
  }
  app.use("/api/*", tenantMiddleware(economy));
  app.use("/api/*", idempotencyMiddleware(idempotencyStore, now));

  // Mount v1 API routes
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1/policies", createPolicyRoutes());
  app.route("/api/v1/enrollments", createEnrollmentRoutes());
  app.route("/api/v1/claims", createClaimRoutes());
  app.route("/api/v1/audit", createAuditRoutes());

  return { app, economy, idempotencyStore };
}
