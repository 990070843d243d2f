/**
 * Health check routes.
 *
 * GET /health: Liveness probe (always 200 if server is running)
 * GET /ready : Readiness probe (store reachable, audit chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { EconomyService } from "../services/economy-service.js";

export function createHealthRoutes(economy: EconomyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const health = await economy.health();
    return c.json(
      {
        status: health.ready ? "ready" : "not_ready",
        store: health.store,
        auditChain: health.auditChain,
        timestamp: new Date().toISOString(),
      },
      health.ready ? 200 : 503,
    );
  });

  return routes;
}
