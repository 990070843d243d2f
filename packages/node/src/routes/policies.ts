/**
 * Policy catalog routes.
 *
 * POST /api/v1/policies                : Define a policy
 * GET  /api/v1/policies                : List policies
 * GET  /api/v1/policies/:id            : Get one policy
 * PATCH /api/v1/policies/:id           : Update a policy
 * POST /api/v1/policies/:id/deactivate : Stop selling a policy
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DefinePolicySchema, ListPoliciesQuerySchema, UpdatePolicySchema } from "../types/dto.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { auditMutation } from "./shared.js";

export function createPolicyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("review"), async (c) => {
    const body = await parseBody(c, DefinePolicySchema);
    const policy = await c.get("economy").catalog.define(c.get("scope"), body);

    auditMutation(c, "define", "policy", policy.id, policy.title);
    return c.json({ data: policy }, 201);
  });

  routes.get("/", requirePermission("read"), async (c) => {
    const query = parseQuery(c, ListPoliciesQuerySchema);
    const policies = await c.get("economy").catalog.list(c.get("scope"), query);
    return c.json({ data: policies });
  });

  routes.get("/:id", requirePermission("read"), async (c) => {
    const policy = await c.get("economy").catalog.get(c.get("scope"), c.req.param("id"));
    return c.json({ data: policy });
  });

  routes.patch("/:id", requirePermission("review"), async (c) => {
    const patch = await parseBody(c, UpdatePolicySchema);
    const policy = await c
      .get("economy")
      .catalog.update(c.get("scope"), c.req.param("id"), patch);

    auditMutation(c, "update", "policy", policy.id, Object.keys(patch).join(","));
    return c.json({ data: policy });
  });

  routes.post("/:id/deactivate", requirePermission("review"), async (c) => {
    const policy = await c
      .get("economy")
      .catalog.deactivate(c.get("scope"), c.req.param("id"));

    auditMutation(c, "deactivate", "policy", policy.id);
    return c.json({ data: policy });
  });

  return routes;
}
