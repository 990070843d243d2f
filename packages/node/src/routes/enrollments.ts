/**
 * Enrollment routes.
 *
 * POST /api/v1/enrollments              : Purchase a policy
 * GET  /api/v1/enrollments              : List enrollments
 * GET  /api/v1/enrollments/:id          : Get one enrollment
 * POST /api/v1/enrollments/:id/payments : Record a premium payment
 * POST /api/v1/enrollments/:id/unpaid   : Mark the premium unpaid
 * POST /api/v1/enrollments/:id/collect  : Run one autopay billing step
 * POST /api/v1/enrollments/:id/cancel   : Cancel
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Enrollment } from "@classbank/types";
import type { AppEnv } from "../types/api-contract.js";
import { EnrollSchema, ListEnrollmentsQuerySchema } from "../types/dto.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { assertSubjectAccess, requirePermission, subjectFilter } from "../middleware/auth.js";
import { auditMutation } from "./shared.js";

async function loadOwned(c: Context<AppEnv>): Promise<Enrollment> {
  const enrollment = await c
    .get("economy")
    .enrollments.get(c.get("scope"), c.req.param("id") ?? "");
  assertSubjectAccess(c.get("auth"), enrollment.subjectId);
  return enrollment;
}

export function createEnrollmentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("file"), async (c) => {
    const body = await parseBody(c, EnrollSchema);
    assertSubjectAccess(c.get("auth"), body.subjectId);

    const result = await c
      .get("economy")
      .enrollments.enroll(c.get("scope"), body.subjectId, body.policyId);

    auditMutation(
      c,
      "enroll",
      "enrollment",
      result.enrollment.id,
      `premium ${result.enrollment.premiumCharged}`,
    );
    return c.json({ data: result }, 201);
  });

  routes.get("/", requirePermission("read"), async (c) => {
    const query = parseQuery(c, ListEnrollmentsQuerySchema);
    const enrollments = await c.get("economy").enrollments.list(c.get("scope"), {
      ...query,
      subjectId: subjectFilter(c.get("auth"), query.subjectId),
    });
    return c.json({ data: enrollments });
  });

  routes.get("/:id", requirePermission("read"), async (c) => {
    return c.json({ data: await loadOwned(c) });
  });

  routes.post("/:id/payments", requirePermission("write"), async (c) => {
    const enrollment = await c
      .get("economy")
      .enrollments.recordPayment(c.get("scope"), c.req.param("id"));

    auditMutation(c, "record_payment", "enrollment", enrollment.id);
    return c.json({ data: enrollment });
  });

  routes.post("/:id/unpaid", requirePermission("write"), async (c) => {
    const enrollment = await c
      .get("economy")
      .enrollments.markUnpaid(c.get("scope"), c.req.param("id"));

    auditMutation(c, "mark_unpaid", "enrollment", enrollment.id, enrollment.status);
    return c.json({ data: enrollment });
  });

  routes.post("/:id/collect", requirePermission("write"), async (c) => {
    const result = await c
      .get("economy")
      .enrollments.collectPremium(c.get("scope"), c.req.param("id"));

    auditMutation(
      c,
      "collect_premium",
      "enrollment",
      result.enrollment.id,
      result.charged ? "charged" : result.enrollment.status,
    );
    return c.json({ data: result });
  });

  routes.post("/:id/cancel", requirePermission("file"), async (c) => {
    const owned = await loadOwned(c);
    const enrollment = await c.get("economy").enrollments.cancel(c.get("scope"), owned.id);

    auditMutation(c, "cancel", "enrollment", enrollment.id);
    return c.json({ data: enrollment });
  });

  return routes;
}
