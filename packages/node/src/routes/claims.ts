/**
 * Claim routes.
 *
 * POST /api/v1/claims              : File a claim
 * GET  /api/v1/claims              : List claims
 * POST /api/v1/claims/recover      : Resume or roll back stalled approvals
 * GET  /api/v1/claims/:id          : Get one claim
 * POST /api/v1/claims/:id/decision : Approve or reject a pending claim
 *
 * Business-rule failures are answered with 422 CLAIM_VALIDATION_FAILED
 * and every failure listed under `details.failures`.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { ClaimFailure } from "@classbank/insurance";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { DecideClaimSchema, FileClaimSchema, ListClaimsQuerySchema } from "../types/dto.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { assertSubjectAccess, requirePermission, subjectFilter } from "../middleware/auth.js";
import { auditMutation } from "./shared.js";

function validationFailed(
  c: Context<AppEnv>,
  message: string,
  failures: readonly ClaimFailure[],
): Response {
  return c.json(createErrorEnvelope("CLAIM_VALIDATION_FAILED", message, { failures }), 422);
}

export function createClaimRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("file"), async (c) => {
    const body = await parseBody(c, FileClaimSchema);
    assertSubjectAccess(c.get("auth"), body.subjectId);

    const result = await c.get("economy").claims.file(c.get("scope"), body);
    if (!result.ok) {
      return validationFailed(c, "Claim could not be filed", result.failures);
    }

    auditMutation(c, "file", "claim", result.claim.id, result.claim.policyId);
    return c.json({ data: result.claim }, 201);
  });

  routes.get("/", requirePermission("read"), async (c) => {
    const query = parseQuery(c, ListClaimsQuerySchema);
    const claims = await c.get("economy").claims.list(c.get("scope"), {
      ...query,
      subjectId: subjectFilter(c.get("auth"), query.subjectId),
    });
    return c.json({ data: claims });
  });

  // Registered before /:id so "recover" is not taken for a claim id
  routes.post("/recover", requirePermission("review"), async (c) => {
    const result = await c
      .get("economy")
      .claims.recoverStalled(c.get("scope"), c.get("auth").actorId);

    for (const claim of result.resumed) {
      auditMutation(c, "recover_resume", "claim", claim.id);
    }
    for (const { claim } of result.rolledBack) {
      auditMutation(c, "recover_rollback", "claim", claim.id);
    }
    return c.json({ data: result });
  });

  routes.get("/:id", requirePermission("read"), async (c) => {
    const claim = await c.get("economy").claims.get(c.get("scope"), c.req.param("id"));
    assertSubjectAccess(c.get("auth"), claim.subjectId);
    return c.json({ data: claim });
  });

  routes.post("/:id/decision", requirePermission("review"), async (c) => {
    const body = await parseBody(c, DecideClaimSchema);
    const result = await c.get("economy").claims.decide(c.get("scope"), c.req.param("id"), {
      ...body,
      reviewer: c.get("auth").actorId,
    });
    if (!result.ok) {
      return validationFailed(c, "Claim could not be approved", result.failures);
    }

    auditMutation(c, body.outcome, "claim", result.claim.id, result.claim.status);
    return c.json({ data: result });
  });

  return routes;
}
