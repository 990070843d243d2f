/**
 * Ledger routes.
 *
 * POST /api/v1/ledger/entries          : Append an entry
 * GET  /api/v1/ledger/entries          : List entries
 * GET  /api/v1/ledger/entries/:id      : Get one entry
 * POST /api/v1/ledger/entries/:id/void : Void an entry
 * GET  /api/v1/ledger/balances/:subject: Current balance of a bucket
 * POST /api/v1/ledger/transfers        : Move funds between buckets
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AppendEntrySchema,
  BalanceQuerySchema,
  ListEntriesQuerySchema,
  TransferSchema,
} from "../types/dto.js";
import { parseBody, parseQuery } from "../middleware/validate.js";
import { assertSubjectAccess, requirePermission, subjectFilter } from "../middleware/auth.js";
import { auditMutation } from "./shared.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /entries: Append
  routes.post("/entries", requirePermission("write"), async (c) => {
    const body = await parseBody(c, AppendEntrySchema);
    const scope = c.get("scope");

    const entry = await c.get("economy").ledger.append(scope, {
      ...body,
      tenantId: scope.tenantId,
    });

    auditMutation(c, "append", "ledger_entry", entry.id, `${entry.kind} ${entry.amount}`);
    return c.json({ data: entry }, 201);
  });

  // GET /entries: List
  routes.get("/entries", requirePermission("read"), async (c) => {
    const query = parseQuery(c, ListEntriesQuerySchema);
    const entries = await c.get("economy").ledger.listEntries(c.get("scope"), {
      subjectId: subjectFilter(c.get("auth"), query.subjectId),
      bucket: query.bucket,
      kind: query.kind,
      includeVoided: query.includeVoided,
      fromCreatedAt: query.from,
      toCreatedAt: query.to,
    });
    return c.json({ data: entries });
  });

  // GET /entries/:id: Get one
  routes.get("/entries/:id", requirePermission("read"), async (c) => {
    const entry = await c.get("economy").ledger.getEntry(c.get("scope"), c.req.param("id"));
    assertSubjectAccess(c.get("auth"), entry.subjectId);
    return c.json({ data: entry });
  });

  // POST /entries/:id/void
  routes.post("/entries/:id/void", requirePermission("review"), async (c) => {
    const entry = await c
      .get("economy")
      .ledger.void(c.get("scope"), c.req.param("id"), c.get("auth").actorId);

    auditMutation(c, "void", "ledger_entry", entry.id);
    return c.json({ data: entry });
  });

  // GET /balances/:subjectId
  routes.get("/balances/:subjectId", requirePermission("read"), async (c) => {
    const subjectId = c.req.param("subjectId");
    assertSubjectAccess(c.get("auth"), subjectId);
    const query = parseQuery(c, BalanceQuerySchema);

    const balance = await c.get("economy").ledger.currentBalance(
      c.get("scope"),
      subjectId,
      query.bucket,
      { availableOnly: query.availableOnly },
    );
    return c.json({
      data: {
        subjectId,
        bucket: query.bucket,
        availableOnly: query.availableOnly === true,
        balance,
      },
    });
  });

  // POST /transfers
  routes.post("/transfers", requirePermission("file"), async (c) => {
    const body = await parseBody(c, TransferSchema);
    assertSubjectAccess(c.get("auth"), body.subjectId);

    const result = await c.get("economy").ledger.transfer(
      c.get("scope"),
      body.subjectId,
      body.from,
      body.to,
      body.amount,
      c.get("auth").actorId,
    );

    auditMutation(c, "transfer", "ledger_entry", result.correlationId, `${body.from} → ${body.to} ${result.credit.amount}`);
    return c.json({ data: result }, 201);
  });

  return routes;
}
