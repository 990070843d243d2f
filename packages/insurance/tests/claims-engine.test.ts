/**
 * Tests for the ClaimsEngine.
 *
 * Covers:
 * - Filing: shape errors, accumulated business rules, advisory and
 *   constraint-level duplicate detection
 * - Decision: fresh re-validation, payout caps, atomic payout
 * - Void supremacy, tenant isolation
 * - Stalled-approval recovery
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import type { Claim, LedgerEntry } from "@classbank/types";
import { TenantGuardError } from "@classbank/store";
import { ClaimError, EnrollmentError } from "../src/errors.js";
import type { DecideResult, FileClaimRequest, FileResult } from "../src/types.js";
import {
  captureErrors,
  classA,
  classB,
  coveredStudent,
  createHarness,
  fund,
  NOW,
  purchase,
} from "./harness.js";
import type { Harness } from "./harness.js";

let h: Harness;
let enrollmentId: string;
let entry: LedgerEntry;

function request(overrides: Partial<FileClaimRequest> = {}): FileClaimRequest {
  return {
    subjectId: "student-1",
    enrollmentId,
    incidentDate: "2026-03-17",
    description: "Lunch was stolen",
    ledgerEntryId: entry.id,
    requestedAmount: "50.00",
    ...overrides,
  };
}

function codes(result: FileResult | DecideResult): string[] {
  return result.ok ? [] : result.failures.map((f) => f.code);
}

async function fileOk(req: FileClaimRequest = request()): Promise<Claim> {
  const result = await h.claims.file(classA, req);
  if (!result.ok) {
    throw new Error(`filing failed: ${codes(result).join(", ")}`);
  }
  return result.claim;
}

async function claimErrorCode(promise: Promise<unknown>): Promise<string | undefined> {
  const err = await promise.catch((e: unknown) => e);
  return err instanceof ClaimError ? err.code : undefined;
}

async function payouts(): Promise<readonly LedgerEntry[]> {
  return h.ledger.listEntries(classA, { kind: "insurance_payout" });
}

beforeEach(async () => {
  h = createHarness();
  ({ enrollmentId } = await coveredStudent(h));
  entry = await purchase(h, "student-1", "50.00");
});

// =============================================================================
// Filing
// =============================================================================

describe("file", () => {
  it("creates a pending claim against an eligible entry", async () => {
    const result = await h.claims.file(classA, request());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.claim.status).toBe("pending");
    expect(result.claim.tenantId).toBe("class-a");
    expect(result.claim.filedAt).toBe(NOW);
    expect(result.claim.incidentDate).toBe("2026-03-17T00:00:00.000Z");
    expect(result.claim.kind).toBe("monetary");
    if (result.claim.kind === "monetary") {
      expect(result.claim.ledgerEntryId).toBe(entry.id);
      expect(result.claim.requestedAmount).toBe("50.00");
    }
    expect(await h.claims.get(classA, result.claim.id)).toEqual(result.claim);
  });

  it("refuses a claim filed after the claim window", async () => {
    const result = await h.claims.file(classA, request({ incidentDate: "2026-02-15T09:00:00.000Z" }));
    expect(codes(result)).toEqual(["CLAIM_WINDOW_EXPIRED"]);
    expect(h.store.rowCounts().claims).toBe(0);
  });

  it("accepts a claim on the last day of the window", async () => {
    const result = await h.claims.file(classA, request({ incidentDate: "2026-02-16T09:00:00.000Z" }));
    expect(result.ok).toBe(true);
  });

  it("refuses an incident in the future", async () => {
    const result = await h.claims.file(classA, request({ incidentDate: "2026-03-19" }));
    expect(codes(result)).toEqual(["INCIDENT_IN_FUTURE"]);
  });

  it("refuses a claim before coverage starts", async () => {
    h.setNow("2026-03-05T09:00:00.000Z");
    const result = await h.claims.file(classA, request({ incidentDate: "2026-03-04" }));
    expect(codes(result)).toEqual(["COVERAGE_NOT_STARTED"]);
  });

  it("refuses a claim when coverage starts past year 9999", async () => {
    const enrollment = await h.enrollments.get(classA, enrollmentId);
    await h.store.transaction((tx) => {
      tx.updateEnrollment({ ...enrollment, coverageStartsAt: "+010239-11-20T09:00:00.000Z" });
    });

    const result = await h.claims.file(classA, request());
    expect(codes(result)).toEqual(["COVERAGE_NOT_STARTED"]);
  });

  it("refuses an incident dated past year 9999", async () => {
    const result = await h.claims.file(
      classA,
      request({ incidentDate: "+010000-01-01T00:00:00.000Z" }),
    );
    expect(codes(result)).toEqual(["INCIDENT_IN_FUTURE"]);
  });

  it("reports every failing rule at once", async () => {
    await h.enrollments.markUnpaid(classA, enrollmentId);
    const other = await purchase(h, "student-2", "10.00");

    const result = await h.claims.file(
      classA,
      request({ ledgerEntryId: other.id, incidentDate: "2026-01-01" }),
    );

    expect(codes(result)).toEqual([
      "CLAIM_WINDOW_EXPIRED",
      "ENROLLMENT_NOT_ACTIVE",
      "PAYMENT_NOT_CURRENT",
      "OWNERSHIP_MISMATCH",
    ]);
  });

  it("refuses a claim on a voided entry", async () => {
    await h.ledger.void(classA, entry.id, "teacher-1");
    const result = await h.claims.file(classA, request());
    expect(codes(result)).toEqual(["LINKED_TRANSACTION_VOIDED"]);
  });

  it("refuses a claim against someone else's enrollment", async () => {
    await fund(h, "student-2", "1.00");
    const other = await purchase(h, "student-2", "1.00");
    const result = await h.claims.file(
      classA,
      request({ subjectId: "student-2", ledgerEntryId: other.id, requestedAmount: "1.00" }),
    );
    expect(codes(result)).toEqual(["OWNERSHIP_MISMATCH"]);
  });

  it("reports a policy whose configuration is unsound", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { waitingPeriodDays: -1 }));
    entry = await purchase(h, "student-1", "50.00");

    const result = await h.claims.file(classA, request());
    expect(codes(result)).toEqual(["INVALID_POLICY_CONFIG"]);
  });

  it("requires a ledger entry for a monetary policy", async () => {
    expect(await claimErrorCode(h.claims.file(classA, request({ ledgerEntryId: undefined })))).toBe(
      "INVALID_CLAIM",
    );
  });

  it("requires a positive requested amount", async () => {
    expect(await claimErrorCode(h.claims.file(classA, request({ requestedAmount: "0" })))).toBe(
      "INVALID_CLAIM",
    );
    expect(await claimErrorCode(h.claims.file(classA, request({ requestedAmount: "ten" })))).toBe(
      "INVALID_CLAIM",
    );
  });

  it("requires a valid incident date", async () => {
    expect(await claimErrorCode(h.claims.file(classA, request({ incidentDate: "someday" })))).toBe(
      "INVALID_CLAIM",
    );
  });

  it("reports an unknown ledger entry", async () => {
    expect(await claimErrorCode(h.claims.file(classA, request({ ledgerEntryId: "ghost" })))).toBe(
      "TRANSACTION_NOT_FOUND",
    );
  });

  it("reports an unknown enrollment", async () => {
    const err = await h.claims
      .file(classA, request({ enrollmentId: "ghost" }))
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EnrollmentError);
  });
});

// =============================================================================
// One claim per ledger entry
// =============================================================================

describe("one active claim per ledger entry", () => {
  it("refuses a second claim once the first is committed", async () => {
    await fileOk();
    expect(await claimErrorCode(h.claims.file(classA, request()))).toBe(
      "TRANSACTION_ALREADY_CLAIMED",
    );
  });

  it("lets exactly one of two concurrent filings through", async () => {
    const results = await Promise.allSettled([
      h.claims.file(classA, request()),
      h.claims.file(classA, request()),
    ]);

    const fulfilled = results.filter((r) => r.status === "fulfilled");
    const rejected = results.filter((r) => r.status === "rejected");
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);

    const [loser] = rejected;
    const reason: unknown = loser?.status === "rejected" ? loser.reason : undefined;
    expect(reason).toBeInstanceOf(ClaimError);
    expect(reason instanceof ClaimError && reason.code).toBe("TRANSACTION_ALREADY_CLAIMED");
    expect(h.store.rowCounts().claims).toBe(1);
  });

  it("holds for any number of concurrent filings", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 2, max: 8 }), async (n) => {
        const harness = createHarness();
        const covered = await coveredStudent(harness);
        const target = await purchase(harness, "student-1", "50.00");

        const results = await Promise.allSettled(
          Array.from({ length: n }, () =>
            harness.claims.file(classA, {
              subjectId: "student-1",
              enrollmentId: covered.enrollmentId,
              incidentDate: "2026-03-17",
              description: "Lunch was stolen",
              ledgerEntryId: target.id,
              requestedAmount: "10.00",
            }),
          ),
        );

        expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
        const active = await harness.claims.list(classA, {
          status: ["pending", "approved", "paid"],
        });
        expect(active).toHaveLength(1);
      }),
      { numRuns: 15 },
    );
  });

  it("frees the entry again once the claim is rejected", async () => {
    const first = await fileOk();
    await h.claims.decide(classA, first.id, { reviewer: "teacher-1", outcome: "reject" });
    const second = await h.claims.file(classA, request());
    expect(second.ok).toBe(true);
  });
});

// =============================================================================
// Decision
// =============================================================================

describe("decide", () => {
  it("pays out an approved claim in the same step", async () => {
    const claim = await fileOk();
    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
      notes: "Receipt checked",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.claim.status).toBe("paid");
    expect(result.claim.decision?.reviewer).toBe("teacher-1");
    expect(result.claim.decision?.notes).toBe("Receipt checked");
    expect(result.payoutEntry?.kind).toBe("insurance_payout");
    expect(result.payoutEntry?.amount).toBe("50.00");
    expect(result.payoutEntry?.tenantId).toBe("class-a");
    if (result.claim.kind === "monetary") {
      expect(result.claim.payoutEntryId).toBe(result.payoutEntry?.id);
      expect(result.claim.approvedAmount).toBe("50.00");
    }

    // 100.00 funded - 5.00 premium - 50.00 purchase + 50.00 payout
    expect(await h.ledger.currentBalance(classA, "student-1", "checking")).toBe("95.00");
  });

  it("pays a partial amount", async () => {
    const claim = await fileOk();
    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
      approvedAmount: "20",
    });
    expect(result.ok && result.payoutEntry?.amount).toBe("20.00");
  });

  it("rejects without touching the ledger", async () => {
    const claim = await fileOk();
    const before = await h.ledger.listEntries(classA);

    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "reject",
      rejectionReason: "No receipt",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.claim.status).toBe("rejected");
    expect(result.claim.decision?.rejectionReason).toBe("No receipt");
    expect(await h.ledger.listEntries(classA)).toEqual(before);
  });

  it("refuses to approve a claim whose entry was voided", async () => {
    const claim = await fileOk();
    await h.ledger.void(classA, entry.id, "teacher-1");

    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });

    expect(codes(result)).toContain("LINKED_TRANSACTION_VOIDED");
    expect((await h.claims.get(classA, claim.id)).status).toBe("pending");
    expect(await payouts()).toHaveLength(0);
  });

  it("refuses an amount above the policy maximum", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { maxClaimAmount: "30.00" }));
    entry = await purchase(h, "student-1", "50.00");
    const claim = await fileOk(request({ requestedAmount: "40.00" }));

    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });

    expect(codes(result)).toEqual(["PAYOUT_CAP_EXCEEDED"]);
    expect(await payouts()).toHaveLength(0);
    expect((await h.claims.get(classA, claim.id)).status).toBe("pending");
  });

  it("refuses an amount above the linked entry", async () => {
    const claim = await fileOk(request({ requestedAmount: "60.00" }));
    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });
    expect(codes(result)).toEqual(["PAYOUT_CAP_EXCEEDED"]);
  });

  it("refuses a non-positive approved amount", async () => {
    const claim = await fileOk();
    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
      approvedAmount: "-5.00",
    });
    expect(codes(result)).toEqual(["INVALID_APPROVED_AMOUNT"]);
  });

  it("re-reads payment state at decision time", async () => {
    const claim = await fileOk();
    await h.enrollments.markUnpaid(classA, enrollmentId);

    const result = await h.claims.decide(classA, claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });
    expect(codes(result)).toEqual(["ENROLLMENT_NOT_ACTIVE", "PAYMENT_NOT_CURRENT"]);
  });

  it("enforces the payout cap per period", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { maxPayoutPerPeriod: "60.00" }));
    entry = await purchase(h, "student-1", "50.00");
    const first = await fileOk();
    await h.claims.decide(classA, first.id, { reviewer: "teacher-1", outcome: "approve" });

    entry = await purchase(h, "student-1", "20.00");
    const second = await fileOk(request({ requestedAmount: "20.00" }));
    const result = await h.claims.decide(classA, second.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });

    expect(codes(result)).toEqual(["PERIOD_PAYOUT_CAP_EXCEEDED"]);
  });

  it("re-checks the claim limit so two pending claims cannot both pass", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { maxClaimsCount: 1 }));
    entry = await purchase(h, "student-1", "10.00");
    const first = await fileOk(request({ requestedAmount: "10.00" }));
    entry = await purchase(h, "student-1", "10.00");
    const second = await fileOk(request({ requestedAmount: "10.00" }));

    const approved = await h.claims.decide(classA, first.id, { reviewer: "teacher-1", outcome: "approve" });
    const refused = await h.claims.decide(classA, second.id, { reviewer: "teacher-1", outcome: "approve" });

    expect(approved.ok).toBe(true);
    expect(codes(refused)).toEqual(["CLAIM_LIMIT_EXCEEDED"]);
  });

  it("fails for a claim that is no longer pending", async () => {
    const claim = await fileOk();
    await h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "reject" });
    expect(
      await claimErrorCode(
        h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" }),
      ),
    ).toBe("CLAIM_NOT_PENDING");
  });

  it("fails for an unknown claim", async () => {
    expect(
      await claimErrorCode(h.claims.decide(classA, "ghost", { reviewer: "teacher-1", outcome: "reject" })),
    ).toBe("CLAIM_NOT_FOUND");
  });
});

// =============================================================================
// Claim limit
// =============================================================================

describe("claim limit", () => {
  it("refuses a third claim after two approved this month", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { maxClaimsCount: 2 }));

    for (let i = 0; i < 2; i++) {
      entry = await purchase(h, "student-1", "5.00");
      const claim = await fileOk(request({ requestedAmount: "5.00" }));
      await h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" });
    }

    entry = await purchase(h, "student-1", "5.00");
    const result = await h.claims.file(classA, request({ requestedAmount: "5.00" }));
    expect(codes(result)).toEqual(["CLAIM_LIMIT_EXCEEDED"]);
  });

  it("does not count claims filed before the rolling period", async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { maxClaimsCount: 1 }));
    entry = await purchase(h, "student-1", "5.00");
    const claim = await fileOk(request({ requestedAmount: "5.00" }));
    await h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" });

    h.setNow("2026-04-20T09:00:00.000Z");
    entry = await purchase(h, "student-1", "5.00");
    const result = await h.claims.file(
      classA,
      request({ requestedAmount: "5.00", incidentDate: "2026-04-19" }),
    );
    expect(result.ok).toBe(true);
  });
});

// =============================================================================
// Atomicity
// =============================================================================

describe("payout atomicity", () => {
  it("leaves the claim pending when the payout entry cannot be written", async () => {
    const claim = await fileOk();
    h.failWhen((op) => op.table === "ledger_entries" && op.op === "insert");

    await expect(
      h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" }),
    ).rejects.toThrow("injected fault");

    h.failWhen(undefined);
    expect((await h.claims.get(classA, claim.id)).status).toBe("pending");
    expect(await payouts()).toHaveLength(0);
  });

  it("writes no payout when the final status change fails", async () => {
    const claim = await fileOk();
    h.failWhen(
      (op) => op.table === "claims" && "status" in op.row && op.row.status === "paid",
    );

    await expect(
      h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" }),
    ).rejects.toThrow("injected fault");

    h.failWhen(undefined);
    expect((await h.claims.get(classA, claim.id)).status).toBe("pending");
    expect(await payouts()).toHaveLength(0);
  });
});

// =============================================================================
// Void supremacy
// =============================================================================

describe("void supremacy", () => {
  it("a void ordered before the decision always wins", async () => {
    await fc.assert(
      fc.asyncProperty(fc.boolean(), fc.integer({ min: 1, max: 50 }), async (voidFirst, dollars) => {
        const harness = createHarness();
        const covered = await coveredStudent(harness);
        const target = await purchase(harness, "student-1", `${String(dollars)}.00`);
        const filed = await harness.claims.file(classA, {
          subjectId: "student-1",
          enrollmentId: covered.enrollmentId,
          incidentDate: "2026-03-17",
          description: "Lunch was stolen",
          ledgerEntryId: target.id,
          requestedAmount: `${String(dollars)}.00`,
        });
        if (!filed.ok) throw new Error("filing failed");

        const voiding = () => harness.ledger.void(classA, target.id, "teacher-1");
        const deciding = () =>
          harness.claims.decide(classA, filed.claim.id, { reviewer: "teacher-1", outcome: "approve" });

        if (voidFirst) {
          await Promise.all([voiding(), deciding()]);
        } else {
          await Promise.all([deciding(), voiding()]);
        }

        const claim = await harness.claims.get(classA, filed.claim.id);
        expect(claim.status).toBe(voidFirst ? "pending" : "paid");
      }),
      { numRuns: 20 },
    );
  });
});

// =============================================================================
// Tenant isolation
// =============================================================================

describe("tenant isolation", () => {
  it("refuses to file against another tenant's enrollment", async () => {
    const err = await h.claims.file(classB, request()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TenantGuardError);
    if (err instanceof TenantGuardError) {
      expect(err.code).toBe("CROSS_TENANT_VIOLATION");
    }
    expect(h.store.rowCounts().claims).toBe(0);
  });

  it("refuses to link another tenant's ledger entry", async () => {
    const foreign = await purchase(h, "student-1", "50.00", classB);
    await expect(h.claims.file(classA, request({ ledgerEntryId: foreign.id }))).rejects.toThrow(
      TenantGuardError,
    );
    expect(h.store.rowCounts().claims).toBe(0);
  });

  it("refuses to decide another tenant's claim", async () => {
    const claim = await fileOk();
    await expect(
      h.claims.decide(classB, claim.id, { reviewer: "teacher-9", outcome: "approve" }),
    ).rejects.toThrow(TenantGuardError);
    expect((await h.claims.get(classA, claim.id)).status).toBe("pending");
  });

  it("logs a cross-tenant decision at error", async () => {
    const logs = captureErrors();
    h = createHarness({ logger: logs.logger });
    ({ enrollmentId } = await coveredStudent(h));
    entry = await purchase(h, "student-1", "50.00");
    const claim = await fileOk();

    await expect(
      h.claims.decide(classB, claim.id, { reviewer: "teacher-9", outcome: "approve" }),
    ).rejects.toThrow(TenantGuardError);

    expect(logs.lines).toHaveLength(1);
    expect(logs.lines[0]).toMatchObject({
      level: 50,
      msg: "integrity violation",
      code: "CROSS_TENANT_VIOLATION",
      tenantId: "class-b",
      operation: "decide",
    });
  });

  it("logs a duplicate claim on a ledger entry at error", async () => {
    const logs = captureErrors();
    h = createHarness({ logger: logs.logger });
    ({ enrollmentId } = await coveredStudent(h));
    entry = await purchase(h, "student-1", "50.00");
    await fileOk();

    await expect(h.claims.file(classA, request())).rejects.toThrow(ClaimError);

    expect(logs.lines).toHaveLength(1);
    expect(logs.lines[0]).toMatchObject({
      level: 50,
      code: "TRANSACTION_ALREADY_CLAIMED",
      tenantId: "class-a",
      operation: "file",
    });
  });

  it("lists only the caller's claims", async () => {
    await fileOk();
    expect(await h.claims.list(classA)).toHaveLength(1);
    expect(await h.claims.list(classB)).toHaveLength(0);
  });
});

// =============================================================================
// In-kind claims
// =============================================================================

describe("in-kind claims", () => {
  beforeEach(async () => {
    h = createHarness();
    ({ enrollmentId } = await coveredStudent(h, { claimKind: "in_kind" }));
  });

  it("files and approves without a ledger entry or payout", async () => {
    const filed = await h.claims.file(classA, {
      subjectId: "student-1",
      enrollmentId,
      incidentDate: "2026-03-17",
      description: "Lost homework pass",
      item: "Homework pass",
    });
    expect(filed.ok).toBe(true);
    if (!filed.ok) return;

    const decided = await h.claims.decide(classA, filed.claim.id, {
      reviewer: "teacher-1",
      outcome: "approve",
    });
    expect(decided.ok && decided.claim.status).toBe("approved");
    expect(await payouts()).toHaveLength(0);
  });

  it("requires an item", async () => {
    expect(
      await claimErrorCode(
        h.claims.file(classA, {
          subjectId: "student-1",
          enrollmentId,
          incidentDate: "2026-03-17",
          description: "Lost homework pass",
        }),
      ),
    ).toBe("INVALID_CLAIM");
  });
});

// =============================================================================
// Recovery
// =============================================================================

describe("recoverStalled", () => {
  async function stall(ledgerEntryId: string, id: string): Promise<void> {
    const enrollment = await h.enrollments.get(classA, enrollmentId);
    await h.store.transaction((tx) =>
      tx.insertClaim({
        id,
        tenantId: "class-a",
        enrollmentId,
        policyId: enrollment.policyId,
        subjectId: "student-1",
        incidentDate: "2026-03-17T00:00:00.000Z",
        filedAt: NOW,
        description: "Interrupted approval",
        status: "approved",
        decision: { reviewer: "teacher-1", decidedAt: NOW },
        kind: "monetary",
        ledgerEntryId,
        requestedAmount: "30.00",
        approvedAmount: "25.00",
      }),
    );
  }

  it("pays stalled approvals whose entry is still valid", async () => {
    await stall(entry.id, "stalled-1");

    const result = await h.claims.recoverStalled(classA, "system");

    expect(result.rolledBack).toHaveLength(0);
    expect(result.resumed.map((c) => c.id)).toEqual(["stalled-1"]);
    const claim = await h.claims.get(classA, "stalled-1");
    expect(claim.status).toBe("paid");
    const [payout] = await payouts();
    expect(payout?.amount).toBe("25.00");
    expect(claim.kind === "monetary" && claim.payoutEntryId).toBe(payout?.id);
  });

  it("rolls back stalled approvals whose entry was voided", async () => {
    await stall(entry.id, "stalled-1");
    await h.ledger.void(classA, entry.id, "teacher-1");

    const result = await h.claims.recoverStalled(classA, "system");

    expect(result.resumed).toHaveLength(0);
    expect(result.rolledBack).toHaveLength(1);
    expect(result.rolledBack[0]?.failures.map((f) => f.code)).toEqual(["LINKED_TRANSACTION_VOIDED"]);
    const claim = await h.claims.get(classA, "stalled-1");
    expect(claim.status).toBe("rejected");
    expect(claim.decision?.reviewer).toBe("system");
    expect(await payouts()).toHaveLength(0);
  });

  it("does nothing when no approval is stalled", async () => {
    const claim = await fileOk();
    await h.claims.decide(classA, claim.id, { reviewer: "teacher-1", outcome: "approve" });
    expect(await h.claims.recoverStalled(classA, "system")).toEqual({ resumed: [], rolledBack: [] });
  });
});
