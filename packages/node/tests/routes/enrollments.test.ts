/**
 * Tests for the enrollment routes: purchase, billing and cancellation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Enrollment, LedgerEntry, Policy } from "@classbank/types";
import { createTestApp, jsonRequest, readData, readError } from "../setup.js";
import type { TestApp } from "../setup.js";

interface EnrollData {
  readonly enrollment: Enrollment;
  readonly premiumEntry: LedgerEntry | null;
}

interface CollectData extends EnrollData {
  readonly charged: boolean;
}

let t: TestApp;
let policy: Policy;

async function send(path: string, method = "GET", body?: unknown): Promise<Response> {
  return t.app.request(jsonRequest(path, method, body));
}

async function enroll(subjectId = "student-1"): Promise<EnrollData> {
  const res = await send("/api/v1/enrollments", "POST", { subjectId, policyId: policy.id });
  expect(res.status).toBe(201);
  return readData<EnrollData>(res);
}

async function balance(): Promise<string> {
  const data = await readData<{ balance: string }>(
    await send("/api/v1/ledger/balances/student-1"),
  );
  return data.balance;
}

beforeEach(async () => {
  t = createTestApp();
  await send("/api/v1/ledger/entries", "POST", {
    subjectId: "student-1",
    amount: "100.00",
    bucket: "checking",
    kind: "deposit",
  });
  policy = await readData<Policy>(
    await send("/api/v1/policies", "POST", {
      title: "Lunch Protection",
      premium: "5.00",
      autoCancelNonpayDays: 2,
    }),
  );
});

describe("POST /api/v1/enrollments", () => {
  it("charges the first premium with the purchase", async () => {
    const { enrollment, premiumEntry } = await enroll();

    expect(enrollment).toMatchObject({
      tenantId: "class-a",
      subjectId: "student-1",
      policyId: policy.id,
      status: "active",
      purchasedAt: "2026-03-01T09:00:00.000Z",
      coverageStartsAt: "2026-03-08T09:00:00.000Z",
      nextPaymentDueAt: "2026-03-31T09:00:00.000Z",
      paymentCurrent: true,
      daysUnpaid: 0,
      premiumCharged: "5.00",
    });
    expect(premiumEntry?.amount).toBe("-5.00");
    expect(premiumEntry?.kind).toBe("insurance_premium");
    expect(await balance()).toBe("95.00");
  });

  it("refuses a second open enrollment in the same policy", async () => {
    await enroll();
    const res = await send("/api/v1/enrollments", "POST", {
      subjectId: "student-1",
      policyId: policy.id,
    });

    expect(res.status).toBe(409);
    expect((await readError(res)).code).toBe("ALREADY_ENROLLED");
  });

  it("refuses a deactivated policy", async () => {
    await send(`/api/v1/policies/${policy.id}/deactivate`, "POST");
    const res = await send("/api/v1/enrollments", "POST", {
      subjectId: "student-1",
      policyId: policy.id,
    });

    expect(res.status).toBe(422);
    expect((await readError(res)).code).toBe("POLICY_INACTIVE");
  });
});

describe("billing", () => {
  it("suspends on a missed payment and cancels at the nonpayment limit", async () => {
    const { enrollment } = await enroll();

    const suspended = await readData<Enrollment>(
      await send(`/api/v1/enrollments/${enrollment.id}/unpaid`, "POST"),
    );
    expect(suspended).toMatchObject({ status: "suspended", paymentCurrent: false, daysUnpaid: 1 });

    const cancelled = await readData<Enrollment>(
      await send(`/api/v1/enrollments/${enrollment.id}/unpaid`, "POST"),
    );
    expect(cancelled).toMatchObject({
      status: "cancelled",
      daysUnpaid: 2,
      cancelReason: "nonpayment",
    });

    const res = await send(`/api/v1/enrollments/${enrollment.id}/payments`, "POST");
    expect(res.status).toBe(409);
    expect((await readError(res)).code).toBe("ENROLLMENT_CANCELLED");
  });

  it("resumes a suspended enrollment when a payment is recorded", async () => {
    const { enrollment } = await enroll();
    await send(`/api/v1/enrollments/${enrollment.id}/unpaid`, "POST");
    t.setNow("2026-03-02T09:00:00.000Z");

    const resumed = await readData<Enrollment>(
      await send(`/api/v1/enrollments/${enrollment.id}/payments`, "POST"),
    );

    expect(resumed).toMatchObject({
      status: "active",
      paymentCurrent: true,
      daysUnpaid: 0,
      lastPaymentAt: "2026-03-02T09:00:00.000Z",
      nextPaymentDueAt: "2026-04-01T09:00:00.000Z",
    });
  });

  it("collects an autopay premium from checking", async () => {
    const { enrollment } = await enroll();

    const result = await readData<CollectData>(
      await send(`/api/v1/enrollments/${enrollment.id}/collect`, "POST"),
    );

    expect(result.charged).toBe(true);
    expect(result.premiumEntry?.amount).toBe("-5.00");
    expect(result.premiumEntry?.correlationId).toBe(enrollment.id);
    expect(await balance()).toBe("90.00");

    const [entry] = t.economy.auditLog.query({ action: "collect_premium" });
    expect(entry?.detail).toBe("charged");
  });
});

describe("reading and cancelling", () => {
  it("filters listings by status", async () => {
    const { enrollment } = await enroll();
    await send(`/api/v1/enrollments/${enrollment.id}/cancel`, "POST");
    const { enrollment: second } = await enroll();

    const active = await readData<Enrollment[]>(
      await send("/api/v1/enrollments?status=active"),
    );
    expect(active.map((e) => e.id)).toEqual([second.id]);

    const fetched = await readData<Enrollment>(await send(`/api/v1/enrollments/${enrollment.id}`));
    expect(fetched.status).toBe("cancelled");
    expect(fetched.cancelReason).toBe("requested");
  });

  it("returns 404 for an unknown enrollment", async () => {
    const res = await send("/api/v1/enrollments/ghost/cancel", "POST");

    expect(res.status).toBe(404);
    expect((await readError(res)).code).toBe("ENROLLMENT_NOT_FOUND");
  });
});
