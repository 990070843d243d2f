/**
 * Row builders for store tests.
 */

import type { Claim, Enrollment, LedgerEntry, Policy } from "@classbank/types";

const T0 = "2026-03-01T00:00:00.000Z";

export function entryRow(overrides: Partial<LedgerEntry> = {}): LedgerEntry {
  return {
    id: "entry-1",
    tenantId: "class-a",
    subjectId: "student-1",
    amount: "50.00",
    bucket: "checking",
    kind: "payroll",
    createdAt: T0,
    availableAt: T0,
    voided: false,
    ...overrides,
  };
}

export function policyRow(overrides: Partial<Policy> = {}): Policy {
  return {
    id: "policy-1",
    tenantId: "class-a",
    title: "Lunch Protection",
    premium: "5.00",
    chargeFrequency: "monthly",
    autopay: true,
    waitingPeriodDays: 7,
    claimTimeLimitDays: 30,
    maxClaimsCount: null,
    maxClaimsPeriod: "month",
    maxClaimAmount: null,
    maxPayoutPerPeriod: null,
    claimKind: "monetary",
    repurchase: { mode: "allowed" },
    autoCancelNonpayDays: 7,
    bundle: null,
    active: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function enrollmentRow(overrides: Partial<Enrollment> = {}): Enrollment {
  return {
    id: "enrollment-1",
    tenantId: "class-a",
    subjectId: "student-1",
    policyId: "policy-1",
    status: "active",
    purchasedAt: T0,
    coverageStartsAt: "2026-03-08T00:00:00.000Z",
    lastPaymentAt: T0,
    nextPaymentDueAt: "2026-03-31T00:00:00.000Z",
    paymentCurrent: true,
    daysUnpaid: 0,
    premiumCharged: "5.00",
    ...overrides,
  };
}

export function claimRow(
  overrides: Partial<Omit<Claim, "kind">> & { ledgerEntryId?: string } = {},
): Claim {
  return {
    id: "claim-1",
    tenantId: "class-a",
    enrollmentId: "enrollment-1",
    policyId: "policy-1",
    subjectId: "student-1",
    incidentDate: "2026-03-10T00:00:00.000Z",
    filedAt: "2026-03-11T00:00:00.000Z",
    description: "Lunch money lost",
    status: "pending",
    kind: "monetary",
    ledgerEntryId: "entry-1",
    requestedAmount: "20.00",
    ...overrides,
  };
}
