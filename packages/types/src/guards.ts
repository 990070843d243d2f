/**
 * Runtime Type Guards
 *
 * Narrowing functions for classroom economy types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored data, external producers).
 */

import type { AccountBucket, LedgerEntry, LedgerEntryKind } from "./ledger.js";
import type {
  Claim,
  ClaimStatus,
  EnrollmentStatus,
  InKindClaim,
  MonetaryClaim,
} from "./insurance.js";

// =============================================================================
// Ledger guards
// =============================================================================

export const LEDGER_ENTRY_KINDS: readonly LedgerEntryKind[] = [
  "deposit",
  "withdrawal",
  "payroll",
  "bonus",
  "purchase",
  "fee",
  "rent",
  "transfer",
  "insurance_premium",
  "insurance_payout",
  "adjustment",
];

const ENTRY_KINDS = new Set<string>(LEDGER_ENTRY_KINDS);
const BUCKETS = new Set<string>(["checking", "savings"]);

export function isLedgerEntryKind(value: unknown): value is LedgerEntryKind {
  return typeof value === "string" && ENTRY_KINDS.has(value);
}

export function isAccountBucket(value: unknown): value is AccountBucket {
  return typeof value === "string" && BUCKETS.has(value);
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.tenantId === "string" &&
    typeof v.subjectId === "string" &&
    typeof v.amount === "string" &&
    isAccountBucket(v.bucket) &&
    isLedgerEntryKind(v.kind) &&
    typeof v.createdAt === "string" &&
    typeof v.availableAt === "string" &&
    typeof v.voided === "boolean"
  );
}

// =============================================================================
// Insurance guards
// =============================================================================

const CLAIM_STATUSES = new Set<string>(["pending", "approved", "rejected", "paid"]);
const ENROLLMENT_STATUSES = new Set<string>(["active", "suspended", "cancelled"]);

export function isClaimStatus(value: unknown): value is ClaimStatus {
  return typeof value === "string" && CLAIM_STATUSES.has(value);
}

export function isEnrollmentStatus(value: unknown): value is EnrollmentStatus {
  return typeof value === "string" && ENROLLMENT_STATUSES.has(value);
}

export function isMonetaryClaim(claim: Claim): claim is MonetaryClaim {
  return claim.kind === "monetary";
}

export function isInKindClaim(claim: Claim): claim is InKindClaim {
  return claim.kind === "in_kind";
}

export function isClaim(value: unknown): value is Claim {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  const common =
    typeof v.id === "string" &&
    typeof v.tenantId === "string" &&
    typeof v.enrollmentId === "string" &&
    typeof v.policyId === "string" &&
    typeof v.subjectId === "string" &&
    typeof v.incidentDate === "string" &&
    typeof v.filedAt === "string" &&
    isClaimStatus(v.status);
  if (!common) return false;

  if (v.kind === "monetary") {
    return typeof v.ledgerEntryId === "string" && typeof v.requestedAmount === "string";
  }
  if (v.kind === "in_kind") {
    return typeof v.item === "string";
  }
  return false;
}
