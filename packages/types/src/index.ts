/**
 * @classbank/types: Shared domain types for the classroom economy.
 *
 * These types are used across all packages:
 * - Tenant scope (teacher/class isolation)
 * - Ledger entries and balance buckets
 * - Insurance policies, enrollments and claims
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

export { TenantScope } from "./tenant.js";
export type { TenantScoped } from "./tenant.js";

export type {
  AccountBucket,
  LedgerEntryKind,
  LedgerEntry,
  NewLedgerEntry,
} from "./ledger.js";

export type {
  ChargeFrequency,
  ClaimPeriod,
  ClaimKind,
  RepurchaseRule,
  BundleDiscount,
  Policy,
  EnrollmentStatus,
  CancelReason,
  Enrollment,
  ClaimStatus,
  ClaimDecision,
  MonetaryClaim,
  InKindClaim,
  Claim,
} from "./insurance.js";

export {
  LEDGER_ENTRY_KINDS,
  isLedgerEntryKind,
  isAccountBucket,
  isLedgerEntry,
  isClaimStatus,
  isEnrollmentStatus,
  isMonetaryClaim,
  isInKindClaim,
  isClaim,
} from "./guards.js";
