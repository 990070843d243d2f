/**
 * Insurance Types
 *
 * Policies offered by a teacher, a student's enrollment in a policy,
 * and the claims filed against an enrollment.
 *
 * Rules:
 * - All types are readonly
 * - Enrollments and claims are never deleted; status records termination
 * - Claim variants are a tagged union on `kind`
 */

import type { TenantScoped } from "./tenant.js";

// =============================================================================
// Policy
// =============================================================================

export type ChargeFrequency = "weekly" | "monthly";

/** Rolling window over which claim counts and payouts are capped. */
export type ClaimPeriod = "month" | "semester" | "year";

/** Whether claims pay money into the ledger or an item provided offline. */
export type ClaimKind = "monetary" | "in_kind";

/**
 * What happens when a student wants to buy a policy again after cancelling.
 */
export type RepurchaseRule =
  | { readonly mode: "allowed" }
  | { readonly mode: "cooldown"; readonly waitDays: number }
  | { readonly mode: "never" };

/**
 * Discount granted when a student already holds one of the linked policies.
 */
export interface BundleDiscount {
  readonly policyIds: readonly string[];
  /** Percentage off the premium (0-100) */
  readonly discountPercent: number;
  /** Fixed amount off the premium, applied after the percentage */
  readonly discountAmount: string;
}

export interface Policy extends TenantScoped {
  readonly id: string;
  readonly code?: string | undefined;
  readonly title: string;
  readonly description?: string | undefined;

  /** Premium charged per billing cycle */
  readonly premium: string;
  readonly chargeFrequency: ChargeFrequency;
  readonly autopay: boolean;

  /** Days between purchase and coverage start */
  readonly waitingPeriodDays: number;

  /** Days after an incident within which a claim may be filed */
  readonly claimTimeLimitDays: number;

  /** Approved/paid claims allowed per period (null = unlimited) */
  readonly maxClaimsCount: number | null;
  readonly maxClaimsPeriod: ClaimPeriod;

  /** Cap on a single payout (null = unlimited) */
  readonly maxClaimAmount: string | null;

  /** Cap on the sum of payouts per period (null = unlimited) */
  readonly maxPayoutPerPeriod: string | null;

  readonly claimKind: ClaimKind;
  readonly repurchase: RepurchaseRule;

  /** Consecutive unpaid days before the enrollment is cancelled */
  readonly autoCancelNonpayDays: number;

  readonly bundle: BundleDiscount | null;

  readonly active: boolean;
  readonly createdAt: string;
  readonly updatedAt: string;
}

// =============================================================================
// Enrollment
// =============================================================================

export type EnrollmentStatus = "active" | "suspended" | "cancelled";

export type CancelReason = "requested" | "nonpayment";

export interface Enrollment extends TenantScoped {
  readonly id: string;
  readonly subjectId: string;
  readonly policyId: string;
  readonly status: EnrollmentStatus;

  readonly purchasedAt: string;
  /** purchasedAt + waiting period */
  readonly coverageStartsAt: string;

  readonly lastPaymentAt: string | null;
  readonly nextPaymentDueAt: string;
  readonly paymentCurrent: boolean;
  /** Consecutive billing days without payment */
  readonly daysUnpaid: number;

  /** Premium actually charged at purchase, after bundle discounts */
  readonly premiumCharged: string;

  readonly cancelledAt?: string | undefined;
  readonly cancelReason?: CancelReason | undefined;
}

// =============================================================================
// Claim
// =============================================================================

export type ClaimStatus = "pending" | "approved" | "rejected" | "paid";

/**
 * The reviewer's verdict on a claim.
 */
export interface ClaimDecision {
  readonly reviewer: string;
  readonly decidedAt: string;
  readonly notes?: string | undefined;
  readonly rejectionReason?: string | undefined;
}

interface ClaimBase extends TenantScoped {
  readonly id: string;
  readonly enrollmentId: string;
  readonly policyId: string;
  readonly subjectId: string;

  /** ISO 8601 date the incident happened */
  readonly incidentDate: string;
  readonly filedAt: string;
  readonly description: string;
  readonly comments?: string | undefined;

  readonly status: ClaimStatus;
  readonly decision?: ClaimDecision | undefined;
}

/**
 * A claim for money against one specific ledger entry.
 */
export interface MonetaryClaim extends ClaimBase {
  readonly kind: "monetary";
  readonly ledgerEntryId: string;
  readonly requestedAmount: string;
  readonly approvedAmount?: string | undefined;
  /** The insurance_payout entry written when the claim was paid */
  readonly payoutEntryId?: string | undefined;
}

/**
 * A claim for an item or service provided outside the ledger.
 */
export interface InKindClaim extends ClaimBase {
  readonly kind: "in_kind";
  readonly item: string;
}

export type Claim = MonetaryClaim | InKindClaim;
