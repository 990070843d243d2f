/**
 * @classbank/insurance: Inputs and results of the insurance engines.
 */

import type {
  BundleDiscount,
  ChargeFrequency,
  Claim,
  ClaimKind,
  ClaimPeriod,
  ClaimStatus,
  Enrollment,
  EnrollmentStatus,
  LedgerEntry,
  RepurchaseRule,
} from "@classbank/types";
import type { Logger } from "pino";
import type { ClaimFailure } from "./errors.js";

// =============================================================================
// Shared
// =============================================================================

export interface EngineOptions {
  /** Defaults to the system clock. */
  readonly clock?: (() => Date) | undefined;
  /** Defaults to crypto.randomUUID. */
  readonly generateId?: (() => string) | undefined;
  /** Defaults to a silent logger. */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Policies
// =============================================================================

/**
 * Fields a teacher supplies when defining a policy. Omitted fields take
 * the catalog defaults.
 */
export interface PolicyInput {
  readonly code?: string | undefined;
  readonly title: string;
  readonly description?: string | undefined;
  readonly premium: string;
  readonly chargeFrequency?: ChargeFrequency | undefined;
  readonly autopay?: boolean | undefined;
  readonly waitingPeriodDays?: number | undefined;
  readonly claimTimeLimitDays?: number | undefined;
  readonly maxClaimsCount?: number | null | undefined;
  readonly maxClaimsPeriod?: ClaimPeriod | undefined;
  readonly maxClaimAmount?: string | null | undefined;
  readonly maxPayoutPerPeriod?: string | null | undefined;
  readonly claimKind?: ClaimKind | undefined;
  readonly repurchase?: RepurchaseRule | undefined;
  readonly autoCancelNonpayDays?: number | undefined;
  readonly bundle?: BundleDiscount | null | undefined;
}

export type PolicyPatch = { readonly [K in keyof PolicyInput]?: PolicyInput[K] | undefined };

export interface PolicyQuery {
  readonly activeOnly?: boolean | undefined;
}

// =============================================================================
// Enrollments
// =============================================================================

export interface EnrollResult {
  readonly enrollment: Enrollment;
  /** Null when the (discounted) premium is zero. */
  readonly premiumEntry: LedgerEntry | null;
}

/**
 * Outcome of one billing step for an autopay enrollment.
 */
export interface CollectResult {
  readonly enrollment: Enrollment;
  readonly charged: boolean;
  readonly premiumEntry: LedgerEntry | null;
}

export interface EnrollmentQuery {
  readonly subjectId?: string | undefined;
  readonly policyId?: string | undefined;
  readonly status?: EnrollmentStatus | readonly EnrollmentStatus[] | undefined;
}

// =============================================================================
// Claims
// =============================================================================

export interface FileClaimRequest {
  readonly subjectId: string;
  readonly enrollmentId: string;
  /** ISO 8601 date or timestamp */
  readonly incidentDate: string;
  readonly description: string;
  readonly comments?: string | undefined;
  /** Required for monetary policies */
  readonly ledgerEntryId?: string | undefined;
  /** Required for monetary policies */
  readonly requestedAmount?: string | undefined;
  /** Required for in-kind policies */
  readonly item?: string | undefined;
}

export type DecisionOutcome = "approve" | "reject";

export interface DecisionRequest {
  readonly reviewer: string;
  readonly outcome: DecisionOutcome;
  /** Defaults to the requested amount */
  readonly approvedAmount?: string | undefined;
  readonly notes?: string | undefined;
  readonly rejectionReason?: string | undefined;
}

export type FileResult =
  | { readonly ok: true; readonly claim: Claim }
  | { readonly ok: false; readonly failures: readonly ClaimFailure[] };

export type DecideResult =
  | { readonly ok: true; readonly claim: Claim; readonly payoutEntry?: LedgerEntry | undefined }
  | { readonly ok: false; readonly failures: readonly ClaimFailure[] };

export interface RolledBackClaim {
  readonly claim: Claim;
  readonly failures: readonly ClaimFailure[];
}

export interface RecoveryResult {
  readonly resumed: readonly Claim[];
  readonly rolledBack: readonly RolledBackClaim[];
}

export interface ClaimQuery {
  readonly subjectId?: string | undefined;
  readonly policyId?: string | undefined;
  readonly enrollmentId?: string | undefined;
  readonly status?: ClaimStatus | readonly ClaimStatus[] | undefined;
}
