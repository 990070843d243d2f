/**
 * @classbank/insurance: Errors and failure values.
 *
 * Two kinds of problems come out of this package:
 *
 * - Thrown errors (PolicyError, EnrollmentError, ClaimError) for stale
 *   references, invalid input and integrity conflicts. These
 *   short-circuit.
 * - ClaimFailure values for business-rule violations during filing and
 *   decision. These are accumulated and returned so a reviewer sees every
 *   reason at once.
 */

import { isIntegrityError } from "@classbank/store";

// =============================================================================
// Thrown errors
// =============================================================================

export type PolicyErrorCode =
  | "POLICY_NOT_FOUND"
  | "POLICY_LOCKED"
  | "INVALID_POLICY";

export class PolicyError extends Error {
  public readonly code: PolicyErrorCode;
  constructor(code: PolicyErrorCode, message: string) {
    super(message);
    this.name = "PolicyError";
    this.code = code;
  }
}

export type EnrollmentErrorCode =
  | "ENROLLMENT_NOT_FOUND"
  | "POLICY_INACTIVE"
  | "ALREADY_ENROLLED"
  | "REPURCHASE_BLOCKED"
  | "INSUFFICIENT_FUNDS"
  | "ENROLLMENT_CANCELLED"
  | "AUTOPAY_DISABLED"
  | "INVALID_TRANSITION";

export class EnrollmentError extends Error {
  public readonly code: EnrollmentErrorCode;
  constructor(code: EnrollmentErrorCode, message: string) {
    super(message);
    this.name = "EnrollmentError";
    this.code = code;
  }
}

export type ClaimErrorCode =
  | "CLAIM_NOT_FOUND"
  | "CLAIM_NOT_PENDING"
  | "INVALID_CLAIM"
  | "TRANSACTION_NOT_FOUND"
  | "TRANSACTION_ALREADY_CLAIMED"
  | "INVALID_TRANSITION";

export class ClaimError extends Error {
  public readonly code: ClaimErrorCode;
  constructor(code: ClaimErrorCode, message: string) {
    super(message);
    this.name = "ClaimError";
    this.code = code;
  }
}

/**
 * Integrity conflicts: the caller must not retry them blindly.
 */
export function isIntegrityConflict(err: unknown): boolean {
  return err instanceof ClaimError && err.code === "TRANSACTION_ALREADY_CLAIMED";
}

/**
 * Everything this package treats as an integrity error: guard
 * violations, store constraint failures and integrity conflicts.
 */
export function isIntegrityFailure(err: unknown): boolean {
  return isIntegrityError(err) || isIntegrityConflict(err);
}

// =============================================================================
// Business-rule failures
// =============================================================================

export type ClaimFailureCode =
  | "COVERAGE_NOT_STARTED"
  | "CLAIM_WINDOW_EXPIRED"
  | "INCIDENT_IN_FUTURE"
  | "CLAIM_LIMIT_EXCEEDED"
  | "PAYMENT_NOT_CURRENT"
  | "ENROLLMENT_NOT_ACTIVE"
  | "OWNERSHIP_MISMATCH"
  | "LINKED_TRANSACTION_VOIDED"
  | "INVALID_POLICY_CONFIG"
  | "PAYOUT_CAP_EXCEEDED"
  | "PERIOD_PAYOUT_CAP_EXCEEDED"
  | "INVALID_APPROVED_AMOUNT";

export interface ClaimFailure {
  readonly code: ClaimFailureCode;
  readonly message: string;
}

export function failure(code: ClaimFailureCode, message: string): ClaimFailure {
  return { code, message };
}
