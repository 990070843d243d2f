/**
 * @classbank/insurance: Policies, enrollments and claims.
 *
 * - PolicyCatalog: the policies a teacher offers
 * - EnrollmentManager: purchase, billing state and cancellation
 * - ClaimsEngine: filing, decision, payout and stalled-approval recovery
 *
 * All engines take the caller's TenantScope as the first argument and
 * consult the Tenant Guard before any other validation.
 */

export {
  PolicyCatalog,
  validateForClaims,
  computePremium,
  MAX_POLICY_DAYS,
} from "./policy-catalog.js";
export { EnrollmentManager } from "./enrollment-manager.js";
export { ClaimsEngine } from "./claims-engine.js";

export {
  PolicyError,
  EnrollmentError,
  ClaimError,
  failure,
  isIntegrityConflict,
  isIntegrityFailure,
} from "./errors.js";
export type {
  PolicyErrorCode,
  EnrollmentErrorCode,
  ClaimErrorCode,
  ClaimFailureCode,
  ClaimFailure,
} from "./errors.js";

export {
  DAY_MS,
  PERIOD_DAYS,
  CYCLE_DAYS,
  addDays,
  isBefore,
  wholeDaysBetween,
  periodStart,
  nextDueDate,
} from "./periods.js";

export type {
  EngineOptions,
  PolicyInput,
  PolicyPatch,
  PolicyQuery,
  EnrollResult,
  CollectResult,
  EnrollmentQuery,
  FileClaimRequest,
  DecisionOutcome,
  DecisionRequest,
  FileResult,
  DecideResult,
  RolledBackClaim,
  RecoveryResult,
  ClaimQuery,
} from "./types.js";
