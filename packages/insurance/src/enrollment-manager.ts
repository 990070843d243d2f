/**
 * Enrollment Manager: a subject's coverage under a policy.
 *
 * Lifecycle:
 *   active ⇄ suspended → cancelled
 *   active → cancelled
 *
 * Rules:
 * - Enrollments are never deleted; cancellation is terminal
 * - One active or suspended enrollment per (subject, policy)
 * - The first premium is charged in the same transaction as the purchase
 * - Payment state is driven by an external billing producer through
 *   recordPayment(), markUnpaid() and collectPremium()
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  Enrollment,
  EnrollmentStatus,
  LedgerEntry,
  Policy,
  TenantScope,
} from "@classbank/types";
import type { EconomyStore, StoreReader, StoreTransaction } from "@classbank/store";
import { guardWrite, requireScoped } from "@classbank/store";
import type { LedgerStore } from "@classbank/ledger";
import { compareAmounts, isZero, negateAmount, withIntegrityLog } from "@classbank/ledger";
import { EnrollmentError, isIntegrityFailure } from "./errors.js";
import { addDays, isBefore, nextDueDate, wholeDaysBetween } from "./periods.js";
import type { PolicyCatalog } from "./policy-catalog.js";
import { computePremium } from "./policy-catalog.js";
import type {
  CollectResult,
  EngineOptions,
  EnrollmentQuery,
  EnrollResult,
} from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<EnrollmentStatus, readonly EnrollmentStatus[]> = {
  active: ["suspended", "cancelled"],
  suspended: ["active", "cancelled"],
  cancelled: [],
};

function assertOpen(enrollment: Enrollment): void {
  if (enrollment.status === "cancelled") {
    throw new EnrollmentError(
      "ENROLLMENT_CANCELLED",
      `Enrollment "${enrollment.id}" was cancelled${enrollment.cancelledAt !== undefined ? ` at ${enrollment.cancelledAt}` : ""}`,
    );
  }
}

function transition(enrollment: Enrollment, to: EnrollmentStatus): EnrollmentStatus {
  assertOpen(enrollment);
  if (enrollment.status !== to && !VALID_TRANSITIONS[enrollment.status].includes(to)) {
    throw new EnrollmentError(
      "INVALID_TRANSITION",
      `Cannot transition enrollment from '${enrollment.status}' to '${to}'`,
    );
  }
  return to;
}

// =============================================================================
// Enrollment Manager
// =============================================================================

export class EnrollmentManager {
  private readonly _store: EconomyStore;
  private readonly _ledger: LedgerStore;
  private readonly _catalog: PolicyCatalog;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _logger: Logger;

  constructor(
    store: EconomyStore,
    ledger: LedgerStore,
    catalog: PolicyCatalog,
    options?: EngineOptions,
  ) {
    this._store = store;
    this._ledger = ledger;
    this._catalog = catalog;
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Purchase
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Buy coverage. Coverage starts after the policy's waiting period.
   *
   * @throws {EnrollmentError} POLICY_INACTIVE, ALREADY_ENROLLED,
   *   REPURCHASE_BLOCKED, INSUFFICIENT_FUNDS
   */
  async enroll(scope: TenantScope, subjectId: string, policyId: string): Promise<EnrollResult> {
    return withIntegrityLog(
      this._logger,
      scope,
      "enroll",
      async () => {
        return this._store.transaction((tx) => {
          const policy = this._catalog.getIn(tx, scope, policyId);
          const now = this._now();

          if (!policy.active) {
            throw new EnrollmentError("POLICY_INACTIVE", `Policy "${policy.title}" is not offered`);
          }

          const held = tx.listEnrollments({ tenantId: scope.tenantId, subjectId, policyId });
          if (held.some((e) => e.status !== "cancelled")) {
            throw new EnrollmentError(
              "ALREADY_ENROLLED",
              `Subject "${subjectId}" is already enrolled in "${policy.title}"`,
            );
          }
          this._assertRepurchaseAllowed(policy, held, now);

          const activePolicyIds = tx
            .listEnrollments({ tenantId: scope.tenantId, subjectId, status: "active" })
            .map((e) => e.policyId);
          const premium = computePremium(policy, activePolicyIds);

          const premiumEntry = this._chargePremium(tx, scope, subjectId, policy, premium);

          const enrollment: Enrollment = {
            id: this._generateId(),
            tenantId: scope.tenantId,
            subjectId,
            policyId,
            status: "active",
            purchasedAt: now,
            coverageStartsAt: addDays(now, policy.waitingPeriodDays),
            lastPaymentAt: now,
            nextPaymentDueAt: nextDueDate(now, policy.chargeFrequency),
            paymentCurrent: true,
            daysUnpaid: 0,
            premiumCharged: premium,
          };
          guardWrite(scope, enrollment, { type: "enrollment", id: enrollment.id });
          tx.insertEnrollment(enrollment);

          this._logger.info(
            { tenantId: scope.tenantId, enrollmentId: enrollment.id, subjectId, policyId, premium },
            "enrollment created",
          );
          return { enrollment, premiumEntry };
        });
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Billing
  // ───────────────────────────────────────────────────────────────────────

  /**
   * A premium was paid: payment becomes current, the unpaid counter
   * resets, the next due date advances, and a suspended enrollment
   * resumes.
   *
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND, ENROLLMENT_CANCELLED
   */
  async recordPayment(scope: TenantScope, enrollmentId: string): Promise<Enrollment> {
    return withIntegrityLog(
      this._logger,
      scope,
      "recordPayment",
      async () => {
        return this._store.transaction((tx) => {
          const enrollment = this.getIn(tx, scope, enrollmentId);
          const policy = this._catalog.getIn(tx, scope, enrollment.policyId);
          return this._applyPayment(tx, enrollment, policy);
        });
      },
      isIntegrityFailure,
    );
  }

  /**
   * A billing day passed without payment. The enrollment is suspended,
   * and cancelled for nonpayment once the unpaid counter reaches the
   * policy's limit.
   *
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND, ENROLLMENT_CANCELLED
   */
  async markUnpaid(scope: TenantScope, enrollmentId: string): Promise<Enrollment> {
    return withIntegrityLog(
      this._logger,
      scope,
      "markUnpaid",
      async () => {
        return this._store.transaction((tx) => {
          const enrollment = this.getIn(tx, scope, enrollmentId);
          const policy = this._catalog.getIn(tx, scope, enrollment.policyId);
          return this._applyMissedPayment(tx, enrollment, policy);
        });
      },
      isIntegrityFailure,
    );
  }

  /**
   * One billing step for an autopay enrollment: charge the premium and
   * record the payment, or mark the enrollment unpaid when the subject's
   * available checking balance is short.
   *
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND, ENROLLMENT_CANCELLED,
   *   AUTOPAY_DISABLED
   */
  async collectPremium(scope: TenantScope, enrollmentId: string): Promise<CollectResult> {
    return withIntegrityLog(
      this._logger,
      scope,
      "collectPremium",
      async () => {
        return this._store.transaction((tx) => {
          const enrollment = this.getIn(tx, scope, enrollmentId);
          const policy = this._catalog.getIn(tx, scope, enrollment.policyId);
          assertOpen(enrollment);
          if (!policy.autopay) {
            throw new EnrollmentError(
              "AUTOPAY_DISABLED",
              `Policy "${policy.title}" does not use autopay`,
            );
          }

          const amount = enrollment.premiumCharged;
          if (!this._canAfford(tx, scope, enrollment.subjectId, amount)) {
            const updated = this._applyMissedPayment(tx, enrollment, policy);
            return { enrollment: updated, charged: false, premiumEntry: null };
          }

          const premiumEntry = isZero(amount)
            ? null
            : this._ledger.appendIn(tx, scope, {
                tenantId: scope.tenantId,
                subjectId: enrollment.subjectId,
                amount: negateAmount(amount),
                bucket: "checking",
                kind: "insurance_premium",
                description: `Premium: ${policy.title}`,
                correlationId: enrollment.id,
              });
          const updated = this._applyPayment(tx, enrollment, policy);
          return { enrollment: updated, charged: true, premiumEntry };
        });
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Cancellation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Cancel at the subject's request. Terminal.
   *
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND, ENROLLMENT_CANCELLED
   */
  async cancel(scope: TenantScope, enrollmentId: string): Promise<Enrollment> {
    return withIntegrityLog(
      this._logger,
      scope,
      "cancel",
      async () => {
        return this._store.transaction((tx) => {
          const enrollment = this.getIn(tx, scope, enrollmentId);
          const updated: Enrollment = {
            ...enrollment,
            status: transition(enrollment, "cancelled"),
            cancelledAt: this._now(),
            cancelReason: "requested",
          };
          tx.updateEnrollment(updated);
          this._logger.info(
            { tenantId: scope.tenantId, enrollmentId, reason: "requested" },
            "enrollment cancelled",
          );
          return updated;
        });
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND
   */
  async get(scope: TenantScope, enrollmentId: string): Promise<Enrollment> {
    return withIntegrityLog(
      this._logger,
      scope,
      "get",
      () => this._store.read((reader) => this.getIn(reader, scope, enrollmentId)),
      isIntegrityFailure,
    );
  }

  /**
   * Same as get(), against a caller's reader or transaction.
   */
  getIn(reader: StoreReader, scope: TenantScope, enrollmentId: string): Enrollment {
    return requireScoped(
      scope,
      reader.getEnrollment(enrollmentId),
      { type: "enrollment", id: enrollmentId },
      () => new EnrollmentError("ENROLLMENT_NOT_FOUND", `Enrollment "${enrollmentId}" not found`),
    );
  }

  async list(scope: TenantScope, query?: EnrollmentQuery): Promise<readonly Enrollment[]> {
    return this._store.read((reader) =>
      reader.listEnrollments({ ...query, tenantId: scope.tenantId }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _now(): string {
    return this._clock().toISOString();
  }

  private _assertRepurchaseAllowed(
    policy: Policy,
    held: readonly Enrollment[],
    now: string,
  ): void {
    const rule = policy.repurchase;
    if (rule.mode === "allowed") return;

    let lastCancelledAt: string | undefined;
    for (const enrollment of held) {
      const at = enrollment.cancelledAt;
      if (at !== undefined && (lastCancelledAt === undefined || isBefore(lastCancelledAt, at))) {
        lastCancelledAt = at;
      }
    }
    if (lastCancelledAt === undefined) return;

    if (rule.mode === "never") {
      throw new EnrollmentError(
        "REPURCHASE_BLOCKED",
        `Policy "${policy.title}" cannot be bought again after cancellation`,
      );
    }

    const waited = wholeDaysBetween(lastCancelledAt, now);
    if (waited < rule.waitDays) {
      throw new EnrollmentError(
        "REPURCHASE_BLOCKED",
        `Policy "${policy.title}" can be bought again ${String(rule.waitDays - waited)} day(s) from now`,
      );
    }
  }

  private _canAfford(
    reader: StoreReader,
    scope: TenantScope,
    subjectId: string,
    amount: string,
  ): boolean {
    const available = this._ledger.balanceIn(reader, scope, subjectId, "checking", {
      availableOnly: true,
    });
    return compareAmounts(available, amount) >= 0;
  }

  private _chargePremium(
    tx: StoreTransaction,
    scope: TenantScope,
    subjectId: string,
    policy: Policy,
    premium: string,
  ): LedgerEntry | null {
    if (isZero(premium)) return null;
    if (!this._canAfford(tx, scope, subjectId, premium)) {
      throw new EnrollmentError(
        "INSUFFICIENT_FUNDS",
        `Premium ${premium} for "${policy.title}" exceeds the available checking balance`,
      );
    }
    return this._ledger.appendIn(tx, scope, {
      tenantId: scope.tenantId,
      subjectId,
      amount: negateAmount(premium),
      bucket: "checking",
      kind: "insurance_premium",
      description: `Premium: ${policy.title}`,
    });
  }

  private _applyPayment(tx: StoreTransaction, enrollment: Enrollment, policy: Policy): Enrollment {
    const now = this._now();
    const updated: Enrollment = {
      ...enrollment,
      status: transition(enrollment, "active"),
      lastPaymentAt: now,
      nextPaymentDueAt: nextDueDate(now, policy.chargeFrequency),
      paymentCurrent: true,
      daysUnpaid: 0,
    };
    tx.updateEnrollment(updated);
    this._logger.info(
      { tenantId: enrollment.tenantId, enrollmentId: enrollment.id },
      "premium payment recorded",
    );
    return updated;
  }

  private _applyMissedPayment(
    tx: StoreTransaction,
    enrollment: Enrollment,
    policy: Policy,
  ): Enrollment {
    const daysUnpaid = enrollment.daysUnpaid + 1;
    const lapsed = daysUnpaid >= policy.autoCancelNonpayDays;

    const updated: Enrollment = lapsed
      ? {
          ...enrollment,
          status: transition(enrollment, "cancelled"),
          paymentCurrent: false,
          daysUnpaid,
          cancelledAt: this._now(),
          cancelReason: "nonpayment",
        }
      : {
          ...enrollment,
          status: transition(enrollment, "suspended"),
          paymentCurrent: false,
          daysUnpaid,
        };
    tx.updateEnrollment(updated);

    this._logger.info(
      { tenantId: enrollment.tenantId, enrollmentId: enrollment.id, daysUnpaid, lapsed },
      lapsed ? "enrollment cancelled for nonpayment" : "premium payment missed",
    );
    return updated;
  }
}
