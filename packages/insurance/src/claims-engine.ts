/**
 * Claims Engine: validates, decides and pays out insurance claims.
 *
 * Lifecycle:
 *   pending → approved → paid
 *   pending → rejected
 *   approved → rejected   (stalled-approval recovery only)
 *
 * Rules:
 * - Nothing returns to pending; rejected and paid are terminal
 * - At most one non-rejected claim per ledger entry. The check in file()
 *   only gives early feedback; the store's unique index decides
 * - Business-rule failures are accumulated and returned, never thrown
 * - Tenant violations and constraint conflicts are thrown and logged
 * - decide() re-reads the linked entry, the enrollment and the policy
 *   inside its own transaction, and approval, payout entry and status
 *   change commit together
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  Claim,
  ClaimDecision,
  ClaimStatus,
  Enrollment,
  LedgerEntry,
  MonetaryClaim,
  Policy,
  TenantScope,
} from "@classbank/types";
import type { EconomyStore, StoreReader, StoreTransaction } from "@classbank/store";
import {
  ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT,
  guardRelation,
  guardWrite,
  requireScoped,
  StoreError,
} from "@classbank/store";
import type { LedgerStore } from "@classbank/ledger";
import {
  absAmount,
  addAmounts,
  compareAmounts,
  isPositive,
  LedgerError,
  normalizeAmount,
  withIntegrityLog,
} from "@classbank/ledger";
import type { ClaimFailure } from "./errors.js";
import { ClaimError, failure, isIntegrityFailure } from "./errors.js";
import type { EnrollmentManager } from "./enrollment-manager.js";
import { isBefore, periodStart, wholeDaysBetween } from "./periods.js";
import type { PolicyCatalog } from "./policy-catalog.js";
import { validateForClaims } from "./policy-catalog.js";
import type {
  ClaimQuery,
  DecideResult,
  DecisionRequest,
  EngineOptions,
  FileClaimRequest,
  FileResult,
  RecoveryResult,
  RolledBackClaim,
} from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<ClaimStatus, readonly ClaimStatus[]> = {
  pending: ["approved", "rejected"],
  approved: ["paid", "rejected"],
  rejected: [],
  paid: [],
};

function assertTransition(claim: Claim, to: ClaimStatus): void {
  if (!VALID_TRANSITIONS[claim.status].includes(to)) {
    throw new ClaimError(
      "INVALID_TRANSITION",
      `Cannot transition claim "${claim.id}" from '${claim.status}' to '${to}'`,
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Everything a claim is checked against. */
interface ClaimContext {
  readonly enrollment: Enrollment;
  readonly policy: Policy;
  /** Present for monetary claims */
  readonly entry: LedgerEntry | undefined;
}

/** A positive amount in canonical form, or undefined. */
function positiveAmount(value: string): string | undefined {
  try {
    return isPositive(value) ? normalizeAmount(value) : undefined;
  } catch (err) {
    if (err instanceof LedgerError) return undefined;
    throw err;
  }
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function isActiveClaimConflict(err: unknown): err is StoreError {
  return (
    err instanceof StoreError &&
    err.code === "UNIQUE_VIOLATION" &&
    err.constraint === ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT
  );
}

// =============================================================================
// Claims Engine
// =============================================================================

export class ClaimsEngine {
  private readonly _store: EconomyStore;
  private readonly _ledger: LedgerStore;
  private readonly _catalog: PolicyCatalog;
  private readonly _enrollments: EnrollmentManager;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _logger: Logger;

  constructor(
    store: EconomyStore,
    ledger: LedgerStore,
    catalog: PolicyCatalog,
    enrollments: EnrollmentManager,
    options?: EngineOptions,
  ) {
    this._store = store;
    this._ledger = ledger;
    this._catalog = catalog;
    this._enrollments = enrollments;
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Filing
  // ───────────────────────────────────────────────────────────────────────

  /**
   * File a claim. Business-rule failures come back as a list; nothing is
   * written unless the list is empty.
   *
   * @throws {TenantGuardError} if the enrollment, policy or entry belongs
   *   to another tenant
   * @throws {ClaimError} INVALID_CLAIM, TRANSACTION_NOT_FOUND,
   *   TRANSACTION_ALREADY_CLAIMED
   * @throws {EnrollmentError} ENROLLMENT_NOT_FOUND
   */
  async file(scope: TenantScope, request: FileClaimRequest): Promise<FileResult> {
    return withIntegrityLog(
      this._logger,
      scope,
      "file",
      async () => {
        const now = this._now();
        const checked = await this._store.read((reader) =>
          this._checkFiling(reader, scope, request, now),
        );
        if (!checked.ok) {
          this._logger.info(
            {
              tenantId: scope.tenantId,
              enrollmentId: request.enrollmentId,
              failures: checked.failures.map((f) => f.code),
            },
            "claim filing refused",
          );
          return checked;
        }

        const claim = checked.claim;
        try {
          await this._store.transaction((tx) => {
            guardWrite(scope, claim, { type: "claim", id: claim.id });
            tx.insertClaim(claim);
          });
        } catch (err) {
          // Logged once, as the ClaimError, by withIntegrityLog.
          if (isActiveClaimConflict(err)) {
            throw new ClaimError(
              "TRANSACTION_ALREADY_CLAIMED",
              claim.kind === "monetary"
                ? `Ledger entry "${claim.ledgerEntryId}" already has an active claim`
                : `Claim "${claim.id}" conflicts with an active claim`,
            );
          }
          throw err;
        }

        this._logger.info(
          { tenantId: scope.tenantId, claimId: claim.id, kind: claim.kind },
          "claim filed",
        );
        return { ok: true, claim };
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Decision
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Approve or reject a pending claim.
   *
   * Approval re-validates against fresh state in the same transaction
   * that writes the decision. A monetary approval pays out immediately:
   * the claim ends `paid` with its payout entry recorded, or nothing
   * changes at all.
   *
   * @throws {ClaimError} CLAIM_NOT_FOUND, CLAIM_NOT_PENDING
   */
  async decide(
    scope: TenantScope,
    claimId: string,
    request: DecisionRequest,
  ): Promise<DecideResult> {
    return withIntegrityLog(
      this._logger,
      scope,
      "decide",
      async () => {
        const result = await this._store.transaction((tx): DecideResult => {
          const claim = this.getIn(tx, scope, claimId);
          if (claim.status !== "pending") {
            throw new ClaimError(
              "CLAIM_NOT_PENDING",
              `Claim "${claimId}" is already ${claim.status}`,
            );
          }

          const now = this._now();
          const decision: ClaimDecision = {
            reviewer: request.reviewer,
            decidedAt: now,
            notes: request.notes,
            rejectionReason: request.outcome === "reject" ? request.rejectionReason : undefined,
          };

          if (request.outcome === "reject") {
            assertTransition(claim, "rejected");
            const rejected: Claim = { ...claim, status: "rejected", decision };
            tx.updateClaim(rejected);
            return { ok: true, claim: rejected };
          }

          const context = this._loadContext(tx, scope, claim);

          if (claim.kind === "in_kind") {
            const failures = this._approvalFailures(tx, scope, claim, context, undefined, now);
            if (failures.length > 0) return { ok: false, failures };
            assertTransition(claim, "approved");
            const approved: Claim = { ...claim, status: "approved", decision };
            tx.updateClaim(approved);
            return { ok: true, claim: approved };
          }

          const approvedAmount = positiveAmount(request.approvedAmount ?? claim.requestedAmount);
          const failures = this._approvalFailures(tx, scope, claim, context, approvedAmount, now);
          if (failures.length > 0 || approvedAmount === undefined) {
            return { ok: false, failures };
          }

          assertTransition(claim, "approved");
          const approved = { ...claim, status: "approved" as const, approvedAmount, decision };
          tx.updateClaim(approved);
          const paid = this._payIn(tx, scope, approved);
          return { ok: true, claim: paid.claim, payoutEntry: paid.payoutEntry };
        });

        this._logger.info(
          {
            tenantId: scope.tenantId,
            claimId,
            outcome: request.outcome,
            reviewer: request.reviewer,
            ...(result.ok
              ? { status: result.claim.status }
              : { failures: result.failures.map((f) => f.code) }),
          },
          "claim decided",
        );
        return result;
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recovery
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Find monetary claims left in `approved` without a payout entry and
   * settle them: pay out when the linked entry is still valid and owned
   * by the claimant, otherwise reject with the reasons.
   */
  async recoverStalled(scope: TenantScope, reviewer: string): Promise<RecoveryResult> {
    return withIntegrityLog(
      this._logger,
      scope,
      "recoverStalled",
      async () => {
        const result = await this._store.transaction((tx) => {
          const stalled = tx
            .listClaims({ tenantId: scope.tenantId, status: "approved" })
            .filter(
              (claim): claim is MonetaryClaim =>
                claim.kind === "monetary" && claim.payoutEntryId === undefined,
            );

          const resumed: Claim[] = [];
          const rolledBack: RolledBackClaim[] = [];
          const now = this._now();

          for (const claim of stalled) {
            const context = this._loadContext(tx, scope, claim);
            const failures = this._entryFailures(claim, context);
            const amount = positiveAmount(claim.approvedAmount ?? claim.requestedAmount);
            if (amount === undefined) {
              failures.push(failure("INVALID_APPROVED_AMOUNT", "Approved amount must be positive"));
            }

            if (failures.length === 0 && amount !== undefined) {
              resumed.push(this._payIn(tx, scope, { ...claim, approvedAmount: amount }).claim);
              continue;
            }

            assertTransition(claim, "rejected");
            const rejected: Claim = {
              ...claim,
              status: "rejected",
              decision: {
                ...claim.decision,
                reviewer,
                decidedAt: now,
                rejectionReason: failures.map((f) => f.message).join("; "),
              },
            };
            tx.updateClaim(rejected);
            rolledBack.push({ claim: rejected, failures });
          }

          return { resumed, rolledBack };
        });

        if (result.resumed.length > 0 || result.rolledBack.length > 0) {
          this._logger.warn(
            {
              tenantId: scope.tenantId,
              reviewer,
              resumed: result.resumed.map((c) => c.id),
              rolledBack: result.rolledBack.map((r) => r.claim.id),
            },
            "stalled approvals settled",
          );
        }
        return result;
      },
      isIntegrityFailure,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {ClaimError} CLAIM_NOT_FOUND
   */
  async get(scope: TenantScope, claimId: string): Promise<Claim> {
    return withIntegrityLog(
      this._logger,
      scope,
      "get",
      () => this._store.read((reader) => this.getIn(reader, scope, claimId)),
      isIntegrityFailure,
    );
  }

  getIn(reader: StoreReader, scope: TenantScope, claimId: string): Claim {
    return requireScoped(
      scope,
      reader.getClaim(claimId),
      { type: "claim", id: claimId },
      () => new ClaimError("CLAIM_NOT_FOUND", `Claim "${claimId}" not found`),
    );
  }

  async list(scope: TenantScope, query?: ClaimQuery): Promise<readonly Claim[]> {
    return this._store.read((reader) =>
      reader.listClaims({ ...query, tenantId: scope.tenantId }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _now(): string {
    return this._clock().toISOString();
  }

  private _checkFiling(
    reader: StoreReader,
    scope: TenantScope,
    request: FileClaimRequest,
    now: string,
  ): { ok: true; claim: Claim } | { ok: false; failures: readonly ClaimFailure[] } {
    // Tenant Guard first
    const enrollment = this._enrollments.getIn(reader, scope, request.enrollmentId);
    const policy = this._catalog.getIn(reader, scope, enrollment.policyId);
    const entryId = request.ledgerEntryId;
    const entry =
      entryId === undefined
        ? undefined
        : requireScoped(
            scope,
            reader.getLedgerEntry(entryId),
            { type: "ledger entry", id: entryId },
            () => new ClaimError("TRANSACTION_NOT_FOUND", `Ledger entry "${entryId}" not found`),
          );

    // Shape
    if (isBlank(request.subjectId)) {
      throw new ClaimError("INVALID_CLAIM", "subjectId is required");
    }
    if (isBlank(request.description)) {
      throw new ClaimError("INVALID_CLAIM", "A description of the incident is required");
    }
    const incidentMs = Date.parse(request.incidentDate);
    if (Number.isNaN(incidentMs)) {
      throw new ClaimError("INVALID_CLAIM", `incidentDate is not a valid date: "${request.incidentDate}"`);
    }
    const incidentDate = new Date(incidentMs).toISOString();

    const base = {
      id: this._generateId(),
      tenantId: scope.tenantId,
      enrollmentId: enrollment.id,
      policyId: policy.id,
      subjectId: request.subjectId,
      incidentDate,
      filedAt: now,
      description: request.description.trim(),
      comments: request.comments,
      status: "pending",
    } as const;

    let claim: Claim;
    if (policy.claimKind === "monetary") {
      if (entry === undefined) {
        throw new ClaimError("INVALID_CLAIM", "ledgerEntryId is required for a monetary policy");
      }
      const requestedAmount =
        request.requestedAmount === undefined ? undefined : positiveAmount(request.requestedAmount);
      if (requestedAmount === undefined) {
        throw new ClaimError("INVALID_CLAIM", "requestedAmount must be a positive amount");
      }
      const holder = reader.findActiveClaimByLedgerEntry(entry.id);
      if (holder !== undefined) {
        throw new ClaimError(
          "TRANSACTION_ALREADY_CLAIMED",
          `Ledger entry "${entry.id}" already has an active claim`,
        );
      }
      claim = { ...base, kind: "monetary", ledgerEntryId: entry.id, requestedAmount };
    } else {
      const item = request.item;
      if (item === undefined || isBlank(item)) {
        throw new ClaimError("INVALID_CLAIM", "item is required for an in-kind policy");
      }
      claim = { ...base, kind: "in_kind", item: item.trim() };
    }

    // Business rules, accumulated
    const failures: ClaimFailure[] = [...validateForClaims(policy)];

    if (isBefore(now, enrollment.coverageStartsAt)) {
      failures.push(
        failure("COVERAGE_NOT_STARTED", `Coverage starts at ${enrollment.coverageStartsAt}`),
      );
    }

    if (isBefore(now, incidentDate)) {
      failures.push(failure("INCIDENT_IN_FUTURE", `Incident date ${incidentDate} is in the future`));
    } else {
      const daysSince = wholeDaysBetween(incidentDate, now);
      if (daysSince > policy.claimTimeLimitDays) {
        failures.push(
          failure(
            "CLAIM_WINDOW_EXPIRED",
            `Claims must be filed within ${String(policy.claimTimeLimitDays)} days of the incident (${String(daysSince)} days have passed)`,
          ),
        );
      }
    }

    failures.push(...this._limitFailures(reader, scope, claim, policy, now));
    failures.push(...this._enrollmentFailures(claim, enrollment));
    if (claim.kind === "monetary") {
      failures.push(...this._entryFailures(claim, { enrollment, policy, entry }));
    }

    return failures.length > 0 ? { ok: false, failures } : { ok: true, claim };
  }

  /**
   * Load and guard the entities a stored claim is related to.
   */
  private _loadContext(reader: StoreReader, scope: TenantScope, claim: Claim): ClaimContext {
    const enrollment = this._enrollments.getIn(reader, scope, claim.enrollmentId);
    const policy = this._catalog.getIn(reader, scope, claim.policyId);
    let entry: LedgerEntry | undefined;
    if (claim.kind === "monetary") {
      entry = requireScoped(
        scope,
        reader.getLedgerEntry(claim.ledgerEntryId),
        { type: "ledger entry", id: claim.ledgerEntryId },
        () => new ClaimError("TRANSACTION_NOT_FOUND", `Ledger entry "${claim.ledgerEntryId}" not found`),
      );
    }
    guardRelation(scope, [
      [claim, { type: "claim", id: claim.id }],
      [enrollment, { type: "enrollment", id: enrollment.id }],
      [policy, { type: "policy", id: policy.id }],
    ]);
    return { enrollment, policy, entry };
  }

  private _approvalFailures(
    reader: StoreReader,
    scope: TenantScope,
    claim: Claim,
    context: ClaimContext,
    approvedAmount: string | undefined,
    now: string,
  ): ClaimFailure[] {
    const failures: ClaimFailure[] = [...validateForClaims(context.policy)];

    if (claim.kind === "monetary") {
      failures.push(...this._entryFailures(claim, context));
    }
    failures.push(...this._enrollmentFailures(claim, context.enrollment));
    failures.push(...this._limitFailures(reader, scope, claim, context.policy, now));

    if (claim.kind === "monetary") {
      if (approvedAmount === undefined) {
        failures.push(failure("INVALID_APPROVED_AMOUNT", "Approved amount must be a positive amount"));
      } else {
        failures.push(...this._payoutFailures(reader, scope, claim, context, approvedAmount, now));
      }
    }
    return failures;
  }

  /** Linked-entry checks: void flag and ownership. */
  private _entryFailures(claim: MonetaryClaim, context: ClaimContext): ClaimFailure[] {
    const failures: ClaimFailure[] = [];
    const entry = context.entry;
    if (entry === undefined) return failures;
    if (entry.voided) {
      failures.push(
        failure("LINKED_TRANSACTION_VOIDED", `Ledger entry "${entry.id}" has been voided`),
      );
    }
    if (entry.subjectId !== claim.subjectId) {
      failures.push(
        failure("OWNERSHIP_MISMATCH", `Ledger entry "${entry.id}" does not belong to the claimant`),
      );
    }
    return failures;
  }

  /** Enrollment checks: ownership, status, payment state. */
  private _enrollmentFailures(claim: Claim, enrollment: Enrollment): ClaimFailure[] {
    const failures: ClaimFailure[] = [];
    if (enrollment.subjectId !== claim.subjectId) {
      failures.push(
        failure("OWNERSHIP_MISMATCH", `Enrollment "${enrollment.id}" does not belong to the claimant`),
      );
    }
    if (enrollment.status !== "active") {
      failures.push(
        failure("ENROLLMENT_NOT_ACTIVE", `Enrollment "${enrollment.id}" is ${enrollment.status}`),
      );
    }
    if (!enrollment.paymentCurrent) {
      failures.push(failure("PAYMENT_NOT_CURRENT", "Premium payments are not current"));
    }
    return failures;
  }

  /** Approved or paid claims by this subject under this policy in the rolling period. */
  private _settledInPeriod(
    reader: StoreReader,
    scope: TenantScope,
    claim: Claim,
    policy: Policy,
    now: string,
  ): readonly Claim[] {
    return reader
      .listClaims({
        tenantId: scope.tenantId,
        subjectId: claim.subjectId,
        policyId: policy.id,
        status: ["approved", "paid"],
        filedFrom: periodStart(now, policy.maxClaimsPeriod),
      })
      .filter((settled) => settled.id !== claim.id);
  }

  private _limitFailures(
    reader: StoreReader,
    scope: TenantScope,
    claim: Claim,
    policy: Policy,
    now: string,
  ): ClaimFailure[] {
    if (policy.maxClaimsCount === null) return [];
    const count = this._settledInPeriod(reader, scope, claim, policy, now).length;
    if (count < policy.maxClaimsCount) return [];
    return [
      failure(
        "CLAIM_LIMIT_EXCEEDED",
        `Limit of ${String(policy.maxClaimsCount)} claim(s) per ${policy.maxClaimsPeriod} reached`,
      ),
    ];
  }

  private _payoutFailures(
    reader: StoreReader,
    scope: TenantScope,
    claim: MonetaryClaim,
    context: ClaimContext,
    approvedAmount: string,
    now: string,
  ): ClaimFailure[] {
    const failures: ClaimFailure[] = [];
    const { policy, entry } = context;

    if (policy.maxClaimAmount !== null && compareAmounts(approvedAmount, policy.maxClaimAmount) > 0) {
      failures.push(
        failure(
          "PAYOUT_CAP_EXCEEDED",
          `Approved amount ${approvedAmount} exceeds the policy maximum of ${policy.maxClaimAmount}`,
        ),
      );
    }
    if (entry !== undefined) {
      const base = absAmount(entry.amount);
      if (compareAmounts(approvedAmount, base) > 0) {
        failures.push(
          failure(
            "PAYOUT_CAP_EXCEEDED",
            `Approved amount ${approvedAmount} exceeds the linked entry amount of ${base}`,
          ),
        );
      }
    }

    if (policy.maxPayoutPerPeriod !== null) {
      const paidSoFar = addAmounts(
        ...this._settledInPeriod(reader, scope, claim, policy, now).map((settled) =>
          settled.kind === "monetary" ? settled.approvedAmount ?? "0" : "0",
        ),
      );
      const total = addAmounts(paidSoFar, approvedAmount);
      if (compareAmounts(total, policy.maxPayoutPerPeriod) > 0) {
        failures.push(
          failure(
            "PERIOD_PAYOUT_CAP_EXCEEDED",
            `Payouts this ${policy.maxClaimsPeriod} would reach ${total}, above the cap of ${policy.maxPayoutPerPeriod}`,
          ),
        );
      }
    }
    return failures;
  }

  /**
   * Append the payout entry and move an approved claim to paid, inside
   * the caller's transaction.
   */
  private _payIn(
    tx: StoreTransaction,
    scope: TenantScope,
    claim: MonetaryClaim & { readonly approvedAmount: string },
  ): { claim: MonetaryClaim; payoutEntry: LedgerEntry } {
    assertTransition(claim, "paid");
    const payoutEntry = this._ledger.appendIn(tx, scope, {
      tenantId: claim.tenantId,
      subjectId: claim.subjectId,
      amount: claim.approvedAmount,
      bucket: "checking",
      kind: "insurance_payout",
      description: `Insurance payout for claim ${claim.id}`,
      correlationId: claim.id,
    });
    const paid: MonetaryClaim = { ...claim, status: "paid", payoutEntryId: payoutEntry.id };
    tx.updateClaim(paid);
    return { claim: paid, payoutEntry };
  }
}
