/**
 * Policy Catalog: the insurance policies a teacher offers.
 *
 * Read-mostly. A policy becomes locked once any claim has been filed
 * against it: from then on only deactivation is allowed.
 *
 * Configuration that would make claims unsound (negative waiting period,
 * negative caps) is accepted here and reported at claim time through
 * validateForClaims(). Day counts are bounded by MAX_POLICY_DAYS either
 * way, so every date derived from a policy stays a plain ISO timestamp.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Policy, TenantScope } from "@classbank/types";
import type { EconomyStore, StoreReader } from "@classbank/store";
import { guardWrite, requireScoped } from "@classbank/store";
import {
  applyDiscount,
  isNegative,
  LedgerError,
  normalizeAmount,
  withIntegrityLog,
} from "@classbank/ledger";
import type { ClaimFailure } from "./errors.js";
import { failure, isIntegrityFailure, PolicyError } from "./errors.js";
import type { EngineOptions, PolicyInput, PolicyPatch, PolicyQuery } from "./types.js";

// =============================================================================
// Defaults
// =============================================================================

const POLICY_DEFAULTS = {
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
} as const satisfies Partial<Policy>;

/** Largest magnitude any day count on a policy may take (ten years). */
export const MAX_POLICY_DAYS = 3650;

// =============================================================================
// Pure rules
// =============================================================================

/**
 * Check the parts of a policy that claims depend on.
 */
export function validateForClaims(policy: Policy): ClaimFailure[] {
  const failures: ClaimFailure[] = [];
  if (policy.waitingPeriodDays < 0) {
    failures.push(
      failure(
        "INVALID_POLICY_CONFIG",
        `Policy "${policy.title}" has a negative waiting period (${String(policy.waitingPeriodDays)} days)`,
      ),
    );
  }
  if (policy.maxClaimAmount !== null && isNegative(policy.maxClaimAmount)) {
    failures.push(
      failure(
        "INVALID_POLICY_CONFIG",
        `Policy "${policy.title}" has a negative maximum claim amount (${policy.maxClaimAmount})`,
      ),
    );
  }
  if (policy.maxPayoutPerPeriod !== null && isNegative(policy.maxPayoutPerPeriod)) {
    failures.push(
      failure(
        "INVALID_POLICY_CONFIG",
        `Policy "${policy.title}" has a negative payout cap per period (${policy.maxPayoutPerPeriod})`,
      ),
    );
  }
  return failures;
}

/**
 * Premium a subject pays for a policy, given the policies they already
 * hold active enrollments in. The bundle discount applies when any of
 * those is linked from this policy's bundle.
 */
export function computePremium(policy: Policy, activePolicyIds: readonly string[]): string {
  const bundle = policy.bundle;
  if (bundle === null || !bundle.policyIds.some((id) => activePolicyIds.includes(id))) {
    return normalizeAmount(policy.premium);
  }
  return applyDiscount(policy.premium, bundle.discountPercent, bundle.discountAmount);
}

function checkAmount(value: string, field: string): string {
  try {
    return normalizeAmount(value);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new PolicyError("INVALID_POLICY", `${field}: ${err.message}`);
    }
    throw err;
  }
}

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

function mergePatch(existing: Policy, patch: PolicyPatch): PolicyInput {
  return {
    code: pick(patch.code, existing.code),
    title: pick(patch.title, existing.title),
    description: pick(patch.description, existing.description),
    premium: pick(patch.premium, existing.premium),
    chargeFrequency: pick(patch.chargeFrequency, existing.chargeFrequency),
    autopay: pick(patch.autopay, existing.autopay),
    waitingPeriodDays: pick(patch.waitingPeriodDays, existing.waitingPeriodDays),
    claimTimeLimitDays: pick(patch.claimTimeLimitDays, existing.claimTimeLimitDays),
    maxClaimsCount: pick(patch.maxClaimsCount, existing.maxClaimsCount),
    maxClaimsPeriod: pick(patch.maxClaimsPeriod, existing.maxClaimsPeriod),
    maxClaimAmount: pick(patch.maxClaimAmount, existing.maxClaimAmount),
    maxPayoutPerPeriod: pick(patch.maxPayoutPerPeriod, existing.maxPayoutPerPeriod),
    claimKind: pick(patch.claimKind, existing.claimKind),
    repurchase: pick(patch.repurchase, existing.repurchase),
    autoCancelNonpayDays: pick(patch.autoCancelNonpayDays, existing.autoCancelNonpayDays),
    bundle: pick(patch.bundle, existing.bundle),
  };
}

function checkWholeNumber(value: number, field: string): number {
  if (!Number.isInteger(value)) {
    throw new PolicyError("INVALID_POLICY", `${field} must be a whole number, got ${String(value)}`);
  }
  return value;
}

function checkDayCount(value: number, field: string): number {
  checkWholeNumber(value, field);
  if (Math.abs(value) > MAX_POLICY_DAYS) {
    throw new PolicyError(
      "INVALID_POLICY",
      `${field} must be within ${String(MAX_POLICY_DAYS)} days, got ${String(value)}`,
    );
  }
  return value;
}

// =============================================================================
// Catalog
// =============================================================================

export class PolicyCatalog {
  private readonly _store: EconomyStore;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _logger: Logger;

  constructor(store: EconomyStore, options?: EngineOptions) {
    this._store = store;
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {PolicyError} INVALID_POLICY for malformed fields,
   *   POLICY_NOT_FOUND for an unknown bundled policy
   */
  async define(scope: TenantScope, input: PolicyInput): Promise<Policy> {
    return withIntegrityLog(
      this._logger,
      scope,
      "define",
      async () => {
        const now = this._clock().toISOString();
        return this._store.transaction((tx) => {
          const policy = this._build(tx, scope, input, {
            id: this._generateId(),
            tenantId: scope.tenantId,
            active: true,
            createdAt: now,
            updatedAt: now,
          });
          guardWrite(scope, policy, { type: "policy", id: policy.id });
          tx.insertPolicy(policy);
          this._logger.info({ tenantId: scope.tenantId, policyId: policy.id }, "policy defined");
          return policy;
        });
      },
      isIntegrityFailure,
    );
  }

  /**
   * @throws {PolicyError} POLICY_LOCKED once claims exist against the policy
   */
  async update(scope: TenantScope, policyId: string, patch: PolicyPatch): Promise<Policy> {
    return withIntegrityLog(
      this._logger,
      scope,
      "update",
      async () => {
        const now = this._clock().toISOString();
        return this._store.transaction((tx) => {
          const existing = this.getIn(tx, scope, policyId);
          const claims = tx.listClaims({ tenantId: scope.tenantId, policyId });
          if (claims.length > 0) {
            throw new PolicyError(
              "POLICY_LOCKED",
              `Policy "${policyId}" has ${String(claims.length)} claim(s) and can only be deactivated`,
            );
          }

          const updated = this._build(tx, scope, mergePatch(existing, patch), {
            id: existing.id,
            tenantId: existing.tenantId,
            active: existing.active,
            createdAt: existing.createdAt,
            updatedAt: now,
          });
          tx.updatePolicy(updated);
          this._logger.info({ tenantId: scope.tenantId, policyId }, "policy updated");
          return updated;
        });
      },
      isIntegrityFailure,
    );
  }

  /**
   * Stop offering a policy. Existing enrollments and claims are unaffected.
   */
  async deactivate(scope: TenantScope, policyId: string): Promise<Policy> {
    return withIntegrityLog(
      this._logger,
      scope,
      "deactivate",
      async () => {
        const now = this._clock().toISOString();
        return this._store.transaction((tx) => {
          const existing = this.getIn(tx, scope, policyId);
          if (!existing.active) {
            return existing;
          }
          const updated: Policy = { ...existing, active: false, updatedAt: now };
          tx.updatePolicy(updated);
          this._logger.info({ tenantId: scope.tenantId, policyId }, "policy deactivated");
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
   * @throws {PolicyError} POLICY_NOT_FOUND
   */
  async get(scope: TenantScope, policyId: string): Promise<Policy> {
    return withIntegrityLog(
      this._logger,
      scope,
      "get",
      () => this._store.read((reader) => this.getIn(reader, scope, policyId)),
      isIntegrityFailure,
    );
  }

  /**
   * Same as get(), against a caller's reader or transaction.
   */
  getIn(reader: StoreReader, scope: TenantScope, policyId: string): Policy {
    return requireScoped(
      scope,
      reader.getPolicy(policyId),
      { type: "policy", id: policyId },
      () => new PolicyError("POLICY_NOT_FOUND", `Policy "${policyId}" not found`),
    );
  }

  async list(scope: TenantScope, query?: PolicyQuery): Promise<readonly Policy[]> {
    return this._store.read((reader) =>
      reader.listPolicies({ tenantId: scope.tenantId, activeOnly: query?.activeOnly }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _build(
    reader: StoreReader,
    scope: TenantScope,
    input: PolicyInput,
    identity: Pick<Policy, "id" | "tenantId" | "active" | "createdAt" | "updatedAt">,
  ): Policy {
    if (typeof input.title !== "string" || input.title.trim() === "") {
      throw new PolicyError("INVALID_POLICY", "Policy title must be a non-empty string");
    }
    const premium = checkAmount(input.premium, "premium");
    if (isNegative(premium)) {
      throw new PolicyError("INVALID_POLICY", `premium must not be negative, got ${premium}`);
    }

    const maxClaimAmount = input.maxClaimAmount ?? POLICY_DEFAULTS.maxClaimAmount;
    const maxPayoutPerPeriod = input.maxPayoutPerPeriod ?? POLICY_DEFAULTS.maxPayoutPerPeriod;
    const maxClaimsCount = input.maxClaimsCount ?? POLICY_DEFAULTS.maxClaimsCount;
    if (maxClaimsCount !== null && (checkWholeNumber(maxClaimsCount, "maxClaimsCount") < 0)) {
      throw new PolicyError("INVALID_POLICY", "maxClaimsCount must not be negative");
    }

    const repurchase = input.repurchase ?? POLICY_DEFAULTS.repurchase;
    if (repurchase.mode === "cooldown" && checkDayCount(repurchase.waitDays, "repurchase.waitDays") < 0) {
      throw new PolicyError("INVALID_POLICY", "repurchase.waitDays must not be negative");
    }

    const bundle = input.bundle ?? POLICY_DEFAULTS.bundle;
    if (bundle !== null) {
      const percent = bundle.discountPercent;
      if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
        throw new PolicyError(
          "INVALID_POLICY",
          `bundle.discountPercent must be between 0 and 100, got ${String(percent)}`,
        );
      }
      if (isNegative(checkAmount(bundle.discountAmount, "bundle.discountAmount"))) {
        throw new PolicyError(
          "INVALID_POLICY",
          `bundle.discountAmount must not be negative, got ${bundle.discountAmount}`,
        );
      }
      for (const linkedId of bundle.policyIds) {
        if (linkedId === identity.id) {
          throw new PolicyError("INVALID_POLICY", "A policy cannot be bundled with itself");
        }
        this.getIn(reader, scope, linkedId);
      }
    }

    return {
      id: identity.id,
      tenantId: identity.tenantId,
      code: input.code,
      title: input.title.trim(),
      description: input.description,
      premium,
      chargeFrequency: input.chargeFrequency ?? POLICY_DEFAULTS.chargeFrequency,
      autopay: input.autopay ?? POLICY_DEFAULTS.autopay,
      waitingPeriodDays: checkDayCount(
        input.waitingPeriodDays ?? POLICY_DEFAULTS.waitingPeriodDays,
        "waitingPeriodDays",
      ),
      claimTimeLimitDays: checkDayCount(
        input.claimTimeLimitDays ?? POLICY_DEFAULTS.claimTimeLimitDays,
        "claimTimeLimitDays",
      ),
      maxClaimsCount,
      maxClaimsPeriod: input.maxClaimsPeriod ?? POLICY_DEFAULTS.maxClaimsPeriod,
      maxClaimAmount: maxClaimAmount === null ? null : checkAmount(maxClaimAmount, "maxClaimAmount"),
      maxPayoutPerPeriod:
        maxPayoutPerPeriod === null ? null : checkAmount(maxPayoutPerPeriod, "maxPayoutPerPeriod"),
      claimKind: input.claimKind ?? POLICY_DEFAULTS.claimKind,
      repurchase,
      autoCancelNonpayDays: checkDayCount(
        input.autoCancelNonpayDays ?? POLICY_DEFAULTS.autoCancelNonpayDays,
        "autoCancelNonpayDays",
      ),
      bundle:
        bundle === null
          ? null
          : {
              policyIds: [...bundle.policyIds],
              discountPercent: bundle.discountPercent,
              discountAmount: checkAmount(bundle.discountAmount, "bundle.discountAmount"),
            },
      active: identity.active,
      createdAt: identity.createdAt,
      updatedAt: identity.updatedAt,
    };
  }
}
