/**
 * @classbank/ledger: Types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Stored entries change only through void()
 * - Fail-closed: invalid entries throw, never silently succeed
 */

import type { AccountBucket, LedgerEntry, LedgerEntryKind } from "@classbank/types";
import type { Logger } from "pino";

// ─── Sign Rules ──────────────────────────────────────────────────────────

/** Required sign of an entry amount, by kind. */
export type AmountSign = "positive" | "negative" | "nonzero" | "any";

/**
 * Credits add to a bucket, debits take from it. Transfers carry either
 * sign (one leg each); adjustments are the only kind allowed to be zero.
 */
export const KIND_SIGN: Readonly<Record<LedgerEntryKind, AmountSign>> = {
  deposit: "positive",
  payroll: "positive",
  bonus: "positive",
  insurance_payout: "positive",
  withdrawal: "negative",
  purchase: "negative",
  fee: "negative",
  rent: "negative",
  insurance_premium: "negative",
  transfer: "nonzero",
  adjustment: "any",
} as const;

// ─── Inputs ──────────────────────────────────────────────────────────────

export interface BalanceOptions {
  /** Exclude entries whose availableAt is still in the future. */
  readonly availableOnly?: boolean | undefined;
}

export interface EntryQuery {
  readonly subjectId?: string | undefined;
  readonly bucket?: AccountBucket | undefined;
  readonly kind?: LedgerEntryKind | undefined;
  readonly includeVoided?: boolean | undefined;
  readonly fromCreatedAt?: string | undefined;
  readonly toCreatedAt?: string | undefined;
}

/**
 * The two linked entries of a bucket-to-bucket transfer.
 */
export interface TransferResult {
  readonly correlationId: string;
  readonly debit: LedgerEntry;
  readonly credit: LedgerEntry;
}

export interface LedgerStoreOptions {
  /** Defaults to the system clock. */
  readonly clock?: (() => Date) | undefined;
  /** Defaults to crypto.randomUUID. */
  readonly generateId?: (() => string) | undefined;
  /** Defaults to a silent logger. */
  readonly logger?: Logger | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ENTRY"
  | "ENTRY_NOT_FOUND"
  | "ALREADY_VOIDED"
  | "INSUFFICIENT_FUNDS";

/**
 * Structured error from the ledger engine.
 * Always thrown: never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
