/**
 * Ledger Types
 *
 * Balance-affecting records for the classroom economy.
 *
 * Rules:
 * - All amounts are decimal strings with two places ("12.50", "-3.00")
 * - Entries are append-only; only the void fields ever change
 * - A balance is derived by summing non-void entries, never stored
 */

import type { TenantScoped } from "./tenant.js";

/**
 * The two balance buckets a student holds.
 */
export type AccountBucket = "checking" | "savings";

/**
 * What produced an entry.
 *
 * Credits: deposit, payroll, bonus, insurance_payout.
 * Debits: withdrawal, purchase, fee, rent, insurance_premium.
 * Either sign: transfer, adjustment.
 */
export type LedgerEntryKind =
  | "deposit"
  | "withdrawal"
  | "payroll"
  | "bonus"
  | "purchase"
  | "fee"
  | "rent"
  | "transfer"
  | "insurance_premium"
  | "insurance_payout"
  | "adjustment";

/**
 * A single immutable balance-affecting record.
 */
export interface LedgerEntry extends TenantScoped {
  /** Unique entry identifier */
  readonly id: string;

  /** The student whose balance this entry affects */
  readonly subjectId: string;

  /** Signed decimal amount: positive credits, negative debits */
  readonly amount: string;

  readonly bucket: AccountBucket;

  readonly kind: LedgerEntryKind;

  readonly description?: string | undefined;

  /** ISO 8601 timestamp of creation */
  readonly createdAt: string;

  /** ISO 8601 timestamp after which the funds count as available */
  readonly availableAt: string;

  /** One-way reversal flag */
  readonly voided: boolean;

  readonly voidedAt?: string | undefined;

  /** Actor who voided the entry */
  readonly voidedBy?: string | undefined;

  /** Groups entries written together (e.g. both legs of a transfer) */
  readonly correlationId?: string | undefined;
}

/**
 * Input for a new ledger entry. Identity, timestamps and the void
 * fields are assigned by the ledger.
 */
export interface NewLedgerEntry extends TenantScoped {
  readonly subjectId: string;
  readonly amount: string;
  readonly bucket: AccountBucket;
  readonly kind: LedgerEntryKind;
  readonly description?: string | undefined;
  /** Defaults to the creation time */
  readonly availableAt?: string | undefined;
  readonly correlationId?: string | undefined;
}
