/**
 * @classbank/store: Core types.
 *
 * Defines the storage contract the ledger and insurance packages are
 * written against.
 *
 * Design principles:
 * - Reads outside a transaction see committed state only
 * - A transaction is a serializable unit: every staged write commits
 *   together or none does
 * - Integrity constraints live here, not in callers: primary keys,
 *   foreign keys, and the one-active-claim-per-ledger-entry index
 * - Rows are never deleted
 */

import type {
  AccountBucket,
  Claim,
  ClaimStatus,
  Enrollment,
  EnrollmentStatus,
  LedgerEntry,
  LedgerEntryKind,
  Policy,
} from "@classbank/types";

// =============================================================================
// Tables
// =============================================================================

export type TableName = "ledger_entries" | "policies" | "enrollments" | "claims";

/** Row type stored in each table. */
export interface TableRows {
  ledger_entries: LedgerEntry;
  policies: Policy;
  enrollments: Enrollment;
  claims: Claim;
}

/**
 * Partial unique index on claims.ledgerEntryId where status != 'rejected'.
 */
export const ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT = "claims_ledger_entry_active_uq";

// =============================================================================
// Filters
// =============================================================================

export interface LedgerEntryFilter {
  readonly tenantId: string;
  readonly subjectId?: string | undefined;
  readonly bucket?: AccountBucket | undefined;
  readonly kind?: LedgerEntryKind | undefined;
  /** Default: true */
  readonly includeVoided?: boolean | undefined;
  readonly fromCreatedAt?: string | undefined;
  readonly toCreatedAt?: string | undefined;
}

export interface PolicyFilter {
  readonly tenantId: string;
  readonly activeOnly?: boolean | undefined;
}

export interface EnrollmentFilter {
  readonly tenantId: string;
  readonly subjectId?: string | undefined;
  readonly policyId?: string | undefined;
  readonly status?: EnrollmentStatus | readonly EnrollmentStatus[] | undefined;
}

export interface ClaimFilter {
  readonly tenantId: string;
  readonly subjectId?: string | undefined;
  readonly policyId?: string | undefined;
  readonly enrollmentId?: string | undefined;
  readonly status?: ClaimStatus | readonly ClaimStatus[] | undefined;
  /** Inclusive lower bound on filedAt */
  readonly filedFrom?: string | undefined;
}

// =============================================================================
// Reader / Transaction
// =============================================================================

/**
 * Read access. Lookups by ID are not tenant-scoped here; callers pass the
 * result through the Tenant Guard.
 */
export interface StoreReader {
  getLedgerEntry(id: string): LedgerEntry | undefined;
  listLedgerEntries(filter: LedgerEntryFilter): readonly LedgerEntry[];

  getPolicy(id: string): Policy | undefined;
  listPolicies(filter: PolicyFilter): readonly Policy[];

  getEnrollment(id: string): Enrollment | undefined;
  listEnrollments(filter: EnrollmentFilter): readonly Enrollment[];

  getClaim(id: string): Claim | undefined;
  listClaims(filter: ClaimFilter): readonly Claim[];

  /**
   * The claim (if any) holding the active-claim index slot for an entry.
   * Rejected claims never hold the slot.
   */
  findActiveClaimByLedgerEntry(ledgerEntryId: string): Claim | undefined;
}

/**
 * Read/write access inside a transaction. Writes are staged and become
 * visible to other readers only when the transaction commits.
 */
export interface StoreTransaction extends StoreReader {
  insertLedgerEntry(entry: LedgerEntry): void;
  /** The only permitted mutation of a ledger row. */
  voidLedgerEntry(id: string, voidedAt: string, voidedBy: string): LedgerEntry;

  insertPolicy(policy: Policy): void;
  updatePolicy(policy: Policy): void;

  insertEnrollment(enrollment: Enrollment): void;
  updateEnrollment(enrollment: Enrollment): void;

  insertClaim(claim: Claim): void;
  updateClaim(claim: Claim): void;
}

/**
 * A staged write, reported to the `beforeWrite` hook.
 */
export interface WriteOperation {
  readonly table: TableName;
  readonly op: "insert" | "update";
  readonly id: string;
  readonly row: TableRows[TableName];
}

export interface StoreHealth {
  readonly ok: boolean;
  readonly pendingTransactions: number;
}

/**
 * Transactional storage for the economy core.
 */
export interface EconomyStore {
  /**
   * Run a read against committed state.
   */
  read<T>(fn: (reader: StoreReader) => T): Promise<T>;

  /**
   * Run `fn` as one atomic unit. Transactions are serialized; if `fn`
   * throws or rejects, nothing it staged is kept and the error propagates.
   */
  transaction<T>(fn: (tx: StoreTransaction) => T | Promise<T>): Promise<T>;

  health(): Promise<StoreHealth>;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "DUPLICATE_KEY"
  | "FOREIGN_KEY_VIOLATION"
  | "UNIQUE_VIOLATION"
  | "ROW_NOT_FOUND"
  | "IMMUTABLE_ROW"
  | "TRANSACTION_CLOSED";

/**
 * Low-level storage failure. Domain packages translate the codes they
 * expect (e.g. UNIQUE_VIOLATION on the active-claim index) into their
 * own errors; anything else propagates as-is.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly table?: TableName,
    public readonly constraint?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
