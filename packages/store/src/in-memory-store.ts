/**
 * @classbank/store: In-memory EconomyStore implementation.
 *
 * Stores rows in plain Maps. Suitable for:
 * - Unit and integration tests
 * - Single-process deployments and development
 *
 * Not durable (all state lost on process exit).
 *
 * Properties:
 * - Transactions run one at a time, in call order (promise queue)
 * - Writes are staged in an overlay and applied to committed tables
 *   only after the transaction body resolves
 * - Reads outside a transaction never see staged writes
 * - Constraints are checked at write time against committed + staged rows
 */

import type {
  Claim,
  Enrollment,
  LedgerEntry,
  MonetaryClaim,
  Policy,
} from "@classbank/types";
import type {
  ClaimFilter,
  EconomyStore,
  EnrollmentFilter,
  LedgerEntryFilter,
  PolicyFilter,
  StoreHealth,
  StoreReader,
  StoreTransaction,
  TableName,
  TableRows,
  WriteOperation,
} from "./types.js";
import { ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT, StoreError } from "./types.js";

type Tables = { [K in TableName]: Map<string, TableRows[K]> };

function createTables(): Tables {
  return {
    ledger_entries: new Map(),
    policies: new Map(),
    enrollments: new Map(),
    claims: new Map(),
  };
}

/**
 * Source of rows for a reader: committed tables, or committed tables seen
 * through a transaction's staged overlay.
 */
interface TableView {
  get<K extends TableName>(table: K, id: string): TableRows[K] | undefined;
  all<K extends TableName>(table: K): TableRows[K][];
}

class CommittedView implements TableView {
  constructor(private readonly _tables: Tables) {}

  get<K extends TableName>(table: K, id: string): TableRows[K] | undefined {
    const rows: Map<string, TableRows[K]> = this._tables[table];
    return rows.get(id);
  }

  all<K extends TableName>(table: K): TableRows[K][] {
    const rows: Map<string, TableRows[K]> = this._tables[table];
    return [...rows.values()];
  }
}

class OverlayView implements TableView {
  readonly staged: Tables = createTables();

  constructor(private readonly _committed: Tables) {}

  get<K extends TableName>(table: K, id: string): TableRows[K] | undefined {
    const staged: Map<string, TableRows[K]> = this.staged[table];
    const committed: Map<string, TableRows[K]> = this._committed[table];
    return staged.get(id) ?? committed.get(id);
  }

  all<K extends TableName>(table: K): TableRows[K][] {
    const committed: Map<string, TableRows[K]> = this._committed[table];
    const staged: Map<string, TableRows[K]> = this.staged[table];
    const merged = new Map(committed);
    for (const [id, row] of staged) {
      merged.set(id, row);
    }
    return [...merged.values()];
  }

  stage<K extends TableName>(table: K, id: string, row: TableRows[K]): void {
    const staged: Map<string, TableRows[K]> = this.staged[table];
    staged.set(id, row);
  }

  applyTo(target: Tables): void {
    applyTable(target.ledger_entries, this.staged.ledger_entries);
    applyTable(target.policies, this.staged.policies);
    applyTable(target.enrollments, this.staged.enrollments);
    applyTable(target.claims, this.staged.claims);
  }
}

function applyTable<Row>(target: Map<string, Row>, staged: Map<string, Row>): void {
  for (const [id, row] of staged) {
    target.set(id, row);
  }
}

function matchesStatus(
  status: string,
  wanted: string | readonly string[] | undefined,
): boolean {
  if (wanted === undefined) return true;
  if (typeof wanted === "string") return status === wanted;
  return wanted.includes(status);
}

function holdsEntrySlot(claim: Claim): claim is MonetaryClaim {
  return claim.kind === "monetary" && claim.status !== "rejected";
}

// =============================================================================
// Reader
// =============================================================================

class InMemoryReader implements StoreReader {
  constructor(protected readonly view: TableView) {}

  getLedgerEntry(id: string): LedgerEntry | undefined {
    return this.view.get("ledger_entries", id);
  }

  listLedgerEntries(filter: LedgerEntryFilter): readonly LedgerEntry[] {
    const includeVoided = filter.includeVoided ?? true;
    return this.view.all("ledger_entries").filter((entry) => {
      if (entry.tenantId !== filter.tenantId) return false;
      if (filter.subjectId !== undefined && entry.subjectId !== filter.subjectId) return false;
      if (filter.bucket !== undefined && entry.bucket !== filter.bucket) return false;
      if (filter.kind !== undefined && entry.kind !== filter.kind) return false;
      if (!includeVoided && entry.voided) return false;
      const createdMs = Date.parse(entry.createdAt);
      if (filter.fromCreatedAt !== undefined && createdMs < Date.parse(filter.fromCreatedAt)) {
        return false;
      }
      if (filter.toCreatedAt !== undefined && createdMs > Date.parse(filter.toCreatedAt)) {
        return false;
      }
      return true;
    });
  }

  getPolicy(id: string): Policy | undefined {
    return this.view.get("policies", id);
  }

  listPolicies(filter: PolicyFilter): readonly Policy[] {
    return this.view
      .all("policies")
      .filter(
        (policy) =>
          policy.tenantId === filter.tenantId &&
          (filter.activeOnly !== true || policy.active),
      );
  }

  getEnrollment(id: string): Enrollment | undefined {
    return this.view.get("enrollments", id);
  }

  listEnrollments(filter: EnrollmentFilter): readonly Enrollment[] {
    return this.view.all("enrollments").filter((enrollment) => {
      if (enrollment.tenantId !== filter.tenantId) return false;
      if (filter.subjectId !== undefined && enrollment.subjectId !== filter.subjectId) return false;
      if (filter.policyId !== undefined && enrollment.policyId !== filter.policyId) return false;
      return matchesStatus(enrollment.status, filter.status);
    });
  }

  getClaim(id: string): Claim | undefined {
    return this.view.get("claims", id);
  }

  listClaims(filter: ClaimFilter): readonly Claim[] {
    return this.view.all("claims").filter((claim) => {
      if (claim.tenantId !== filter.tenantId) return false;
      if (filter.subjectId !== undefined && claim.subjectId !== filter.subjectId) return false;
      if (filter.policyId !== undefined && claim.policyId !== filter.policyId) return false;
      if (filter.enrollmentId !== undefined && claim.enrollmentId !== filter.enrollmentId) return false;
      if (
        filter.filedFrom !== undefined &&
        Date.parse(claim.filedAt) < Date.parse(filter.filedFrom)
      ) {
        return false;
      }
      return matchesStatus(claim.status, filter.status);
    });
  }

  findActiveClaimByLedgerEntry(ledgerEntryId: string): Claim | undefined {
    return this.view
      .all("claims")
      .find((claim) => holdsEntrySlot(claim) && claim.ledgerEntryId === ledgerEntryId);
  }
}

// =============================================================================
// Transaction
// =============================================================================

class InMemoryTransaction extends InMemoryReader implements StoreTransaction {
  private readonly _overlay: OverlayView;
  private _closed = false;

  constructor(
    committed: Tables,
    private readonly _beforeWrite: ((op: WriteOperation) => void) | undefined,
  ) {
    const overlay = new OverlayView(committed);
    super(overlay);
    this._overlay = overlay;
  }

  // ─── Ledger ─────────────────────────────────────────────────────────

  insertLedgerEntry(entry: LedgerEntry): void {
    this._assertOpen();
    this._assertAbsent("ledger_entries", entry.id);
    this._write("ledger_entries", "insert", entry.id, entry);
  }

  voidLedgerEntry(id: string, voidedAt: string, voidedBy: string): LedgerEntry {
    this._assertOpen();
    const existing = this._requireRow("ledger_entries", id);
    if (existing.voided) {
      throw new StoreError(
        "IMMUTABLE_ROW",
        `Ledger entry "${id}" is already voided`,
        "ledger_entries",
      );
    }
    const voided: LedgerEntry = { ...existing, voided: true, voidedAt, voidedBy };
    this._write("ledger_entries", "update", id, voided);
    return voided;
  }

  // ─── Policies ───────────────────────────────────────────────────────

  insertPolicy(policy: Policy): void {
    this._assertOpen();
    this._assertAbsent("policies", policy.id);
    this._write("policies", "insert", policy.id, policy);
  }

  updatePolicy(policy: Policy): void {
    this._assertOpen();
    const existing = this._requireRow("policies", policy.id);
    this._assertUnchanged("policies", policy.id, existing.tenantId, policy.tenantId, "tenantId");
    this._write("policies", "update", policy.id, policy);
  }

  // ─── Enrollments ────────────────────────────────────────────────────

  insertEnrollment(enrollment: Enrollment): void {
    this._assertOpen();
    this._assertAbsent("enrollments", enrollment.id);
    this._assertReference("enrollments", "policies", enrollment.policyId);
    this._write("enrollments", "insert", enrollment.id, enrollment);
  }

  updateEnrollment(enrollment: Enrollment): void {
    this._assertOpen();
    const existing = this._requireRow("enrollments", enrollment.id);
    this._assertUnchanged("enrollments", enrollment.id, existing.tenantId, enrollment.tenantId, "tenantId");
    this._assertUnchanged("enrollments", enrollment.id, existing.subjectId, enrollment.subjectId, "subjectId");
    this._assertUnchanged("enrollments", enrollment.id, existing.policyId, enrollment.policyId, "policyId");
    this._write("enrollments", "update", enrollment.id, enrollment);
  }

  // ─── Claims ─────────────────────────────────────────────────────────

  insertClaim(claim: Claim): void {
    this._assertOpen();
    this._assertAbsent("claims", claim.id);
    this._assertReference("claims", "enrollments", claim.enrollmentId);
    this._assertReference("claims", "policies", claim.policyId);
    if (claim.kind === "monetary") {
      this._assertReference("claims", "ledger_entries", claim.ledgerEntryId);
    }
    this._assertEntrySlotFree(claim);
    this._write("claims", "insert", claim.id, claim);
  }

  updateClaim(claim: Claim): void {
    this._assertOpen();
    const existing = this._requireRow("claims", claim.id);
    this._assertUnchanged("claims", claim.id, existing.tenantId, claim.tenantId, "tenantId");
    this._assertUnchanged("claims", claim.id, existing.subjectId, claim.subjectId, "subjectId");
    this._assertUnchanged("claims", claim.id, existing.enrollmentId, claim.enrollmentId, "enrollmentId");
    this._assertUnchanged("claims", claim.id, existing.kind, claim.kind, "kind");
    if (existing.kind === "monetary" && claim.kind === "monetary") {
      this._assertUnchanged("claims", claim.id, existing.ledgerEntryId, claim.ledgerEntryId, "ledgerEntryId");
    }
    this._assertEntrySlotFree(claim);
    this._write("claims", "update", claim.id, claim);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  commit(target: Tables): void {
    this._assertOpen();
    this._closed = true;
    this._overlay.applyTo(target);
  }

  rollback(): void {
    this._closed = true;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _write<K extends TableName>(
    table: K,
    op: WriteOperation["op"],
    id: string,
    row: TableRows[K],
  ): void {
    // Rows are stored as frozen copies; callers never hold a live row.
    const stored: TableRows[K] = { ...row };
    Object.freeze(stored);
    this._beforeWrite?.({ table, op, id, row: stored });
    this._overlay.stage(table, id, stored);
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StoreError("TRANSACTION_CLOSED", "Transaction has already finished");
    }
  }

  private _assertAbsent(table: TableName, id: string): void {
    if (this.view.get(table, id) !== undefined) {
      throw new StoreError("DUPLICATE_KEY", `Row "${id}" already exists in ${table}`, table);
    }
  }

  private _requireRow<K extends TableName>(table: K, id: string): TableRows[K] {
    const row = this.view.get(table, id);
    if (row === undefined) {
      throw new StoreError("ROW_NOT_FOUND", `Row "${id}" does not exist in ${table}`, table);
    }
    return row;
  }

  private _assertReference(table: TableName, referenced: TableName, id: string): void {
    if (this.view.get(referenced, id) === undefined) {
      throw new StoreError(
        "FOREIGN_KEY_VIOLATION",
        `${table} references missing ${referenced} row "${id}"`,
        table,
        `${table}_${referenced}_fk`,
      );
    }
  }

  private _assertUnchanged(
    table: TableName,
    id: string,
    before: string,
    after: string,
    column: string,
  ): void {
    if (before !== after) {
      throw new StoreError(
        "IMMUTABLE_ROW",
        `Column ${column} of ${table} row "${id}" cannot change`,
        table,
      );
    }
  }

  private _assertEntrySlotFree(claim: Claim): void {
    if (!holdsEntrySlot(claim)) return;
    const holder = this.findActiveClaimByLedgerEntry(claim.ledgerEntryId);
    if (holder !== undefined && holder.id !== claim.id) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Ledger entry "${claim.ledgerEntryId}" already has active claim "${holder.id}"`,
        "claims",
        ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT,
      );
    }
  }
}

// =============================================================================
// Store
// =============================================================================

export interface InMemoryEconomyStoreOptions {
  /**
   * Called for every staged write, before it is staged. Throwing aborts
   * the surrounding transaction.
   */
  readonly beforeWrite?: ((op: WriteOperation) => void) | undefined;
}

/**
 * In-memory transactional store.
 */
export class InMemoryEconomyStore implements EconomyStore {
  private readonly _tables: Tables = createTables();
  private readonly _committedView: CommittedView = new CommittedView(this._tables);
  private readonly _beforeWrite: ((op: WriteOperation) => void) | undefined;

  /** Tail of the transaction queue */
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  constructor(options?: InMemoryEconomyStoreOptions) {
    this._beforeWrite = options?.beforeWrite;
  }

  async read<T>(fn: (reader: StoreReader) => T): Promise<T> {
    return fn(new InMemoryReader(this._committedView));
  }

  transaction<T>(fn: (tx: StoreTransaction) => T | Promise<T>): Promise<T> {
    this._pending++;
    const run = async (): Promise<T> => {
      const tx = new InMemoryTransaction(this._tables, this._beforeWrite);
      try {
        const result = await fn(tx);
        tx.commit(this._tables);
        return result;
      } catch (err) {
        tx.rollback();
        throw err;
      } finally {
        this._pending--;
      }
    };

    const result = this._tail.then(run);
    this._tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async health(): Promise<StoreHealth> {
    return { ok: true, pendingTransactions: this._pending };
  }

  /**
   * Number of committed rows per table.
   */
  rowCounts(): Readonly<Record<TableName, number>> {
    return {
      ledger_entries: this._tables.ledger_entries.size,
      policies: this._tables.policies.size,
      enrollments: this._tables.enrollments.size,
      claims: this._tables.claims.size,
    };
  }
}
