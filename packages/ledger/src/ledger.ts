/**
 * @classbank/ledger: Ledger Store.
 *
 * Append-only balance ledger. Once an entry is written only its void
 * flag may change, and only once. Corrections are new entries.
 *
 * API surface:
 * - append() / appendIn(): Validate and record an entry
 * - void(): Mark an entry void (exactly once)
 * - currentBalance() / balanceIn(): Sum of non-void entries for a bucket
 * - getEntry() / listEntries(): Tenant-scoped queries
 * - transfer(): Move funds between a subject's buckets
 *
 * There is NO update() or delete().
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  AccountBucket,
  LedgerEntry,
  NewLedgerEntry,
  TenantScope,
} from "@classbank/types";
import { isAccountBucket, isLedgerEntryKind } from "@classbank/types";
import type { EconomyStore, StoreReader, StoreTransaction } from "@classbank/store";
import { guardWrite, requireScoped } from "@classbank/store";
import { withIntegrityLog } from "./integrity.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  BalanceOptions,
  EntryQuery,
  LedgerStoreOptions,
  TransferResult,
} from "./types.js";
import { KIND_SIGN, LedgerError } from "./types.js";

/**
 * Sum the amounts of non-void entries.
 *
 * With `availableAt` set, entries that become available after that
 * instant are left out.
 */
export function sumEntries(
  entries: readonly LedgerEntry[],
  availableAt?: string,
): string {
  let total = 0n;
  const cutoff = availableAt === undefined ? undefined : Date.parse(availableAt);
  for (const entry of entries) {
    if (entry.voided) continue;
    if (cutoff !== undefined && Date.parse(entry.availableAt) > cutoff) continue;
    total += parseAmount(entry.amount);
  }
  return formatAmount(total);
}

function toTimestamp(value: string, field: string): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new LedgerError("INVALID_ENTRY", `${field} is not a valid timestamp: "${value}"`);
  }
  return new Date(ms).toISOString();
}

/**
 * Append-only ledger over an EconomyStore.
 */
export class LedgerStore {
  private readonly _store: EconomyStore;
  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _logger: Logger;

  constructor(store: EconomyStore, options?: LedgerStoreOptions) {
    this._store = store;
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Validate and record one entry in its own transaction.
   *
   * @throws {TenantGuardError} TENANT_MISMATCH if the entry is tagged
   *   with another tenant
   * @throws {LedgerError} INVALID_AMOUNT, INVALID_ENTRY
   */
  async append(scope: TenantScope, input: NewLedgerEntry): Promise<LedgerEntry> {
    return withIntegrityLog(this._logger, scope, "append", () =>
      this._store.transaction((tx) => this.appendIn(tx, scope, input)),
    );
  }

  /**
   * Same as append(), inside a caller's transaction.
   */
  appendIn(tx: StoreTransaction, scope: TenantScope, input: NewLedgerEntry): LedgerEntry {
    guardWrite(scope, input, { type: "ledger entry", id: "(new)" });

    const entry = this._buildEntry(input);
    tx.insertLedgerEntry(entry);
    this._logger.debug(
      { tenantId: entry.tenantId, entryId: entry.id, kind: entry.kind, amount: entry.amount },
      "ledger entry appended",
    );
    return entry;
  }

  /**
   * Void an entry. A second void of the same entry fails; it is never a
   * silent no-op.
   *
   * @throws {LedgerError} ENTRY_NOT_FOUND, ALREADY_VOIDED
   */
  async void(scope: TenantScope, entryId: string, actor: string): Promise<LedgerEntry> {
    return withIntegrityLog(this._logger, scope, "void", () =>
      this._store.transaction((tx) => {
        const entry = requireScoped(
          scope,
          tx.getLedgerEntry(entryId),
          { type: "ledger entry", id: entryId },
          () => new LedgerError("ENTRY_NOT_FOUND", `Ledger entry "${entryId}" not found`),
        );
        if (entry.voided) {
          throw new LedgerError(
            "ALREADY_VOIDED",
            `Ledger entry "${entryId}" was already voided at ${entry.voidedAt ?? "an unknown time"}`,
          );
        }

        const voided = tx.voidLedgerEntry(entryId, this._now(), actor);
        this._logger.info(
          { tenantId: scope.tenantId, entryId, actor },
          "ledger entry voided",
        );
        return voided;
      }),
    );
  }

  /**
   * Move funds between two buckets of the same subject. Both legs are
   * `transfer` entries sharing a correlation ID, written together.
   *
   * @throws {LedgerError} INVALID_ENTRY if the buckets are the same,
   *   INVALID_AMOUNT if the amount is not positive, INSUFFICIENT_FUNDS if
   *   the source bucket's available balance is short
   */
  async transfer(
    scope: TenantScope,
    subjectId: string,
    from: AccountBucket,
    to: AccountBucket,
    amount: string,
    actor: string,
  ): Promise<TransferResult> {
    if (from === to) {
      throw new LedgerError("INVALID_ENTRY", `Cannot transfer from ${from} to itself`);
    }
    const scaled = parseAmount(amount);
    if (scaled <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Transfer amount must be positive, got "${amount}"`);
    }

    return withIntegrityLog(this._logger, scope, "transfer", () =>
      this._store.transaction((tx) => {
        const available = parseAmount(
          this.balanceIn(tx, scope, subjectId, from, { availableOnly: true }),
        );
        if (available < scaled) {
          throw new LedgerError(
            "INSUFFICIENT_FUNDS",
            `Available ${from} balance ${formatAmount(available)} is less than ${formatAmount(scaled)}`,
          );
        }

        const correlationId = this._generateId();
        const debit = this.appendIn(tx, scope, {
          tenantId: scope.tenantId,
          subjectId,
          amount: formatAmount(-scaled),
          bucket: from,
          kind: "transfer",
          description: `Transfer to ${to}`,
          correlationId,
        });
        const credit = this.appendIn(tx, scope, {
          tenantId: scope.tenantId,
          subjectId,
          amount: formatAmount(scaled),
          bucket: to,
          kind: "transfer",
          description: `Transfer from ${from}`,
          correlationId,
        });

        this._logger.info(
          { tenantId: scope.tenantId, subjectId, from, to, amount: credit.amount, actor },
          "transfer recorded",
        );
        return { correlationId, debit, credit };
      }),
    );
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Sum of non-void entries for a subject's bucket.
   */
  async currentBalance(
    scope: TenantScope,
    subjectId: string,
    bucket: AccountBucket,
    options?: BalanceOptions,
  ): Promise<string> {
    return this._store.read((reader) => this.balanceIn(reader, scope, subjectId, bucket, options));
  }

  /**
   * Same as currentBalance(), against a caller's reader or transaction.
   */
  balanceIn(
    reader: StoreReader,
    scope: TenantScope,
    subjectId: string,
    bucket: AccountBucket,
    options?: BalanceOptions,
  ): string {
    const entries = reader.listLedgerEntries({
      tenantId: scope.tenantId,
      subjectId,
      bucket,
      includeVoided: false,
    });
    return options?.availableOnly === true
      ? sumEntries(entries, this._now())
      : sumEntries(entries);
  }

  /**
   * @throws {LedgerError} ENTRY_NOT_FOUND
   */
  async getEntry(scope: TenantScope, entryId: string): Promise<LedgerEntry> {
    return withIntegrityLog(this._logger, scope, "getEntry", () =>
      this._store.read((reader) =>
        requireScoped(
          scope,
          reader.getLedgerEntry(entryId),
          { type: "ledger entry", id: entryId },
          () => new LedgerError("ENTRY_NOT_FOUND", `Ledger entry "${entryId}" not found`),
        ),
      ),
    );
  }

  async listEntries(scope: TenantScope, query?: EntryQuery): Promise<readonly LedgerEntry[]> {
    return this._store.read((reader) =>
      reader.listLedgerEntries({ ...query, tenantId: scope.tenantId }),
    );
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _now(): string {
    return this._clock().toISOString();
  }

  private _buildEntry(input: NewLedgerEntry): LedgerEntry {
    if (typeof input.subjectId !== "string" || input.subjectId.trim() === "") {
      throw new LedgerError("INVALID_ENTRY", "Ledger entry subjectId must be a non-empty string");
    }
    if (!isAccountBucket(input.bucket)) {
      throw new LedgerError("INVALID_ENTRY", `Unknown bucket: "${String(input.bucket)}"`);
    }
    if (!isLedgerEntryKind(input.kind)) {
      throw new LedgerError("INVALID_ENTRY", `Unknown entry kind: "${String(input.kind)}"`);
    }

    const scaled = parseAmount(input.amount);
    const sign = KIND_SIGN[input.kind];
    const signOk =
      sign === "any" ||
      (sign === "nonzero" && scaled !== 0n) ||
      (sign === "positive" && scaled > 0n) ||
      (sign === "negative" && scaled < 0n);
    if (!signOk) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount "${input.amount}" is not valid for a ${input.kind} entry (must be ${sign})`,
      );
    }

    const createdAt = this._now();
    const availableAt =
      input.availableAt === undefined ? createdAt : toTimestamp(input.availableAt, "availableAt");

    return {
      id: this._generateId(),
      tenantId: input.tenantId,
      subjectId: input.subjectId,
      amount: formatAmount(scaled),
      bucket: input.bucket,
      kind: input.kind,
      ...(input.description !== undefined ? { description: input.description } : {}),
      createdAt,
      availableAt,
      voided: false,
      ...(input.correlationId !== undefined ? { correlationId: input.correlationId } : {}),
    };
  }
}
