/**
 * @classbank/store: Transactional storage for the economy core.
 *
 * Exports:
 * - EconomyStore: the storage contract (read, transaction, health)
 * - InMemoryEconomyStore: serialized transactions over staged overlays
 * - Tenant Guard: scope checks applied before any other validation
 *
 * Constraints enforced by every implementation:
 * - Primary keys and foreign keys
 * - One non-rejected claim per ledger entry
 * - Ledger rows change only through voidLedgerEntry()
 */

export type {
  TableName,
  TableRows,
  LedgerEntryFilter,
  PolicyFilter,
  EnrollmentFilter,
  ClaimFilter,
  StoreReader,
  StoreTransaction,
  WriteOperation,
  StoreHealth,
  EconomyStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError, ACTIVE_CLAIM_PER_ENTRY_CONSTRAINT } from "./types.js";

export { InMemoryEconomyStore } from "./in-memory-store.js";
export type { InMemoryEconomyStoreOptions } from "./in-memory-store.js";

export {
  TenantGuardError,
  guardRead,
  guardWrite,
  guardRelation,
  requireScoped,
  isTenantGuardError,
  isIntegrityError,
} from "./tenant-guard.js";
export type { TenantGuardErrorCode, EntityLabel } from "./tenant-guard.js";
