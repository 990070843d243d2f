/**
 * @classbank/ledger: Append-only balance ledger.
 *
 * Enforces the ledger invariants:
 * - Entries are immutable once appended; only the void flag changes
 * - A void happens exactly once
 * - Amount signs follow the entry kind
 * - Balances are the sum of non-void entries
 * - All monetary arithmetic uses bigint cents (no floating point)
 */

// Core engine
export { LedgerStore, sumEntries } from "./ledger.js";

// Integrity logging
export { withIntegrityLog } from "./integrity.js";
export type { IntegrityPredicate } from "./integrity.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  parseAmount,
  formatAmount,
  normalizeAmount,
  addAmounts,
  subtractAmounts,
  negateAmount,
  absAmount,
  compareAmounts,
  isZero,
  isPositive,
  isNegative,
  applyDiscount,
} from "./money-math.js";

// Types
export type {
  AmountSign,
  BalanceOptions,
  EntryQuery,
  TransferResult,
  LedgerStoreOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, KIND_SIGN } from "./types.js";
