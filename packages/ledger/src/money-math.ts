/**
 * @classbank/ledger: Deterministic monetary arithmetic.
 *
 * Amounts are decimal strings with at most two fractional digits
 * ("12.50", "-3.00"). All arithmetic goes through bigint cents.
 *
 * Rules:
 * - No floating-point operations on amounts
 * - Results are always formatted with exactly two decimals
 * - Malformed input throws LedgerError("INVALID_AMOUNT")
 */

import { LedgerError } from "./types.js";

/** Fractional digits of every amount in the economy. */
export const AMOUNT_DECIMALS = 2;

// ─── Parse / Format ──────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" → 10050n
 * "100" → 10000n
 * "-50.25" → -5025n
 */
export function parseAmount(amount: string, decimals: number = AMOUNT_DECIMALS): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(decimals)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n → "100.50"
 * -5n → "-0.05"
 */
export function formatAmount(scaled: bigint, decimals: number = AMOUNT_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Canonical form of an amount: "5" → "5.00", "-0" → "0.00".
 */
export function normalizeAmount(amount: string): string {
  return formatAmount(parseAmount(amount));
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addAmounts(...amounts: readonly string[]): string {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount);
  }
  return formatAmount(total);
}

export function subtractAmounts(a: string, b: string): string {
  return formatAmount(parseAmount(a) - parseAmount(b));
}

export function negateAmount(amount: string): string {
  return formatAmount(-parseAmount(amount));
}

export function absAmount(amount: string): string {
  const scaled = parseAmount(amount);
  return formatAmount(scaled < 0n ? -scaled : scaled);
}

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isZero(amount: string): boolean {
  return parseAmount(amount) === 0n;
}

export function isPositive(amount: string): boolean {
  return parseAmount(amount) > 0n;
}

export function isNegative(amount: string): boolean {
  return parseAmount(amount) < 0n;
}

// ─── Discounts ───────────────────────────────────────────────────────────

/**
 * Apply a percentage discount, then a fixed discount, to a non-negative
 * amount. The result never drops below zero.
 *
 * The percentage is resolved to hundredths of a percent; the percentage
 * discount is truncated to whole cents.
 *
 * applyDiscount("10.00", 15, "0.00") → "8.50"
 * applyDiscount("10.00", 0, "12.00") → "0.00"
 */
export function applyDiscount(amount: string, percent: number, fixed: string): string {
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Discount percent must be between 0 and 100, got ${String(percent)}`,
    );
  }
  const fixedScaled = parseAmount(fixed);
  if (fixedScaled < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Fixed discount must not be negative: "${fixed}"`);
  }

  const scaled = parseAmount(amount);
  const basisPoints = BigInt(Math.round(percent * 100));
  const afterPercent = scaled - (scaled * basisPoints) / 10_000n;
  const afterFixed = afterPercent - fixedScaled;
  return formatAmount(afterFixed > 0n ? afterFixed : 0n);
}
