/**
 * Calendar helpers for coverage windows, billing cycles and rolling
 * claim periods. All timestamps are ISO 8601 strings in UTC.
 */

import type { ChargeFrequency, ClaimPeriod } from "@classbank/types";

export const DAY_MS = 86_400_000;

/** Length of each rolling claim period, in days. */
export const PERIOD_DAYS: Readonly<Record<ClaimPeriod, number>> = {
  month: 30,
  semester: 182,
  year: 365,
} as const;

/** Length of each billing cycle, in days. */
export const CYCLE_DAYS: Readonly<Record<ChargeFrequency, number>> = {
  weekly: 7,
  monthly: 30,
} as const;

/**
 * True when instant `a` is strictly earlier than `b`. Compares parsed
 * instants, since expanded-year ISO strings do not sort lexically.
 */
export function isBefore(a: string, b: string): boolean {
  return Date.parse(a) < Date.parse(b);
}

export function addDays(iso: string, days: number): string {
  return new Date(Date.parse(iso) + days * DAY_MS).toISOString();
}

/**
 * Whole days elapsed from `from` to `to`, rounded down. Negative when
 * `from` is later than `to`.
 */
export function wholeDaysBetween(from: string, to: string): number {
  return Math.floor((Date.parse(to) - Date.parse(from)) / DAY_MS);
}

/**
 * Start of the rolling period that ends at `now`.
 */
export function periodStart(now: string, period: ClaimPeriod): string {
  return addDays(now, -PERIOD_DAYS[period]);
}

export function nextDueDate(from: string, frequency: ChargeFrequency): string {
  return addDays(from, CYCLE_DAYS[frequency]);
}
