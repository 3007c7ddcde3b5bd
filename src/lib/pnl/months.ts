/**
 * P&L — Calendar Month Helpers
 *
 * Month keys are "YYYY-MM". Ordinals (year * 12 + monthIndex) make gaps and
 * contiguous ranges simple integer arithmetic.
 */

import type { MonthKey } from "./types";

const MONTH_KEY_RE = /^(\d{4})-(\d{2})$/;

/**
 * Convert a month key to a month ordinal. Returns undefined for keys that
 * are not "YYYY-MM" with a month in 01..12.
 */
export function monthOrdinal(month: MonthKey): number | undefined {
  const match = MONTH_KEY_RE.exec(month);
  if (!match) return undefined;
  const year = Number(match[1]);
  const m = Number(match[2]);
  if (m < 1 || m > 12) return undefined;
  return year * 12 + (m - 1);
}

export function monthFromOrdinal(ordinal: number): MonthKey {
  const year = Math.floor(ordinal / 12);
  const m = (ordinal % 12) + 1;
  return `${String(year).padStart(4, "0")}-${String(m).padStart(2, "0")}`;
}

/**
 * Every month from `first` to `last` inclusive. Empty when either key is
 * malformed or the range is inverted.
 */
export function enumerateMonthRange(first: MonthKey, last: MonthKey): MonthKey[] {
  const start = monthOrdinal(first);
  const end = monthOrdinal(last);
  if (start === undefined || end === undefined || end < start) return [];

  const out: MonthKey[] = [];
  for (let o = start; o <= end; o++) out.push(monthFromOrdinal(o));
  return out;
}

/** "YYYY-MM" keys sort chronologically as strings. */
export function compareMonths(a: MonthKey, b: MonthKey): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Distinct months, ascending.
 */
export function distinctMonths(months: Iterable<MonthKey>): MonthKey[] {
  return [...new Set(months)].sort(compareMonths);
}

/**
 * The last `count` entries of an ascending month list.
 */
export function trailingMonths(months: readonly MonthKey[], count = 12): MonthKey[] {
  return months.slice(Math.max(0, months.length - count));
}
