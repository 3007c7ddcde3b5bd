/**
 * P&L — Reconstruction
 *
 * Raw monthly GL rows → canonical MonthlyFinancials series.
 * Derived fields are computed by deriveMonthlyFinancials() and nowhere else.
 */

import { roundTo } from "@/lib/utils/math";
import { compareMonths } from "./months";
import type { MonthKey, MonthlyFinancials, PnLSeries, RawMonthlyRow } from "./types";

export class DuplicateMonthError extends Error {
  public readonly month: MonthKey;

  constructor(month: MonthKey) {
    super(`Duplicate month in GL input: ${month}`);
    this.name = "DuplicateMonthError";
    this.month = month;
  }
}

function marginPct(numerator: number, revenue: number): number {
  if (revenue === 0) return 0;
  return roundTo((numerator / revenue) * 100, 2);
}

/**
 * Build one canonical month from a raw row. Missing opex columns are 0.
 *
 * Pure function — deterministic, no side effects.
 */
export function deriveMonthlyFinancials(row: RawMonthlyRow): MonthlyFinancials {
  const opex_sales_marketing = row.opex_sales_marketing ?? 0;
  const opex_rnd = row.opex_rnd ?? 0;
  const opex_gna = row.opex_gna ?? 0;
  const opex_other = row.opex_other ?? 0;

  const gross_margin = row.revenue - row.cogs;
  const total_opex = opex_sales_marketing + opex_rnd + opex_gna + opex_other;
  const ebitda = gross_margin - total_opex;

  return {
    month: row.month,
    revenue: row.revenue,
    cogs: row.cogs,
    opex_sales_marketing,
    opex_rnd,
    opex_gna,
    opex_other,
    gross_margin,
    gross_margin_pct: marginPct(gross_margin, row.revenue),
    total_opex,
    ebitda,
    ebitda_margin_pct: marginPct(ebitda, row.revenue),
  };
}

/**
 * Reconstruct the canonical P&L series.
 *
 * Rows are sorted chronologically before derivation; duplicate months throw
 * DuplicateMonthError. Zero-revenue months are listed in zero_revenue_months.
 *
 * Pure function — deterministic, no side effects.
 */
export function reconstructPnl(rows: readonly RawMonthlyRow[]): PnLSeries {
  const seen = new Set<MonthKey>();
  for (const row of rows) {
    if (seen.has(row.month)) throw new DuplicateMonthError(row.month);
    seen.add(row.month);
  }

  const sorted = [...rows].sort((a, b) => compareMonths(a.month, b.month));
  const months = sorted.map(deriveMonthlyFinancials);
  const zero_revenue_months = months.filter((m) => m.revenue === 0).map((m) => m.month);

  return { months, zero_revenue_months };
}
