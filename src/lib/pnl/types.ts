/**
 * P&L — Shared Types
 *
 * Raw general-ledger rows and the canonical monthly P&L series derived
 * from them. Percentages are 0..100; amounts are in reporting currency.
 */

/** Calendar month as "YYYY-MM". */
export type MonthKey = string;

export const OPEX_CATEGORIES = [
  "opex_sales_marketing",
  "opex_rnd",
  "opex_gna",
  "opex_other",
] as const;

export type OpexCategory = (typeof OPEX_CATEGORIES)[number];

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export interface RawMonthlyRow {
  month: MonthKey;
  revenue: number;
  cogs: number;
  opex_sales_marketing?: number;
  opex_rnd?: number;
  opex_gna?: number;
  opex_other?: number;
}

// ---------------------------------------------------------------------------
// Canonical series
// ---------------------------------------------------------------------------

export interface MonthlyFinancials {
  month: MonthKey;
  revenue: number;
  cogs: number;
  opex_sales_marketing: number;
  opex_rnd: number;
  opex_gna: number;
  opex_other: number;

  /** revenue - cogs */
  gross_margin: number;
  /** gross_margin / revenue * 100, 0 when revenue is 0 */
  gross_margin_pct: number;
  /** Σ opex_* */
  total_opex: number;
  /** gross_margin - total_opex */
  ebitda: number;
  /** ebitda / revenue * 100, 0 when revenue is 0 */
  ebitda_margin_pct: number;
}

export interface PnLSeries {
  /** Strictly increasing by month */
  months: MonthlyFinancials[];
  /** Months whose margin percentages were forced to 0 */
  zero_revenue_months: MonthKey[];
}
