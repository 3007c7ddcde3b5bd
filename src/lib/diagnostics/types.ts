/**
 * Diagnostics — Shared Types
 *
 * Output of stages 2–6 (margin bridge, outliers, trends, cost structure,
 * completeness). A DiagnosticsBundle is deep-frozen once produced.
 */

import type { MonthKey, OpexCategory } from "@/lib/pnl/types";

// ---------------------------------------------------------------------------
// Margin bridge
// ---------------------------------------------------------------------------

export interface MarginBridgeEntry {
  month: MonthKey;
  prev_month: MonthKey;
  revenue_impact: number;
  cogs_impact: number;
  opex_impact: number;
  ebitda_change: number;
}

// ---------------------------------------------------------------------------
// Outliers
// ---------------------------------------------------------------------------

export interface VendorSpikeOutlier {
  kind: "vendor_spike";
  vendor: string;
  month: MonthKey;
  amount: number;
  mean: number;
  std_dev: number;
  z_score: number;
}

export interface OpexSpikeOutlier {
  kind: "opex_spike";
  category: OpexCategory;
  month: MonthKey;
  amount: number;
  mean: number;
  std_dev: number;
  z_score: number;
}

export interface RevenueDeclineOutlier {
  kind: "revenue_decline";
  month: MonthKey;
  prev_month: MonthKey;
  prev_revenue: number;
  current_revenue: number;
  /** 0..100, 2 decimals */
  decline_pct: number;
}

export type Outlier = VendorSpikeOutlier | OpexSpikeOutlier | RevenueDeclineOutlier;

export interface OutlierReport {
  vendor_spikes: VendorSpikeOutlier[];
  opex_spikes: OpexSpikeOutlier[];
  revenue_declines: RevenueDeclineOutlier[];
}

// ---------------------------------------------------------------------------
// Trends
// ---------------------------------------------------------------------------

export const TREND_METRICS = [
  "revenue",
  "ebitda",
  "gross_margin_pct",
  "ebitda_margin_pct",
  "total_opex",
] as const;

export type TrendMetric = (typeof TREND_METRICS)[number];

export type TrendDirection = "increasing" | "decreasing" | "flat";

export interface AvailableTrend {
  status: "available";
  metric: TrendMetric;
  slope: number;
  intercept: number;
  r_squared: number;
  direction: TrendDirection;
  /** Deadband applied to the slope */
  epsilon: number;
  points: number;
}

export interface UnavailableTrend {
  status: "insufficient_data";
  metric: TrendMetric;
  points: number;
  required: number;
}

export type Trend = AvailableTrend | UnavailableTrend;

// ---------------------------------------------------------------------------
// Cost structure
// ---------------------------------------------------------------------------

export interface CostSplit {
  category: OpexCategory;
  /** Pearson r against revenue; null when undefined (short series or zero variance) */
  correlation: number | null;
  fixed_pct: number;
  variable_pct: number;
  confidence: number;
  months_available: number;
  basis: "correlation" | "insufficient_data";
}

// ---------------------------------------------------------------------------
// Completeness
// ---------------------------------------------------------------------------

export type DiagnosticName = "margin_bridge" | "trends" | "outliers" | "cost_structure";

export interface CompletenessReport {
  total_months: number;
  expected_months: number;
  missing_gl_months: MonthKey[];
  missing_payroll_months: MonthKey[];
  /** Σ fully_loaded_cost / Σ total_opex over months where both exist */
  payroll_cost_coverage: number;
  zero_revenue_months: MonthKey[];
  has_payroll: boolean;
  has_vendor: boolean;
  has_segments: boolean;
  /** Diagnostics that could not run on this series length */
  insufficient_data: DiagnosticName[];
  data_gaps: string[];
  /** 0..1 */
  completeness_score: number;
}

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

export interface DiagnosticsBundle {
  margin_bridge: MarginBridgeEntry[];
  outliers: OutlierReport;
  trends: Record<TrendMetric, Trend>;
  cost_structure: Record<OpexCategory, CostSplit>;
  completeness: CompletenessReport;
}
