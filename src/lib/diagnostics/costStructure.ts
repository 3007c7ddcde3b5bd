/**
 * Diagnostics — Fixed vs Variable Cost Structure
 *
 * Correlates each opex category with revenue and maps the correlation onto
 * a fixed/variable split. Short or flat series get the neutral 50/50 split
 * at the confidence floor.
 */

import type { MonthlyFinancials, OpexCategory } from "@/lib/pnl/types";
import type { CostSplitBands } from "@/lib/configEngine/types";
import { clamp } from "@/lib/utils/math";
import { pearson } from "./stats";
import type { CostSplit } from "./types";

export const COST_SPLIT_CONFIDENCE_FLOOR = 0.2;
export const COST_SPLIT_CONFIDENCE_CEILING = 0.9;
const MIN_COST_SPLIT_POINTS = 3;
const FULL_CONFIDENCE_MONTHS = 12;

export function variablePctForCorrelation(r: number, bands: CostSplitBands): number {
  if (r >= bands.strong_r) return bands.strong_variable_pct;
  if (r >= bands.moderate_r) return bands.moderate_variable_pct;
  return bands.weak_variable_pct;
}

export function estimateCategorySplit(
  category: OpexCategory,
  months: readonly MonthlyFinancials[],
  bands: CostSplitBands,
): CostSplit {
  const n = months.length;
  const r = n >= MIN_COST_SPLIT_POINTS
    ? pearson(months.map((m) => m.revenue), months.map((m) => m[category]))
    : null;

  if (r === null) {
    return {
      category,
      correlation: null,
      fixed_pct: 50,
      variable_pct: 50,
      confidence: COST_SPLIT_CONFIDENCE_FLOOR,
      months_available: n,
      basis: "insufficient_data",
    };
  }

  const variable_pct = variablePctForCorrelation(r, bands);
  const confidence = clamp(
    Math.min(1, n / FULL_CONFIDENCE_MONTHS) * Math.abs(r),
    COST_SPLIT_CONFIDENCE_FLOOR,
    COST_SPLIT_CONFIDENCE_CEILING,
  );

  return {
    category,
    correlation: r,
    fixed_pct: 100 - variable_pct,
    variable_pct,
    confidence,
    months_available: n,
    basis: "correlation",
  };
}

/**
 * Pure function — deterministic, no side effects.
 */
export function estimateCostStructure(
  months: readonly MonthlyFinancials[],
  bands: CostSplitBands,
): Record<OpexCategory, CostSplit> {
  return {
    opex_sales_marketing: estimateCategorySplit("opex_sales_marketing", months, bands),
    opex_rnd: estimateCategorySplit("opex_rnd", months, bands),
    opex_gna: estimateCategorySplit("opex_gna", months, bands),
    opex_other: estimateCategorySplit("opex_other", months, bands),
  };
}
