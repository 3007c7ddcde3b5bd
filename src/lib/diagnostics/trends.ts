/**
 * Diagnostics — Trend Analysis
 *
 * Closed-form OLS per tracked metric against month index, with a deadband
 * on the slope so near-zero slopes read as "flat".
 */

import type { MonthlyFinancials } from "@/lib/pnl/types";
import { linearFitByIndex, mean } from "./stats";
import type { Trend, TrendDirection, TrendMetric } from "./types";

const MIN_TREND_POINTS = 2;

export function classifyDirection(slope: number, epsilon: number): TrendDirection {
  if (slope > epsilon) return "increasing";
  if (slope < -epsilon) return "decreasing";
  return "flat";
}

export function computeTrend(values: readonly number[], metric: TrendMetric, deadbandPct: number): Trend {
  const fit = linearFitByIndex(values);
  if (!fit) {
    return { status: "insufficient_data", metric, points: values.length, required: MIN_TREND_POINTS };
  }

  const epsilon = deadbandPct * Math.abs(mean(values) ?? 0);

  return {
    status: "available",
    metric,
    slope: fit.slope,
    intercept: fit.intercept,
    r_squared: fit.r_squared,
    direction: classifyDirection(fit.slope, epsilon),
    epsilon,
    points: values.length,
  };
}

/**
 * Pure function — deterministic, no side effects.
 */
export function computeTrends(
  months: readonly MonthlyFinancials[],
  deadbandPct: number,
): Record<TrendMetric, Trend> {
  const series = (metric: TrendMetric) => months.map((m) => m[metric]);
  return {
    revenue: computeTrend(series("revenue"), "revenue", deadbandPct),
    ebitda: computeTrend(series("ebitda"), "ebitda", deadbandPct),
    gross_margin_pct: computeTrend(series("gross_margin_pct"), "gross_margin_pct", deadbandPct),
    ebitda_margin_pct: computeTrend(series("ebitda_margin_pct"), "ebitda_margin_pct", deadbandPct),
    total_opex: computeTrend(series("total_opex"), "total_opex", deadbandPct),
  };
}
