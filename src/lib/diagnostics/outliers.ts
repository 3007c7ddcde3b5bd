/**
 * Diagnostics — Outlier Detection
 *
 * Vendor spend spikes (per vendor) and opex spikes (per category) by
 * population z-score; revenue declines by month-over-month drop.
 */

import { compareMonths } from "@/lib/pnl/months";
import { OPEX_CATEGORIES } from "@/lib/pnl/types";
import type { MonthKey, MonthlyFinancials } from "@/lib/pnl/types";
import type { VendorRecord } from "@/lib/snapshot/types";
import type { DiagnosticsSettings } from "@/lib/configEngine/types";
import { roundTo, compareCodeUnits } from "@/lib/utils/math";
import { zScores } from "./stats";
import type {
  OpexSpikeOutlier,
  OutlierReport,
  RevenueDeclineOutlier,
  VendorSpikeOutlier,
} from "./types";

type OutlierSettings = Pick<DiagnosticsSettings, "z_threshold" | "z_min_points" | "revenue_decline_threshold">;

/**
 * Sum vendor records into one amount per (vendor, month).
 * Returns vendors in code-unit order, each with months ascending.
 */
export function vendorMonthlyTotals(
  records: readonly VendorRecord[],
): Array<{ vendor: string; months: MonthKey[]; amounts: number[] }> {
  const byVendor = new Map<string, Map<MonthKey, number>>();
  for (const r of records) {
    let months = byVendor.get(r.vendor);
    if (!months) {
      months = new Map();
      byVendor.set(r.vendor, months);
    }
    months.set(r.month, (months.get(r.month) ?? 0) + r.amount);
  }

  return [...byVendor.keys()].sort(compareCodeUnits).map((vendor) => {
    const months = byVendor.get(vendor) ?? new Map<MonthKey, number>();
    const keys = [...months.keys()].sort(compareMonths);
    return { vendor, months: keys, amounts: keys.map((k) => months.get(k) ?? 0) };
  });
}

export function detectVendorSpikes(
  records: readonly VendorRecord[],
  settings: OutlierSettings,
): VendorSpikeOutlier[] {
  const out: VendorSpikeOutlier[] = [];

  for (const series of vendorMonthlyTotals(records)) {
    const z = zScores(series.amounts, settings.z_min_points);
    if (!z) continue;
    z.z_scores.forEach((score, i) => {
      if (Math.abs(score) > settings.z_threshold) {
        out.push({
          kind: "vendor_spike",
          vendor: series.vendor,
          month: series.months[i],
          amount: series.amounts[i],
          mean: z.mean,
          std_dev: z.std_dev,
          z_score: score,
        });
      }
    });
  }

  return out.sort((a, b) => compareMonths(a.month, b.month) || compareCodeUnits(a.vendor, b.vendor));
}

export function detectOpexSpikes(
  months: readonly MonthlyFinancials[],
  settings: OutlierSettings,
): OpexSpikeOutlier[] {
  const out: OpexSpikeOutlier[] = [];

  for (const category of OPEX_CATEGORIES) {
    const values = months.map((m) => m[category]);
    const z = zScores(values, settings.z_min_points);
    if (!z) continue;
    z.z_scores.forEach((score, i) => {
      if (Math.abs(score) > settings.z_threshold) {
        out.push({
          kind: "opex_spike",
          category,
          month: months[i].month,
          amount: values[i],
          mean: z.mean,
          std_dev: z.std_dev,
          z_score: score,
        });
      }
    });
  }

  const categoryOrder = (c: string) => OPEX_CATEGORIES.findIndex((k) => k === c);
  return out.sort(
    (a, b) => compareMonths(a.month, b.month) || categoryOrder(a.category) - categoryOrder(b.category),
  );
}

/**
 * Flag every month whose revenue dropped by more than the threshold
 * (fraction of the previous month). Months following zero revenue are skipped.
 */
export function detectRevenueDeclines(
  months: readonly MonthlyFinancials[],
  settings: Pick<OutlierSettings, "revenue_decline_threshold">,
): RevenueDeclineOutlier[] {
  const out: RevenueDeclineOutlier[] = [];

  for (let i = 1; i < months.length; i++) {
    const prev = months[i - 1];
    const curr = months[i];
    if (prev.revenue <= 0) continue;

    const decline = (prev.revenue - curr.revenue) / prev.revenue;
    if (decline > settings.revenue_decline_threshold) {
      out.push({
        kind: "revenue_decline",
        month: curr.month,
        prev_month: prev.month,
        prev_revenue: prev.revenue,
        current_revenue: curr.revenue,
        decline_pct: roundTo(decline * 100, 2),
      });
    }
  }

  return out;
}

/**
 * Pure function — deterministic, no side effects.
 */
export function detectOutliers(
  months: readonly MonthlyFinancials[],
  vendors: readonly VendorRecord[] | undefined,
  settings: OutlierSettings,
): OutlierReport {
  return {
    vendor_spikes: vendors && vendors.length > 0 ? detectVendorSpikes(vendors, settings) : [],
    opex_spikes: detectOpexSpikes(months, settings),
    revenue_declines: detectRevenueDeclines(months, settings),
  };
}
