/**
 * Diagnostics — Data Completeness
 *
 * Scores how much of the expected data is present: calendar coverage of the
 * GL series and presence of the optional datasets. Also lists the
 * human-readable data gaps shown next to the results.
 */

import { enumerateMonthRange } from "@/lib/pnl/months";
import type { MonthKey, PnLSeries } from "@/lib/pnl/types";
import type { OptionalDatasets, PayrollRecord } from "@/lib/snapshot/types";
import type { DiagnosticsSettings } from "@/lib/configEngine/types";
import { roundTo } from "@/lib/utils/math";
import type { CompletenessReport, DiagnosticName } from "./types";

type CompletenessSettings = Pick<DiagnosticsSettings, "completeness_weights" | "z_min_points">;

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

function monthList(months: readonly MonthKey[]): string {
  return months.join(", ");
}

/**
 * Σ fully_loaded_cost per month, only for months with at least one record
 * carrying a cost.
 */
function payrollCostByMonth(payroll: readonly PayrollRecord[]): Map<MonthKey, number> {
  const byMonth = new Map<MonthKey, number>();
  for (const p of payroll) {
    if (p.fully_loaded_cost === undefined || p.fully_loaded_cost === null) continue;
    byMonth.set(p.month, (byMonth.get(p.month) ?? 0) + p.fully_loaded_cost);
  }
  return byMonth;
}

/**
 * Diagnostics that cannot run on a series of `n` months.
 */
export function insufficientDiagnostics(n: number, zMinPoints: number): DiagnosticName[] {
  const out: DiagnosticName[] = [];
  if (n < 2) out.push("margin_bridge", "trends");
  if (n < zMinPoints) out.push("outliers");
  if (n < 3) out.push("cost_structure");
  return out;
}

/**
 * Pure function — deterministic, no side effects.
 */
export function scoreCompleteness(
  pnl: PnLSeries,
  datasets: OptionalDatasets,
  settings: CompletenessSettings,
): CompletenessReport {
  const glMonths = pnl.months.map((m) => m.month);
  const total_months = glMonths.length;

  const expected = total_months > 0 ? enumerateMonthRange(glMonths[0], glMonths[total_months - 1]) : [];
  const present = new Set(glMonths);
  const missing_gl_months = expected.filter((m) => !present.has(m));

  const payroll = datasets.payroll ?? [];
  const has_payroll = payroll.length > 0;
  const has_vendor = (datasets.vendors?.length ?? 0) > 0;
  const has_segments = (datasets.segments?.length ?? 0) > 0;

  const payrollMonths = new Set(payroll.map((p) => p.month));
  const missing_payroll_months = has_payroll ? glMonths.filter((m) => !payrollMonths.has(m)) : [];

  const costByMonth = payrollCostByMonth(payroll);
  let payrollCost = 0;
  let opexCovered = 0;
  for (const m of pnl.months) {
    const cost = costByMonth.get(m.month);
    if (cost === undefined) continue;
    payrollCost += cost;
    opexCovered += m.total_opex;
  }
  const payroll_cost_coverage = opexCovered > 0 ? roundTo(payrollCost / opexCovered, 4) : 0;

  // Malformed month keys leave `expected` empty; count what is present as covered.
  const monthCoverage = expected.length > 0
    ? total_months / expected.length
    : total_months > 0 ? 1 : 0;
  const datasetPresence = [has_payroll, has_vendor, has_segments].filter(Boolean).length / 3;
  const w = settings.completeness_weights;
  const completeness_score = roundTo(
    (w.month_coverage * monthCoverage + w.dataset_presence * datasetPresence) /
      (w.month_coverage + w.dataset_presence),
    4,
  );

  const insufficient_data = insufficientDiagnostics(total_months, settings.z_min_points);

  const data_gaps: string[] = [];
  if (total_months === 0) data_gaps.push("No GL/P&L data provided");
  if (missing_gl_months.length > 0) {
    data_gaps.push(
      `Missing GL/P&L data for ${plural(missing_gl_months.length, "month")} (${monthList(missing_gl_months)})`,
    );
  }
  if (pnl.zero_revenue_months.length > 0) {
    data_gaps.push(
      `Zero revenue in ${plural(pnl.zero_revenue_months.length, "month")} (${monthList(pnl.zero_revenue_months)}); margins reported as 0`,
    );
  }
  if (!has_payroll) {
    data_gaps.push("Payroll summary data not provided (optional)");
  } else {
    if (missing_payroll_months.length > 0) {
      data_gaps.push(
        `Missing payroll data for ${plural(missing_payroll_months.length, "month")} (${monthList(missing_payroll_months)})`,
      );
    }
    const withoutCost = payroll.filter((p) => p.fully_loaded_cost === undefined || p.fully_loaded_cost === null).length;
    if (withoutCost > 0) {
      data_gaps.push(`Payroll cost missing on ${withoutCost} of ${plural(payroll.length, "record")}`);
    }
  }
  if (!has_vendor) data_gaps.push("Vendor spend data not provided (optional)");
  if (!has_segments) data_gaps.push("Revenue by segment data not provided (optional)");
  if (total_months > 0 && insufficient_data.length > 0) {
    data_gaps.push(
      `Insufficient history (${plural(total_months, "month")}) for: ${insufficient_data.join(", ")}`,
    );
  }

  return {
    total_months,
    expected_months: expected.length,
    missing_gl_months,
    missing_payroll_months,
    payroll_cost_coverage,
    zero_revenue_months: [...pnl.zero_revenue_months],
    has_payroll,
    has_vendor,
    has_segments,
    insufficient_data,
    data_gaps,
    completeness_score,
  };
}
