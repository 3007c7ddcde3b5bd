/**
 * Diagnostics — Prompt Context Summaries
 *
 * Plain-text summaries of the P&L, the diagnostics bundle and the company
 * context. The hypothesis generator receives these as its only view of the
 * numbers; it proposes titles and categories, never figures.
 */

import { OPEX_CATEGORIES } from "@/lib/pnl/types";
import type { PnLSeries } from "@/lib/pnl/types";
import type { CompanyContext } from "@/lib/snapshot/types";
import { formatUsd } from "@/lib/utils/math";
import type { DiagnosticsBundle, Trend } from "./types";

function growthPct(first: number, latest: number, useAbsBase: boolean): number {
  if (first === 0) return 0;
  if (!useAbsBase && first < 0) return 0;
  return ((latest - first) / Math.abs(first)) * 100;
}

export function formatPnlSummary(pnl: PnLSeries): string {
  const { months } = pnl;
  if (months.length === 0) return "No P&L data available.";

  const latest = months[months.length - 1];
  const lines = [
    `Latest period (${latest.month}):`,
    `  Revenue: ${formatUsd(latest.revenue)}`,
    `  COGS: ${formatUsd(latest.cogs)}`,
    `  Gross Margin: ${formatUsd(latest.gross_margin)} (${latest.gross_margin_pct.toFixed(1)}%)`,
    `  Total OpEx: ${formatUsd(latest.total_opex)}`,
    `  EBITDA: ${formatUsd(latest.ebitda)} (${latest.ebitda_margin_pct.toFixed(1)}%)`,
  ];

  if (months.length > 1) {
    const first = months[0];
    lines.push(
      "",
      `Trend over ${months.length} months:`,
      `  Revenue growth: ${growthPct(first.revenue, latest.revenue, false).toFixed(1)}%`,
      `  EBITDA change: ${growthPct(first.ebitda, latest.ebitda, true).toFixed(1)}%`,
    );
  }

  return lines.join("\n");
}

function describeTrend(trend: Trend): string {
  return trend.status === "available" ? trend.direction : "insufficient data";
}

export function formatDiagnosticsSummary(diagnostics: DiagnosticsBundle): string {
  const lines: string[] = ["Fixed vs Variable Cost Analysis:"];

  for (const category of OPEX_CATEGORIES) {
    const split = diagnostics.cost_structure[category];
    lines.push(
      `  - ${category}: ${split.fixed_pct}% fixed, ${split.variable_pct}% variable (confidence ${split.confidence.toFixed(2)})`,
    );
  }

  const { vendor_spikes, opex_spikes, revenue_declines } = diagnostics.outliers;
  if (vendor_spikes.length > 0) lines.push(`Vendor spend spikes detected: ${vendor_spikes.length}`);
  if (opex_spikes.length > 0) lines.push(`Operating expense spikes detected: ${opex_spikes.length}`);
  if (revenue_declines.length > 0) lines.push(`Revenue declines detected: ${revenue_declines.length} months`);

  lines.push(`Revenue trend: ${describeTrend(diagnostics.trends.revenue)}`);
  lines.push(`EBITDA trend: ${describeTrend(diagnostics.trends.ebitda)}`);

  const { completeness } = diagnostics;
  lines.push(`Data completeness: ${completeness.completeness_score.toFixed(2)}`);
  if (completeness.data_gaps.length > 0) {
    lines.push("Data gaps:");
    for (const gap of completeness.data_gaps) lines.push(`  - ${gap}`);
  }

  return lines.join("\n");
}

const CONTEXT_FIELDS: Array<{ key: keyof CompanyContext; label: string; block: boolean }> = [
  { key: "company_name", label: "Company Name", block: false },
  { key: "industry", label: "Industry", block: false },
  { key: "company_size", label: "Company Size", block: false },
  { key: "revenue_range", label: "Revenue Range", block: false },
  { key: "employee_count_range", label: "Employee Count", block: false },
  { key: "business_model", label: "Business Model", block: false },
  { key: "growth_stage", label: "Growth Stage", block: false },
  { key: "geographic_presence", label: "Geographic Presence", block: false },
  { key: "key_challenges", label: "Key Challenges", block: true },
  { key: "strategic_priorities", label: "Strategic Priorities", block: true },
  { key: "additional_context", label: "Additional Context", block: true },
];

export function formatCompanyContext(context: CompanyContext | undefined): string {
  if (!context) return "No company context provided.";

  const parts: string[] = [];
  for (const { key, label, block } of CONTEXT_FIELDS) {
    const value = context[key]?.trim();
    if (!value) continue;
    parts.push(block ? `\n${label}:\n${value}` : `${label}: ${value}`);
  }

  return parts.length > 0 ? parts.join("\n") : "No company context provided.";
}
