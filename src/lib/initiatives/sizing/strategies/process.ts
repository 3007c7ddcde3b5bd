/**
 * Process improvement: a saving band on the variable share of annualized
 * opex, using the cost-structure split.
 */

import { OPEX_CATEGORIES } from "@/lib/pnl/types";
import { formatUsd } from "@/lib/utils/math";
import type { SizingInputs } from "../../types";
import { annualizedPnlScale, formatPctRange, needsData, sized } from "../shared";
import type { StrategyOutcome } from "../types";

const SAVINGS_LOW = 0.03;
const SAVINGS_HIGH = 0.08;
const IMPLEMENTATION_PCT = 0.02;
const MIN_MONTHS = 3;

export function sizeProcessInitiative(inputs: SizingInputs): StrategyOutcome {
  const request = needsData(`at least ${MIN_MONTHS} months of GL history`, [
    "Upload additional months of GL/P&L data",
    "Map key operating processes and their cost drivers",
  ]);
  if (inputs.pnl.months.length < MIN_MONTHS) return request;

  const scale = annualizedPnlScale(inputs.pnl);
  const { cost_structure, outliers } = inputs.diagnostics;

  let variableOpex = 0;
  let confidenceSum = 0;
  for (const c of OPEX_CATEGORIES) {
    variableOpex += scale.opex[c] * (cost_structure[c].variable_pct / 100);
    confidenceSum += cost_structure[c].confidence;
  }
  if (variableOpex <= 0) return request;

  const meanSplitConfidence = confidenceSum / OPEX_CATEGORIES.length;

  const next_steps = [
    "Map key operating processes and their cost drivers",
    "Prioritize automation candidates in variable cost categories",
  ];
  if (outliers.opex_spikes.length > 0) {
    const spikeMonths = [...new Set(outliers.opex_spikes.map((o) => o.month))];
    next_steps.push(`Review opex spikes in ${spikeMonths.join(", ")}`);
  }

  return sized({
    impact_low: variableOpex * SAVINGS_LOW,
    impact_high: variableOpex * SAVINGS_HIGH,
    implementation_cost_estimate: scale.total_opex * IMPLEMENTATION_PCT,
    time_to_value_weeks: 16,
    risk_level: "Med",
    confidence: 0.4 + 0.2 * meanSplitConfidence,
    assumptions: [
      `Variable share of annualized opex: ${formatUsd(variableOpex)} of ${formatUsd(scale.total_opex)}`,
      `Process improvements save ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of variable opex`,
    ],
    next_steps,
  });
}
