/**
 * Uncategorized cost reduction, aimed at the largest opex line.
 *
 *   opex_sales_marketing largest → sales & marketing efficiency, 10–20% of it
 *   opex_other largest           → infrastructure and cloud, 10–25% of it
 *   otherwise                    → generic 3–8% of total opex
 *
 * Ties go to the earlier line in OPEX_CATEGORIES order.
 */

import { OPEX_CATEGORIES } from "@/lib/pnl/types";
import type { OpexCategory } from "@/lib/pnl/types";
import { formatUsd } from "@/lib/utils/math";
import type { SizingInputs } from "../../types";
import { annualizedPnlScale, formatPctRange, needsData, sized } from "../shared";
import type { PnlScale } from "../shared";
import type { StrategyOutcome } from "../types";

const SAVINGS_LOW = 0.03;
const SAVINGS_HIGH = 0.08;
const IMPLEMENTATION_PCT = 0.02;

const SALES_MARKETING_LOW = 0.1;
const SALES_MARKETING_HIGH = 0.2;
const INFRASTRUCTURE_LOW = 0.1;
const INFRASTRUCTURE_HIGH = 0.25;
/** Implementation cost of a focused program, as a share of the line */
const FOCUSED_IMPLEMENTATION_PCT = 0.05;
const FOCUSED_CONFIDENCE = 0.6;

export function largestOpexLine(scale: PnlScale): OpexCategory {
  let largest: OpexCategory = OPEX_CATEGORIES[0];
  for (const c of OPEX_CATEGORIES) {
    if (scale.opex[c] > scale.opex[largest]) largest = c;
  }
  return largest;
}

export function sizeOtherInitiative(inputs: SizingInputs): StrategyOutcome {
  const scale = annualizedPnlScale(inputs.pnl);
  if (scale.total_opex <= 0) {
    return needsData("operating expense history", [
      "Upload GL/P&L data with operating expense detail",
      "Detailed analysis required",
    ]);
  }

  const focus = largestOpexLine(scale);

  if (focus === "opex_sales_marketing") {
    const spend = scale.opex.opex_sales_marketing;
    return sized({
      impact_low: spend * SALES_MARKETING_LOW,
      impact_high: spend * SALES_MARKETING_HIGH,
      implementation_cost_estimate: spend * FOCUSED_IMPLEMENTATION_PCT,
      time_to_value_weeks: 12,
      risk_level: "Med",
      confidence: FOCUSED_CONFIDENCE,
      assumptions: [
        `Sales & marketing is the largest opex line at ${formatUsd(spend)} annualized`,
        `Efficiency gains of ${formatPctRange(SALES_MARKETING_LOW, SALES_MARKETING_HIGH)} of sales & marketing spend`,
      ],
      next_steps: ["CAC analysis by channel", "Channel efficiency review"],
    });
  }

  if (focus === "opex_other") {
    const spend = scale.opex.opex_other;
    return sized({
      impact_low: spend * INFRASTRUCTURE_LOW,
      impact_high: spend * INFRASTRUCTURE_HIGH,
      implementation_cost_estimate: spend * FOCUSED_IMPLEMENTATION_PCT,
      time_to_value_weeks: 16,
      risk_level: "Med",
      confidence: FOCUSED_CONFIDENCE,
      assumptions: [
        `Other opex (infrastructure, cloud, services) is the largest opex line at ${formatUsd(spend)} annualized`,
        `Optimization saves ${formatPctRange(INFRASTRUCTURE_LOW, INFRASTRUCTURE_HIGH)} of other opex`,
      ],
      next_steps: ["Right-size infrastructure and cloud instances", "Reserved capacity and commitment analysis"],
    });
  }

  return sized({
    impact_low: scale.total_opex * SAVINGS_LOW,
    impact_high: scale.total_opex * SAVINGS_HIGH,
    implementation_cost_estimate: scale.total_opex * IMPLEMENTATION_PCT,
    time_to_value_weeks: 16,
    risk_level: "Med",
    confidence: 0.4,
    assumptions: [
      `Generic cost reduction of ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of annualized opex (${formatUsd(scale.total_opex)})`,
    ],
    next_steps: ["Detailed analysis required"],
  });
}
