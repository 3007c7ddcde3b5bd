/**
 * Headcount efficiency: a saving band on trailing-12-month fully-loaded
 * payroll cost.
 */

import { distinctMonths } from "@/lib/pnl/months";
import { PAYROLL_FUNCTIONS } from "@/lib/snapshot/types";
import type { PayrollFunction, PayrollRecord } from "@/lib/snapshot/types";
import { formatUsd, sum } from "@/lib/utils/math";
import type { SizingInputs } from "../../types";
import { annualize, formatPctRange, needsData, sized, trailingWindow } from "../shared";
import type { StrategyOutcome } from "../types";

const SAVINGS_LOW = 0.05;
const SAVINGS_HIGH = 0.1;
/** Transition cost (severance, backfill) as a share of one head's annual cost */
const TRANSITION_COST_PER_HEAD = 0.5;

export function sizeHeadcountInitiative(inputs: SizingInputs): StrategyOutcome {
  const payroll = inputs.datasets.payroll ?? [];
  const request = needsData("payroll cost data", [
    "Collect payroll summary with fully-loaded cost by function",
    "Workforce analysis by function",
  ]);

  const costed = payroll.filter(
    (p): p is PayrollRecord & { fully_loaded_cost: number } => typeof p.fully_loaded_cost === "number",
  );
  if (costed.length === 0) return request;

  const window = trailingWindow(distinctMonths(costed.map((p) => p.month)));
  const inWindow = new Set(window);

  const byFunction = new Map<PayrollFunction, number>();
  for (const p of costed) {
    if (!inWindow.has(p.month)) continue;
    byFunction.set(p.function, (byFunction.get(p.function) ?? 0) + p.fully_loaded_cost);
  }

  const windowCost = sum([...byFunction.values()]);
  if (windowCost <= 0) return request;

  const latestMonth = window[window.length - 1];
  const latestHeadcount = sum(payroll.filter((p) => p.month === latestMonth).map((p) => p.headcount));
  if (latestHeadcount <= 0) {
    return needsData("headcount for the latest payroll month", [
      `Confirm headcount by function for ${latestMonth}`,
      "Workforce analysis by function",
    ]);
  }

  const annualCost = annualize(windowCost, window.length);
  const costPerHead = annualCost / latestHeadcount;

  const functionLines = PAYROLL_FUNCTIONS.filter((f) => (byFunction.get(f) ?? 0) > 0).map(
    (f) => `${f} ${formatUsd(annualize(byFunction.get(f) ?? 0, window.length))}`,
  );

  return sized({
    impact_low: annualCost * SAVINGS_LOW,
    impact_high: annualCost * SAVINGS_HIGH,
    implementation_cost_estimate: costPerHead * TRANSITION_COST_PER_HEAD,
    time_to_value_weeks: 24,
    risk_level: "High",
    confidence: 0.5,
    assumptions: [
      `Fully-loaded payroll cost annualized to ${formatUsd(annualCost)} from ${window.length} months`,
      `${latestHeadcount} heads in ${latestMonth}, ${formatUsd(costPerHead)} per head`,
      `Annualized cost by function: ${functionLines.join(", ")}`,
      `Efficiency savings of ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of fully-loaded cost`,
    ],
    next_steps: [
      "Workforce and span-of-control analysis by function",
      "Identify roles for automation or consolidation",
      "Plan transition costs (severance, backfill)",
    ],
  });
}
