/**
 * Pricing: a price-realization band on trailing-12-month segment revenue.
 */

import { distinctMonths } from "@/lib/pnl/months";
import { compareCodeUnits, formatUsd, sum } from "@/lib/utils/math";
import type { SizingInputs } from "../../types";
import { annualize, formatPctRange, needsData, sized, trailingWindow } from "../shared";
import type { StrategyOutcome } from "../types";

const UPLIFT_LOW = 0.01;
const UPLIFT_HIGH = 0.03;
const IMPLEMENTATION_PCT = 0.005;
const TOP_SEGMENTS = 3;

export function sizePricingInitiative(inputs: SizingInputs): StrategyOutcome {
  const segments = inputs.datasets.segments ?? [];
  const request = needsData("revenue by segment data", [
    "Collect revenue by segment (month, segment, revenue)",
    "Review price lists and discounting by segment",
  ]);
  if (segments.length === 0) return request;

  const window = trailingWindow(distinctMonths(segments.map((s) => s.month)));
  const inWindow = new Set(window);

  const bySegment = new Map<string, number>();
  for (const s of segments) {
    if (!inWindow.has(s.month)) continue;
    bySegment.set(s.segment, (bySegment.get(s.segment) ?? 0) + s.revenue);
  }

  const windowRevenue = sum([...bySegment.values()]);
  if (windowRevenue <= 0) return request;

  const annualRevenue = annualize(windowRevenue, window.length);
  const top = [...bySegment.entries()]
    .sort((a, b) => b[1] - a[1] || compareCodeUnits(a[0], b[0]))
    .slice(0, TOP_SEGMENTS);

  return sized({
    impact_low: annualRevenue * UPLIFT_LOW,
    impact_high: annualRevenue * UPLIFT_HIGH,
    implementation_cost_estimate: annualRevenue * IMPLEMENTATION_PCT,
    time_to_value_weeks: 12,
    risk_level: "Med",
    confidence: bySegment.size >= 2 ? 0.6 : 0.5,
    assumptions: [
      `Segment revenue annualized to ${formatUsd(annualRevenue)} from ${window.length} months across ${bySegment.size} segments`,
      `Price realization of ${formatPctRange(UPLIFT_LOW, UPLIFT_HIGH)} of annual segment revenue`,
      `Largest segments: ${top.map(([name, amount]) => `${name} (${formatUsd(amount)})`).join(", ")}`,
    ],
    next_steps: [
      "Analyze discounting and price realization by segment",
      "Test list-price changes on the largest segments",
    ],
  });
}
