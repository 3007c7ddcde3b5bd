/**
 * Initiative Sizing — Generic Fallback
 *
 * Used whenever a category strategy cannot find its data. Sizes from the
 * annualized revenue scale alone (|EBITDA| when revenue is 0), widens the
 * band, and pulls confidence toward the floor.
 */

import { formatUsd } from "@/lib/utils/math";
import type { InitiativeCategory, SizingInputs } from "../types";
import {
  CATEGORY_PROFILES,
  CONFIDENCE_FLOOR,
  FALLBACK_CONFIDENCE_RETENTION,
  FALLBACK_WIDENING,
} from "./profiles";
import { annualizedPnlScale, formatPctRange } from "./shared";
import type { SizingEstimate } from "./types";

export function fallbackConfidence(baseConfidence: number): number {
  return CONFIDENCE_FLOOR + (baseConfidence - CONFIDENCE_FLOOR) * FALLBACK_CONFIDENCE_RETENTION;
}

export function sizeWithGenericFallback(
  category: InitiativeCategory,
  inputs: SizingInputs,
  missing: string,
  dataRequests: string[],
): SizingEstimate {
  const profile = CATEGORY_PROFILES[category];
  const pnlScale = annualizedPnlScale(inputs.pnl);

  const useRevenue = pnlScale.revenue > 0;
  const scale = useRevenue ? pnlScale.revenue : Math.abs(pnlScale.ebitda);
  const scaleLabel = useRevenue ? "revenue" : "|EBITDA|";

  return {
    impact_low: (scale * profile.fallback_low_pct) / FALLBACK_WIDENING,
    impact_high: scale * profile.fallback_high_pct * FALLBACK_WIDENING,
    implementation_cost_estimate: scale * profile.implementation_pct,
    time_to_value_weeks: profile.time_to_value_weeks,
    risk_level: profile.risk_level,
    confidence: fallbackConfidence(profile.base_confidence),
    assumptions: [
      `${missing} not available; sized from annualized ${scaleLabel} of ${formatUsd(scale)}`,
      `Base range ${formatPctRange(profile.fallback_low_pct, profile.fallback_high_pct)} of ${scaleLabel}, widened ×${FALLBACK_WIDENING} for missing data`,
    ],
    next_steps: [...dataRequests],
  };
}
