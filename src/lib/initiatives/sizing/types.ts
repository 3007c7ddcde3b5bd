/**
 * Initiative Sizing — Strategy Types
 */

import type { RiskLevel } from "../types";

/** Raw numbers a strategy produces, before rounding and confidence adjustment. */
export interface SizingEstimate {
  impact_low: number;
  impact_high: number;
  implementation_cost_estimate: number;
  time_to_value_weeks: number;
  risk_level: RiskLevel;
  confidence: number;
  assumptions: string[];
  next_steps: string[];
}

export type StrategyOutcome =
  | { kind: "sized"; estimate: SizingEstimate }
  /** Sized inside the strategy from a stand-in for its missing dataset */
  | { kind: "proxy"; estimate: SizingEstimate }
  | {
      kind: "needs_data";
      /** Dataset or history the strategy could not find */
      missing: string;
      /** Data requests that become the initiative's next steps */
      next_steps: string[];
    };

/** Generic-fallback parameters for one category. */
export interface CategoryProfile {
  /** Fraction of annualized revenue scale, before widening */
  fallback_low_pct: number;
  fallback_high_pct: number;
  implementation_pct: number;
  time_to_value_weeks: number;
  risk_level: RiskLevel;
  base_confidence: number;
}
