/**
 * Config Engine — Types
 *
 * Ranking configuration and diagnostics settings. Both are immutable values
 * threaded through the calls that use them; nothing reads them as ambient
 * state.
 */

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

export interface RankingConfig {
  readonly risk_multiplier_low: number;
  readonly risk_multiplier_med: number;
  readonly risk_multiplier_high: number;
  readonly time_multiplier_base: number;
  readonly time_multiplier_per_week: number;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** Correlation bands for the fixed/variable cost heuristic. */
export interface CostSplitBands {
  /** r at or above this is "strongly variable" */
  readonly strong_r: number;
  /** r at or above this (and below strong_r) is "mixed" */
  readonly moderate_r: number;
  readonly strong_variable_pct: number;
  readonly moderate_variable_pct: number;
  readonly weak_variable_pct: number;
}

export interface CompletenessWeights {
  readonly month_coverage: number;
  readonly dataset_presence: number;
}

export interface DiagnosticsSettings {
  /** |z| strictly above this is flagged */
  readonly z_threshold: number;
  /** Series shorter than this are never z-scored */
  readonly z_min_points: number;
  /** Month-over-month revenue drop (fraction) strictly above this is flagged */
  readonly revenue_decline_threshold: number;
  /** Trend deadband as a fraction of |mean(y)| */
  readonly trend_deadband_pct: number;
  readonly cost_split_bands: CostSplitBands;
  readonly completeness_weights: CompletenessWeights;
}

export interface DiagnosticsSettingsOverride {
  z_threshold?: number;
  z_min_points?: number;
  revenue_decline_threshold?: number;
  trend_deadband_pct?: number;
  cost_split_bands?: Partial<CostSplitBands>;
  completeness_weights?: Partial<CompletenessWeights>;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ConfigIssue {
  path: string;
  message: string;
}
