/**
 * Config Engine — System Defaults
 *
 * Values used when no settings file or override supplies them.
 */

import type { DiagnosticsSettings, RankingConfig } from "./types";

// ---------------------------------------------------------------------------
// Ranking defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RANKING_CONFIG: RankingConfig = Object.freeze({
  risk_multiplier_low: 1.0,
  risk_multiplier_med: 1.2,
  risk_multiplier_high: 1.5,
  time_multiplier_base: 1.0,
  time_multiplier_per_week: 0.01,
});

export const DEFAULT_RANKING_CONFIG_PATH = "config/ranking.json";

// ---------------------------------------------------------------------------
// Diagnostics defaults
// ---------------------------------------------------------------------------

export const DEFAULT_DIAGNOSTICS_SETTINGS: DiagnosticsSettings = Object.freeze({
  z_threshold: 2.0,
  z_min_points: 3,
  revenue_decline_threshold: 0.1,
  trend_deadband_pct: 0.001,
  cost_split_bands: Object.freeze({
    strong_r: 0.7,
    moderate_r: 0.3,
    strong_variable_pct: 80,
    moderate_variable_pct: 50,
    weak_variable_pct: 20,
  }),
  completeness_weights: Object.freeze({
    month_coverage: 0.5,
    dataset_presence: 0.5,
  }),
});
