/**
 * Initiative Ranking — Weighted Score
 *
 *   score = impact_mid × confidence / (risk_multiplier × time_multiplier)
 *
 * A non-positive or non-finite denominator scores 0. Validated configs
 * cannot produce one.
 */

import type { RankingConfig } from "@/lib/configEngine/types";
import type { RiskLevel, SizedInitiative } from "../types";

export function impactMid(initiative: Pick<SizedInitiative, "impact_low" | "impact_high">): number {
  return (initiative.impact_low + initiative.impact_high) / 2;
}

export function riskMultiplier(risk: RiskLevel, config: RankingConfig): number {
  switch (risk) {
    case "Low":
      return config.risk_multiplier_low;
    case "Med":
      return config.risk_multiplier_med;
    case "High":
      return config.risk_multiplier_high;
  }
}

export function timeMultiplier(weeks: number, config: RankingConfig): number {
  return config.time_multiplier_base + weeks * config.time_multiplier_per_week;
}

export interface ScoreBreakdown {
  impact_mid: number;
  risk_multiplier: number;
  time_multiplier: number;
  weighted_score: number;
}

export function scoreInitiative(initiative: SizedInitiative, config: RankingConfig): ScoreBreakdown {
  const impact_mid = impactMid(initiative);
  const risk_multiplier = riskMultiplier(initiative.risk_level, config);
  const time_multiplier = timeMultiplier(initiative.time_to_value_weeks, config);

  const denominator = risk_multiplier * time_multiplier;
  const raw = denominator > 0 && Number.isFinite(denominator)
    ? (impact_mid * initiative.confidence) / denominator
    : 0;

  return {
    impact_mid,
    risk_multiplier,
    time_multiplier,
    weighted_score: Number.isFinite(raw) && raw > 0 ? raw : 0,
  };
}
