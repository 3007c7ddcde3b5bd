/**
 * Initiative Ranking — Public API
 *
 * Scores sized initiatives and orders them. Ordering is total and
 * independent of input order: score desc, impact_mid desc, then title,
 * category and description by code unit, then the canonical JSON of the
 * whole initiative.
 */

import type { RankingConfig } from "@/lib/configEngine/types";
import { validateRankingConfig } from "@/lib/configEngine/schema";
import { canonicalJson } from "@/lib/utils/canonicalHash";
import { compareCodeUnits } from "@/lib/utils/math";
import type { RankedInitiative, SizedInitiative } from "../types";
import { scoreInitiative } from "./score";

export { impactMid, riskMultiplier, timeMultiplier, scoreInitiative } from "./score";
export type { ScoreBreakdown } from "./score";

type Scored = { initiative: SizedInitiative; impact_mid: number; weighted_score: number };

export function compareScored(a: Scored, b: Scored): number {
  if (a.weighted_score !== b.weighted_score) return b.weighted_score - a.weighted_score;
  if (a.impact_mid !== b.impact_mid) return b.impact_mid - a.impact_mid;
  return (
    compareCodeUnits(a.initiative.title, b.initiative.title) ||
    compareCodeUnits(a.initiative.category, b.initiative.category) ||
    compareCodeUnits(a.initiative.description, b.initiative.description) ||
    compareCodeUnits(canonicalJson(a.initiative), canonicalJson(b.initiative))
  );
}

/**
 * Rank sized initiatives.
 *
 * Validates the configuration first and throws RankingConfigError before any
 * score is computed. Never mutates the input. Empty input → empty output.
 */
export function rankInitiatives(
  initiatives: readonly SizedInitiative[],
  config: RankingConfig,
): RankedInitiative[] {
  const validated = validateRankingConfig(config);

  const scored: Scored[] = initiatives.map((initiative) => {
    const { impact_mid, weighted_score } = scoreInitiative(initiative, validated);
    return { initiative, impact_mid, weighted_score };
  });

  return scored.sort(compareScored).map((s, i) => ({
    ...s.initiative,
    assumptions: [...s.initiative.assumptions],
    next_steps: [...s.initiative.next_steps],
    impact_mid: s.impact_mid,
    weighted_score: s.weighted_score,
    rank: i + 1,
  }));
}
