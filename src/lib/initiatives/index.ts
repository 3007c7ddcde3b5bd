/**
 * Initiatives — Public API
 *
 * Hypothesis intake → sizing (stage 7) → ranking (stage 8).
 */

export type {
  InitiativeCategory,
  RiskLevel,
  InitiativeHypothesis,
  SizingBasis,
  SizedInitiative,
  SizingInputs,
  RankedInitiative,
} from "./types";
export { INITIATIVE_CATEGORIES, RISK_LEVELS } from "./types";

export { collectHypotheses, parseHypothesis, normalizeCategory } from "./hypotheses";
export type { HypothesisSourceResult } from "./hypotheses";

export { sizeInitiative, sizeInitiatives, runCategoryStrategy } from "./sizing";
export { rankInitiatives, scoreInitiative, impactMid } from "./ranking";
