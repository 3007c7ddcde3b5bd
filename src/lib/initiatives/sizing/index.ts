/**
 * Initiative Sizing — Public API
 *
 * Deterministic sizing of externally proposed hypotheses. Dispatch is a
 * closed switch over InitiativeCategory. A strategy that cannot find its
 * data either sizes from a stand-in (flagged needs_data) or hands over to
 * the generic fallback. Sizing never throws.
 */

import type {
  InitiativeCategory,
  InitiativeHypothesis,
  SizedInitiative,
  SizingInputs,
} from "../types";
import { sizeWithGenericFallback } from "./fallback";
import { finalizeSizing } from "./shared";
import { sizeVendorInitiative } from "./strategies/vendor";
import { sizeHeadcountInitiative } from "./strategies/headcount";
import { sizePricingInitiative } from "./strategies/pricing";
import { sizeProcessInitiative } from "./strategies/process";
import { sizeOtherInitiative } from "./strategies/other";
import type { StrategyOutcome } from "./types";

export type { SizingEstimate, StrategyOutcome, CategoryProfile } from "./types";
export {
  CATEGORY_PROFILES,
  CONFIDENCE_FLOOR,
  CONFIDENCE_CEILING,
  FALLBACK_WIDENING,
  UNAVAILABLE_DIAGNOSTIC_FACTOR,
} from "./profiles";
export { sizeWithGenericFallback, fallbackConfidence } from "./fallback";
export { annualizedPnlScale, adjustConfidence, unavailableDiagnosticsFactor, finalizeSizing } from "./shared";

/**
 * Run the category's own strategy.
 */
export function runCategoryStrategy(category: InitiativeCategory, inputs: SizingInputs): StrategyOutcome {
  switch (category) {
    case "Vendor":
      return sizeVendorInitiative(inputs);
    case "Headcount":
      return sizeHeadcountInitiative(inputs);
    case "Pricing":
      return sizePricingInitiative(inputs);
    case "Process":
      return sizeProcessInitiative(inputs);
    case "Other":
      return sizeOtherInitiative(inputs);
  }
}

/**
 * Size one hypothesis.
 *
 * Pure function — deterministic, no side effects.
 */
export function sizeInitiative(hypothesis: InitiativeHypothesis, inputs: SizingInputs): SizedInitiative {
  const outcome = runCategoryStrategy(hypothesis.category, inputs);
  const { completeness } = inputs.diagnostics;
  const shared = {
    hypothesis,
    completenessScore: completeness.completeness_score,
    unavailableDiagnostics: completeness.insufficient_data,
    context: inputs.context,
  };

  switch (outcome.kind) {
    case "sized":
      return finalizeSizing({ ...shared, estimate: outcome.estimate, basis: hypothesis.category, needs_data: false });
    case "proxy":
      return finalizeSizing({ ...shared, estimate: outcome.estimate, basis: hypothesis.category, needs_data: true });
    case "needs_data":
      return finalizeSizing({
        ...shared,
        estimate: sizeWithGenericFallback(hypothesis.category, inputs, outcome.missing, outcome.next_steps),
        basis: "generic_fallback",
        needs_data: true,
      });
  }
}

/**
 * Size a list of hypotheses, preserving order. An empty list is valid.
 */
export function sizeInitiatives(
  hypotheses: readonly InitiativeHypothesis[],
  inputs: SizingInputs,
): SizedInitiative[] {
  return hypotheses.map((h) => sizeInitiative(h, inputs));
}
