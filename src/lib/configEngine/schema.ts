/**
 * Config Engine — Validation
 *
 * zod schemas for the ranking configuration and diagnostics settings.
 * Invalid ranking configuration is the one fatal condition of the engine:
 * it throws before any score is computed.
 */

import { z } from "zod";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import { DEFAULT_DIAGNOSTICS_SETTINGS, DEFAULT_RANKING_CONFIG } from "./defaults";
import type {
  ConfigIssue,
  DiagnosticsSettings,
  DiagnosticsSettingsOverride,
  RankingConfig,
} from "./types";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class RankingConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid ranking configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`);
    this.name = "RankingConfigError";
    this.issues = issues;
  }
}

export class DiagnosticsSettingsError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Invalid diagnostics settings: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`);
    this.name = "DiagnosticsSettingsError";
    this.issues = issues;
  }
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((i) => ({
    path: i.path.length > 0 ? i.path.join(".") : "(root)",
    message: i.message,
  }));
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

const Multiplier = z.number().finite().positive();
const NonNegative = z.number().finite().nonnegative();

export const RankingConfigSchema = z
  .object({
    risk_multiplier_low: Multiplier,
    risk_multiplier_med: Multiplier,
    risk_multiplier_high: Multiplier,
    time_multiplier_base: NonNegative,
    time_multiplier_per_week: NonNegative,
  })
  .strict()
  .refine((c) => c.time_multiplier_base > 0 || c.time_multiplier_per_week > 0, {
    message: "time_multiplier_base and time_multiplier_per_week cannot both be 0",
    path: ["time_multiplier_base"],
  });

/**
 * Validate a complete ranking configuration.
 * Throws RankingConfigError listing every issue.
 */
export function validateRankingConfig(input: unknown): RankingConfig {
  const parsed = RankingConfigSchema.safeParse(input);
  if (!parsed.success) throw new RankingConfigError(toIssues(parsed.error));
  return deepFreeze(parsed.data);
}

/**
 * Merge a partial ranking configuration (e.g. a settings file that only
 * sets some keys) over the defaults, then validate.
 */
export function resolveRankingConfig(partial: unknown): RankingConfig {
  if (partial === undefined || partial === null) return DEFAULT_RANKING_CONFIG;
  if (typeof partial !== "object" || Array.isArray(partial)) {
    throw new RankingConfigError([{ path: "(root)", message: "Expected an object" }]);
  }
  return validateRankingConfig({ ...DEFAULT_RANKING_CONFIG, ...partial });
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

const Fraction = z.number().finite().min(0).max(1);
const Pct = z.number().finite().min(0).max(100);

const CostSplitBandsSchema = z
  .object({
    strong_r: z.number().finite().min(-1).max(1),
    moderate_r: z.number().finite().min(-1).max(1),
    strong_variable_pct: Pct,
    moderate_variable_pct: Pct,
    weak_variable_pct: Pct,
  })
  .strict()
  .refine((b) => b.moderate_r <= b.strong_r, {
    message: "moderate_r must not exceed strong_r",
    path: ["moderate_r"],
  });

const CompletenessWeightsSchema = z
  .object({
    month_coverage: NonNegative,
    dataset_presence: NonNegative,
  })
  .strict()
  .refine((w) => w.month_coverage + w.dataset_presence > 0, {
    message: "completeness weights cannot both be 0",
    path: ["month_coverage"],
  });

export const DiagnosticsSettingsSchema = z
  .object({
    z_threshold: z.number().finite().positive(),
    z_min_points: z.number().int().min(3),
    revenue_decline_threshold: Fraction,
    trend_deadband_pct: NonNegative,
    cost_split_bands: CostSplitBandsSchema,
    completeness_weights: CompletenessWeightsSchema,
  })
  .strict();

/**
 * Apply overrides to the diagnostics defaults and validate the result.
 * Throws DiagnosticsSettingsError on invalid values.
 */
export function resolveDiagnosticsSettings(
  override?: DiagnosticsSettingsOverride,
): DiagnosticsSettings {
  if (!override) return DEFAULT_DIAGNOSTICS_SETTINGS;

  const merged = {
    ...DEFAULT_DIAGNOSTICS_SETTINGS,
    ...override,
    cost_split_bands: { ...DEFAULT_DIAGNOSTICS_SETTINGS.cost_split_bands, ...override.cost_split_bands },
    completeness_weights: {
      ...DEFAULT_DIAGNOSTICS_SETTINGS.completeness_weights,
      ...override.completeness_weights,
    },
  };

  const parsed = DiagnosticsSettingsSchema.safeParse(merged);
  if (!parsed.success) throw new DiagnosticsSettingsError(toIssues(parsed.error));
  return deepFreeze(parsed.data);
}
