/**
 * Config Engine — Public API
 *
 * Ranking configuration and diagnostics settings: types, defaults,
 * validation and the settings-file loader.
 */

export type {
  RankingConfig,
  CostSplitBands,
  CompletenessWeights,
  DiagnosticsSettings,
  DiagnosticsSettingsOverride,
  ConfigIssue,
} from "./types";

export {
  DEFAULT_RANKING_CONFIG,
  DEFAULT_RANKING_CONFIG_PATH,
  DEFAULT_DIAGNOSTICS_SETTINGS,
} from "./defaults";

export {
  RankingConfigError,
  DiagnosticsSettingsError,
  RankingConfigSchema,
  DiagnosticsSettingsSchema,
  validateRankingConfig,
  resolveRankingConfig,
  resolveDiagnosticsSettings,
} from "./schema";

export { loadRankingConfig, resolveRankingConfigPath } from "./loadConfig";
export { engineEnv, LOG_LEVELS } from "./env";
export type { EngineEnv, LogLevel } from "./env";
