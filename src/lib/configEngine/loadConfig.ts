/**
 * Config Engine — Ranking Config Loader
 *
 * Reads the ranking settings file, merges it over the defaults, validates,
 * and returns a frozen RankingConfig. Missing file → defaults.
 * This is the only place the engine touches the filesystem.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { logEvent } from "@/lib/obs/log";
import { DEFAULT_RANKING_CONFIG, DEFAULT_RANKING_CONFIG_PATH } from "./defaults";
import { RankingConfigEnvSchema } from "./env";
import { RankingConfigError, resolveRankingConfig } from "./schema";
import type { RankingConfig } from "./types";

/**
 * Only MARGIN_LENS_RANKING_CONFIG is read here; other variables never
 * affect loading.
 */
function configPathFromEnv(env: NodeJS.ProcessEnv): string | undefined {
  const parsed = RankingConfigEnvSchema.safeParse({ MARGIN_LENS_RANKING_CONFIG: env.MARGIN_LENS_RANKING_CONFIG });
  if (!parsed.success) {
    throw new RankingConfigError(
      parsed.error.issues.map((i) => ({ path: `env.${i.path.join(".")}`, message: i.message })),
    );
  }
  return parsed.data.MARGIN_LENS_RANKING_CONFIG;
}

/**
 * Resolve which settings file to read: explicit argument, then
 * MARGIN_LENS_RANKING_CONFIG, then config/ranking.json under cwd.
 */
export function resolveRankingConfigPath(
  explicitPath?: string,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicitPath !== undefined) return resolve(cwd, explicitPath);
  return resolve(cwd, configPathFromEnv(env) ?? DEFAULT_RANKING_CONFIG_PATH);
}

export function loadRankingConfig(explicitPath?: string, cwd?: string, env?: NodeJS.ProcessEnv): RankingConfig {
  const path = resolveRankingConfigPath(explicitPath, cwd, env);

  if (!existsSync(path)) {
    if (explicitPath !== undefined) {
      throw new RankingConfigError([{ path: "(file)", message: `Settings file not found: ${path}` }]);
    }
    logEvent("debug", "rankingConfig", "no settings file, using defaults", { path });
    return DEFAULT_RANKING_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RankingConfigError([{ path: "(file)", message: `Unreadable settings file ${path}: ${message}` }]);
  }

  const config = resolveRankingConfig(raw);
  logEvent("debug", "rankingConfig", "loaded settings file", { path });
  return config;
}
