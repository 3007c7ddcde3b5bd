import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EngineEnvSchema = z.object({
  // Path to the ranking settings JSON file
  MARGIN_LENS_RANKING_CONFIG: z.string().min(1).optional(),

  // Console log threshold
  MARGIN_LENS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Not branched on; any value is accepted
  NODE_ENV: z.string().optional(),
});

/** The one variable the settings-file loader reads. */
export const RankingConfigEnvSchema = EngineEnvSchema.pick({ MARGIN_LENS_RANKING_CONFIG: true });

export type EngineEnv = z.infer<typeof EngineEnvSchema>;

export function engineEnv(source: NodeJS.ProcessEnv = process.env): EngineEnv {
  const parsed = EngineEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid engine env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid engine environment variables (see logs).");
  }
  return parsed.data;
}
