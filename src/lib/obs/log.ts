/**
 * Console logging with bracketed module tags ("[pipeline] ...").
 *
 * Lines go to stderr; stdout is reserved for CLI output. The threshold comes
 * from MARGIN_LENS_LOG_LEVEL and defaults to "warn"; unrecognized values
 * fall back to the default.
 */

import { LOG_LEVELS, type LogLevel } from "@/lib/configEngine/env";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

export function activeLogLevel(source: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = source.MARGIN_LENS_LOG_LEVEL;
  return raw !== undefined && isLogLevel(raw) ? raw : DEFAULT_LEVEL;
}

export function shouldLog(level: Exclude<LogLevel, "silent">, threshold: LogLevel = activeLogLevel()): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function logEvent(
  level: Exclude<LogLevel, "silent">,
  tag: string,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (!shouldLog(level)) return;
  const line = `[${tag}] ${message}`;
  if (level === "warn") {
    if (meta) console.warn(line, meta);
    else console.warn(line);
    return;
  }
  if (meta) console.error(line, meta);
  else console.error(line);
}
