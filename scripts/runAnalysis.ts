/**
 * Run One Analysis From JSON Files
 *
 * Reads an input snapshot, an optional hypotheses file and an optional
 * ranking settings file, runs the pipeline, and prints the result JSON to
 * stdout. Log lines go to stderr.
 *
 * Exit codes:
 *   0  — OK
 *   1  — Bad arguments, unreadable or invalid snapshot, duplicate GL month,
 *        or invalid ranking configuration
 *
 * Usage:
 *   npx tsx scripts/runAnalysis.ts --snapshot snapshot.json
 *   npx tsx scripts/runAnalysis.ts --snapshot snapshot.json --hypotheses hypotheses.json
 *   npx tsx scripts/runAnalysis.ts --snapshot snapshot.json --config config/ranking.json
 *   npx tsx scripts/runAnalysis.ts --snapshot snapshot.json --prompt-context
 *   npx tsx scripts/runAnalysis.ts --help
 *
 * Env vars:
 *   MARGIN_LENS_RANKING_CONFIG  settings file used when --config is absent
 *   MARGIN_LENS_LOG_LEVEL       debug | info | warn | error | silent (default: warn)
 */

import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { completeAnalysis, prepareAnalysis } from "@/lib/pipeline";
import { parseInputSnapshot } from "@/lib/snapshot";
import type { InputSnapshot } from "@/lib/snapshot";
import { collectHypotheses } from "@/lib/initiatives";
import type { HypothesisSourceResult, InitiativeHypothesis } from "@/lib/initiatives";
import { RankingConfigError, loadRankingConfig } from "@/lib/configEngine";
import { logEvent } from "@/lib/obs/log";

// ── CLI arg parsing ─────────────────────────────────────────────────────────

export interface CliArgs {
  snapshot?: string;
  hypotheses?: string;
  config?: string;
  promptContext: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const VALUE_FLAGS = ["--snapshot", "--hypotheses", "--config"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((f) => f === arg);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { promptContext: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--prompt-context") {
      args.promptContext = true;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`Missing value for ${arg}`);
      }
      if (arg === "--snapshot") args.snapshot = value;
      else if (arg === "--hypotheses") args.hypotheses = value;
      else args.config = value;
      i++;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!args.help && args.snapshot === undefined) {
    throw new CliUsageError("--snapshot is required");
  }
  return args;
}

function printHelp(): void {
  console.log(`
Margin Analysis
===============
Reconstructs the monthly P&L from a snapshot, runs diagnostics, sizes and
ranks the supplied initiative hypotheses, and prints the result as JSON.

Exit codes:
  0  — OK
  1  — Bad arguments, invalid snapshot, duplicate GL month, or invalid
       ranking configuration

Usage:
  npx tsx scripts/runAnalysis.ts --snapshot FILE [options]

Options:
  --snapshot FILE     Input snapshot JSON (gl, payroll?, vendors?, segments?, context?)
  --hypotheses FILE   Hypotheses JSON: an array, or { "hypotheses": [...] }
  --config FILE       Ranking settings JSON (default: config/ranking.json)
  --prompt-context    Print the text context for the hypothesis generator and stop
  --help              Show this help text

Env vars:
  MARGIN_LENS_RANKING_CONFIG  settings file used when --config is absent
  MARGIN_LENS_LOG_LEVEL       debug | info | warn | error | silent (default: warn)
`);
}

// ── File loading ────────────────────────────────────────────────────────────

export class SnapshotFileError extends Error {
  public readonly path: string;
  public readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Invalid snapshot ${path}: ${issues.join("; ")}`);
    this.name = "SnapshotFileError";
    this.path = path;
    this.issues = issues;
  }
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

export function loadSnapshot(path: string): InputSnapshot {
  let raw: unknown;
  try {
    raw = readJson(path);
  } catch (err) {
    throw new SnapshotFileError(path, [errorMessage(err)]);
  }

  const parsed = parseInputSnapshot(raw);
  if (!parsed.ok) throw new SnapshotFileError(path, parsed.issues);
  return parsed.snapshot;
}

/**
 * The hypotheses file stands in for the generator's response, so a bad
 * file degrades to zero hypotheses instead of failing the run.
 */
export function readHypothesisSource(path: string): HypothesisSourceResult {
  let raw: unknown;
  try {
    raw = readJson(path);
  } catch (err) {
    return { ok: false, error: new Error(`Unreadable hypotheses file ${path}: ${errorMessage(err)}`) };
  }

  if (Array.isArray(raw)) return { ok: true, hypotheses: raw };
  if (isRecord(raw) && Array.isArray(raw.hypotheses)) return { ok: true, hypotheses: raw.hypotheses };
  return {
    ok: false,
    error: new Error(`Hypotheses file ${path} must hold an array or { "hypotheses": [...] }`),
  };
}

export function loadHypotheses(path: string | undefined): InitiativeHypothesis[] {
  if (path === undefined) {
    logEvent("info", "runAnalysis", "no hypotheses file; ranking will be empty");
    return [];
  }
  return collectHypotheses(readHypothesisSource(path));
}

// ── Run ─────────────────────────────────────────────────────────────────────

/**
 * Everything main() does short of writing to stdout. Returns the text to
 * print.
 */
export function runFromArgs(args: CliArgs): string {
  if (args.snapshot === undefined) throw new CliUsageError("--snapshot is required");

  const snapshot = loadSnapshot(args.snapshot);
  const prepared = prepareAnalysis(snapshot);

  if (args.promptContext) {
    const { pnl_summary, diagnostics_summary, company_context } = prepared.prompt_context;
    return [
      "## P&L Summary",
      pnl_summary,
      "",
      "## Diagnostics",
      diagnostics_summary,
      "",
      "## Company Context",
      company_context,
    ].join("\n");
  }

  const rankingConfig = loadRankingConfig(args.config);
  const hypotheses = loadHypotheses(args.hypotheses);
  const result = completeAnalysis(prepared, hypotheses, rankingConfig);

  return JSON.stringify(
    {
      output_hash: result.output_hash,
      pnl: result.pnl,
      diagnostics: result.diagnostics,
      initiatives: result.initiatives,
    },
    null,
    2,
  );
}

export function main(argv: readonly string[] = process.argv.slice(2)): number {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(`[runAnalysis] ${errorMessage(err)}`);
    console.error("[runAnalysis] Run with --help for usage.");
    return 1;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  try {
    process.stdout.write(`${runFromArgs(args)}\n`);
    return 0;
  } catch (err) {
    console.error(`[runAnalysis] ${errorMessage(err)}`);
    if (err instanceof RankingConfigError || err instanceof SnapshotFileError) {
      for (const issue of err.issues) {
        console.error(`[runAnalysis]   - ${typeof issue === "string" ? issue : `${issue.path}: ${issue.message}`}`);
      }
    }
    return 1;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = main();
}
