/**
 * Initiatives — Hypothesis Intake
 *
 * The hypothesis generator is an external, failure-prone collaborator. Its
 * result is collapsed here into a plain list before anything reaches the
 * sizer: a failed call becomes an empty list, malformed entries are dropped,
 * and unknown categories become "Other".
 */

import { z } from "zod";
import { logEvent } from "@/lib/obs/log";
import { INITIATIVE_CATEGORIES } from "./types";
import type { InitiativeCategory, InitiativeHypothesis } from "./types";

export type HypothesisSourceResult =
  | { ok: true; hypotheses: readonly unknown[] }
  | { ok: false; error: Error };

const CATEGORY_ALIASES = new Map<string, InitiativeCategory>([
  ["vendor", "Vendor"],
  ["vendors", "Vendor"],
  ["procurement", "Vendor"],
  ["headcount", "Headcount"],
  ["staffing", "Headcount"],
  ["workforce", "Headcount"],
  ["pricing", "Pricing"],
  ["price", "Pricing"],
  ["process", "Process"],
  ["efficiency", "Process"],
  ["operations", "Process"],
  ["other", "Other"],
]);

export function normalizeCategory(raw: string | null | undefined): InitiativeCategory {
  if (raw === undefined || raw === null) return "Other";
  const exact = INITIATIVE_CATEGORIES.find((c) => c === raw);
  if (exact) return exact;
  return CATEGORY_ALIASES.get(raw.trim().toLowerCase()) ?? "Other";
}

const HypothesisSchema = z.object({
  title: z.string().trim().min(1),
  category: z.string().nullish(),
  description: z.string().nullish(),
  owner: z.string().nullish(),
  data_evidence: z.array(z.string()).nullish(),
});

/**
 * Parse one untrusted hypothesis. Returns null when it has no usable title.
 * Numeric fields, if the generator sent any, are not carried over.
 */
export function parseHypothesis(input: unknown): InitiativeHypothesis | null {
  const parsed = HypothesisSchema.safeParse(input);
  if (!parsed.success) return null;

  const { title, category, description, owner, data_evidence } = parsed.data;
  const out: InitiativeHypothesis = {
    title,
    category: normalizeCategory(category),
    description: description ?? "",
  };
  if (owner !== undefined && owner !== null) out.owner = owner;
  if (data_evidence !== undefined && data_evidence !== null) out.data_evidence = data_evidence;
  return out;
}

/**
 * Collapse the generator's result into a list of hypotheses.
 */
export function collectHypotheses(result: HypothesisSourceResult): InitiativeHypothesis[] {
  if (!result.ok) {
    logEvent("warn", "hypotheses", "hypothesis source failed; continuing with none", {
      error: result.error.message,
    });
    return [];
  }

  const out: InitiativeHypothesis[] = [];
  result.hypotheses.forEach((raw, index) => {
    const h = parseHypothesis(raw);
    if (h) out.push(h);
    else logEvent("warn", "hypotheses", "dropped malformed hypothesis", { index });
  });
  return out;
}
