/**
 * Canonical Output Hashing
 *
 * Deterministic serialization + SHA-256 for analysis outputs.
 * Object keys are sorted recursively so that two runs over the same
 * snapshot produce byte-identical JSON and the same hash.
 */

import { createHash } from "node:crypto";

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

/**
 * Recursively sort object keys. Undefined-valued keys are dropped, matching
 * what JSON.stringify would do, so the canonical form is stable either way.
 */
export function canonicalize(val: unknown): unknown {
  if (Array.isArray(val)) return val.map(canonicalize);
  if (!isRecord(val)) return val;

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(val).sort()) {
    const child = val[key];
    if (child === undefined) continue;
    sorted[key] = canonicalize(child);
  }
  return sorted;
}

/**
 * Canonical JSON of any output value.
 */
export function canonicalJson(val: unknown): string {
  return JSON.stringify(canonicalize(val));
}

/**
 * SHA-256 hash of canonical outputs (replay determinism proof).
 */
export function hashOutputs(outputs: unknown): string {
  return createHash("sha256").update(canonicalJson(outputs), "utf8").digest("hex");
}
