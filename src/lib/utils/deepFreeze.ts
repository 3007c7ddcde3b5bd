/**
 * Freezing of stage outputs.
 *
 * The P&L series, the diagnostics bundle, validated settings and the ranked
 * list are frozen in place before they are handed to the next stage. A
 * subtree that is already frozen (shared defaults, an earlier stage's
 * output embedded in a later one) is not walked again.
 */

function childrenOf(value: object): unknown[] {
  return Array.isArray(value) ? value : Object.values(value);
}

function freezeTree(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of childrenOf(value)) freezeTree(child);
}

/** Freezes `value` and everything reachable from it; returns the same reference. */
export function deepFreeze<T>(value: T): T {
  freezeTree(value);
  return value;
}

/** True when `value` and everything reachable from it is frozen. Primitives count as frozen. */
export function isDeepFrozen(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return true;
  return Object.isFrozen(value) && childrenOf(value).every(isDeepFrozen);
}
