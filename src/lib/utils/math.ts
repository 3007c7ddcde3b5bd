/**
 * Numeric helpers shared by the analytics stages.
 */

/**
 * Round to `decimals` places. Never returns -0, so canonical JSON and
 * strict equality checks see a plain 0.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

/** Round to the nearest 1,000 (impact and cost estimates). */
export function roundToThousand(value: number): number {
  const rounded = Math.round(value / 1000) * 1000;
  return rounded === 0 ? 0 : rounded;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Thousands-separated whole-dollar string. Avoids toLocaleString so output
 * does not depend on the host's ICU data.
 */
export function formatUsd(value: number): string {
  const whole = Math.round(Math.abs(value)).toString();
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${value < 0 && whole !== "0" ? "-" : ""}$${grouped}`;
}

/**
 * Code-unit string comparison. Used instead of localeCompare wherever an
 * ordering has to be identical on every host.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
