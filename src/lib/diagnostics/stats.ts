/**
 * Diagnostics — Closed-form Statistics
 *
 * Mean, population standard deviation, z-scores, Pearson correlation and
 * ordinary least squares against an index. No iterative solvers.
 * Every helper returns null instead of NaN/Infinity on degenerate input.
 */

import { sum } from "@/lib/utils/math";

/** Standard deviation below this, relative to |mean|, is treated as zero. */
const ZERO_VARIANCE_EPSILON = 1e-12;

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return sum(values) / values.length;
}

export function populationStdDev(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null) return null;
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  const sd = Math.sqrt(ss / values.length);
  return sd <= ZERO_VARIANCE_EPSILON * Math.max(1, Math.abs(m)) ? 0 : sd;
}

export interface ZScoreSeries {
  mean: number;
  std_dev: number;
  z_scores: number[];
}

/**
 * z_i = (x_i - mean) / stddev. Null when the series has fewer than
 * `minPoints` values or zero variance.
 */
export function zScores(values: readonly number[], minPoints = 3): ZScoreSeries | null {
  if (values.length < minPoints) return null;
  const m = mean(values);
  const sd = populationStdDev(values);
  if (m === null || sd === null || sd === 0) return null;
  return { mean: m, std_dev: sd, z_scores: values.map((v) => (v - m) / sd) };
}

/**
 * Pearson correlation coefficient. Null when the series lengths differ,
 * fewer than 2 points, or either series has zero variance.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  if (xs.length !== ys.length || xs.length < 2) return null;
  const mx = mean(xs);
  const my = mean(ys);
  const sx = populationStdDev(xs);
  const sy = populationStdDev(ys);
  if (mx === null || my === null || !sx || !sy) return null;

  let cov = 0;
  for (let i = 0; i < xs.length; i++) cov += (xs[i] - mx) * (ys[i] - my);
  cov /= xs.length;

  const r = cov / (sx * sy);
  // float error can push |r| a hair past 1
  return Math.max(-1, Math.min(1, r));
}

export interface LinearFit {
  slope: number;
  intercept: number;
  r_squared: number;
}

/**
 * OLS of y against x = 0..n-1:
 *   slope = Σ(x-x̄)(y-ȳ) / Σ(x-x̄)²
 *   intercept = ȳ - slope·x̄
 *   r² = 1 - SS_res / SS_tot  (0 when SS_tot = 0)
 * Null for fewer than 2 points.
 */
export function linearFitByIndex(ys: readonly number[]): LinearFit | null {
  const n = ys.length;
  if (n < 2) return null;

  const xBar = (n - 1) / 2;
  const yBar = sum(ys) / n;

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < n; i++) {
    sxy += (i - xBar) * (ys[i] - yBar);
    sxx += (i - xBar) ** 2;
  }

  const slope = sxy / sxx;
  const intercept = yBar - slope * xBar;

  let ssRes = 0;
  let ssTot = 0;
  for (let i = 0; i < n; i++) {
    ssRes += (ys[i] - (slope * i + intercept)) ** 2;
    ssTot += (ys[i] - yBar) ** 2;
  }
  const r_squared = ssTot > 0 ? Math.max(0, 1 - ssRes / ssTot) : 0;

  return { slope, intercept, r_squared };
}
