/**
 * Numeric helpers shared by the analytics engines.
 *
 * Every ratio in a result record goes through `safeDivide`, so NaN and
 * Infinity never leave an engine.
 */

export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
  // normalise -0
  return rounded === 0 ? 0 : rounded;
}

/** Growth percentages and hours: 1 decimal place. */
export function round1(value: number): number {
  return roundTo(value, 1);
}

/** Money and scores: 2 decimal places. */
export function round2(value: number): number {
  return roundTo(value, 2);
}

/** Support, confidence, lift and other fractions: 4 decimal places. */
export function round4(value: number): number {
  return roundTo(value, 4);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  if (denominator === 0 || !Number.isFinite(denominator)) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Arithmetic mean; `fallback` for an empty list. */
export function mean(values: readonly number[], fallback = 0): number {
  return values.length === 0 ? fallback : sum(values) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? 0;
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}

export interface LinearFit {
  slope: number;
  intercept: number;
}

/**
 * Ordinary least squares of `values` against the zero-based index.
 * A single point gives a flat line through it; an empty list gives 0/0.
 */
export function fitLinearTrend(values: readonly number[]): LinearFit {
  const n = values.length;
  if (n === 0) return { slope: 0, intercept: 0 };
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let sxy = 0;
  let sxx = 0;
  values.forEach((y, x) => {
    sxy += (x - xMean) * (y - yMean);
    sxx += (x - xMean) ** 2;
  });
  const slope = safeDivide(sxy, sxx, 0);
  return { slope, intercept: yMean - slope * xMean };
}

/** Percentage change between consecutive values, skipping zero predecessors. */
export function periodOverPeriodPct(values: readonly number[]): number[] {
  const changes: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1] ?? 0;
    const curr = values[i] ?? 0;
    if (prev === 0) continue;
    changes.push(((curr - prev) / prev) * 100);
  }
  return changes;
}
