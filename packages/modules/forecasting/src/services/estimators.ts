/**
 * Demand Estimators — naive, weighted moving average, linear trend, ensemble
 *
 * Pure functions over a cleaned series of monthly totals (a handful of
 * months per branch).
 */

import {
  fitLinearTrend,
  mean,
  median,
  periodOverPeriodPct,
  round2,
  safeDivide,
} from '@branchlens/shared';
import type { ConfidenceLabel, TrendLabel } from '../types';

// ── Constants ────────────────────────────────────────────────────────────────

/** Points below this share of the median are treated as incomplete periods. */
export const ANOMALY_MEDIAN_RATIO = 0.15;
export const MIN_POINTS_FOR_ANOMALY_SCREEN = 3;
export const WMA_WINDOW = 4;
/** Relative slope (slope / mean) above which a series is growing. */
export const TREND_THRESHOLD = 0.1;

// ── Anomaly Screen ───────────────────────────────────────────────────────────

/** Indices of values below 15% of the series median; none for short or zero-median series. */
export function detectAnomalies(values: readonly number[]): number[] {
  if (values.length < MIN_POINTS_FOR_ANOMALY_SCREEN) return [];
  const mid = median(values);
  if (mid === 0) return [];
  const floor = ANOMALY_MEDIAN_RATIO * mid;
  const flagged: number[] = [];
  values.forEach((v, i) => {
    if (v < floor) flagged.push(i);
  });
  return flagged;
}

export function withoutIndices(values: readonly number[], indices: readonly number[]): number[] {
  const drop = new Set(indices);
  return values.filter((_, i) => !drop.has(i));
}

// ── Estimators ───────────────────────────────────────────────────────────────

/** Last observed value carried forward. */
export function naiveEstimate(values: readonly number[]): number {
  return values[values.length - 1] ?? 0;
}

/** Weights 1..w over the last w values (w ≤ 4), most recent heaviest. */
export function weightedMovingAverage(values: readonly number[], window: number = WMA_WINDOW): number {
  const n = Math.min(values.length, window);
  if (n === 0) return 0;
  const recent = values.slice(values.length - n);
  let weighted = 0;
  let weightSum = 0;
  recent.forEach((v, i) => {
    weighted += v * (i + 1);
    weightSum += i + 1;
  });
  return safeDivide(weighted, weightSum);
}

/** OLS line over the index, extrapolated `horizon` steps past the last point, clamped at 0. */
export function trendForecast(values: readonly number[], horizon: number): number[] {
  if (values.length === 0) return new Array<number>(horizon).fill(0);
  const { slope, intercept } = fitLinearTrend(values);
  const last = values.length - 1;
  return Array.from({ length: horizon }, (_, h) => Math.max(0, intercept + slope * (last + h + 1)));
}

/** Unrounded mean of the three one-step-ahead estimates. */
export function oneStepEnsemble(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return mean([naiveEstimate(values), weightedMovingAverage(values), trendForecast(values, 1)[0] ?? 0]);
}

export function ensemble(naive: number, wma: number, trend: number): number {
  return round2((naive + wma + trend) / 3);
}

// ── Labels ───────────────────────────────────────────────────────────────────

export function classifyTrend(values: readonly number[]): TrendLabel {
  if (values.length < 2) return 'insufficient data';
  const avg = mean(values);
  if (avg === 0) return 'stable';
  const relative = fitLinearTrend(values).slope / avg;
  if (relative > TREND_THRESHOLD) return 'growing';
  if (relative < -TREND_THRESHOLD) return 'declining';
  return 'stable';
}

/** From the raw point count, anomalies included. */
export function confidenceFor(points: number): ConfidenceLabel {
  if (points >= 6) return 'medium';
  if (points >= 4) return 'low-medium';
  return 'low';
}

/** Mean of successive % changes (each rounded to 2 dp), skipping zero predecessors. */
export function averageMomGrowth(values: readonly number[]): number | null {
  const changes = periodOverPeriodPct(values).map(round2);
  return changes.length > 0 ? round2(mean(changes)) : null;
}
