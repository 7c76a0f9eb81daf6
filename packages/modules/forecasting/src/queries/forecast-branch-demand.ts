import { branchSeries, getDataContext, listBranches, logger, resolveBranch } from '@branchlens/core';
import type { DataContext, MonthlySalesRow } from '@branchlens/core';
import {
  formatCount,
  monthNameAfter,
  parseInput,
  round2,
  round4,
  safeDivide,
  sum,
} from '@branchlens/shared';
import type { ForecastError, ForecastPoint, ForecastResult } from '../types';
import { forecastParamsSchema } from '../validation';
import type { ForecastParamsInput } from '../validation';
import {
  WMA_WINDOW,
  averageMomGrowth,
  classifyTrend,
  confidenceFor,
  detectAnomalies,
  ensemble,
  naiveEstimate,
  oneStepEnsemble,
  trendForecast,
  weightedMovingAverage,
  withoutIndices,
} from '../services/estimators';

/** December, when the last month label cannot be read. */
const FALLBACK_LAST_MONTH = 11;

export function isForecastError(result: ForecastResult | ForecastError): result is ForecastError {
  return 'error' in result;
}

/** Each branch's unrounded one-month-ahead ensemble, screened on its own series. */
export function oneMonthDemand(rows: readonly MonthlySalesRow[]): Map<string, number> {
  const demand = new Map<string, number>();
  for (const branch of listBranches(rows)) {
    const values = branchSeries(rows, branch).map((r) => r.total);
    demand.set(branch, oneStepEnsemble(withoutIndices(values, detectAnomalies(values))));
  }
  return demand;
}

export function demandIndexFor(branch: string, demand: ReadonlyMap<string, number>): number {
  return round4(safeDivide(demand.get(branch) ?? 0, sum([...demand.values()])));
}

function periodLabel(rows: readonly MonthlySalesRow[]): string {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (!first || !last) return 'no data';
  const short = (r: MonthlySalesRow) => r.month.slice(0, 3);
  return first.year === last.year
    ? `${short(first)}–${short(last)} ${last.year}`
    : `${short(first)} ${first.year}–${short(last)} ${last.year}`;
}

/**
 * Builds the forecast for a known branch. `demand` is the cross-branch
 * one-month demand map, passed in so a batch computes it once.
 */
export function buildForecast(
  branch: string,
  rows: readonly MonthlySalesRow[],
  horizonMonths: number,
  demand: ReadonlyMap<string, number>,
): ForecastResult {
  const series = branchSeries(rows, branch);
  const raw = series.map((r) => r.total);

  const anomalies = detectAnomalies(raw);
  const anomalyNotes = anomalies.map((i) => {
    const point = series[i];
    const month = point?.month ?? 'Unknown';
    return (
      `${month} value (${formatCount(raw[i] ?? 0)}) looks anomalously low ` +
      `(< 15% of median) — likely incomplete data. Excluded from forecast.`
    );
  });
  const values = withoutIndices(raw, anomalies);

  const naive = naiveEstimate(values);
  const wma = weightedMovingAverage(values);
  const trend = trendForecast(values, horizonMonths);

  const lastMonth = series[series.length - 1]?.monthIndex ?? FALLBACK_LAST_MONTH;
  const forecasts: ForecastPoint[] = trend.map((t, i) => ({
    month: monthNameAfter(lastMonth, i + 1),
    naive: round2(naive),
    wma: round2(wma),
    trend: round2(t),
    ensemble: ensemble(naive, wma, t),
  }));

  const trendLabel = classifyTrend(values);
  const avgMomGrowthPct = averageMomGrowth(values);

  const parts = [
    `Forecast for ${branch} over next ${horizonMonths} month(s).`,
    `Based on ${series.length} months of historical data (${periodLabel(series)}).`,
    `Methods: Naive baseline, Weighted Moving Average (window=${WMA_WINDOW}), Linear Trend Regression.`,
    'Ensemble forecast = average of all three methods.',
    ...anomalyNotes,
    avgMomGrowthPct === null
      ? `Trend classification: ${trendLabel}.`
      : `Trend classification: ${trendLabel}. Average month-over-month growth (clean): ${avgMomGrowthPct}%.`,
  ];

  return {
    branch,
    horizonMonths,
    trend: trendLabel,
    confidence: confidenceFor(series.length),
    demandIndex: demandIndexFor(branch, demand),
    avgMomGrowthPct,
    history: series.map((r) => ({ month: r.month, year: r.year, total: round2(r.total) })),
    forecasts,
    anomalyNotes: anomalyNotes.length > 0 ? anomalyNotes : null,
    explanation: parts.join(' '),
  };
}

/**
 * Demand forecast for one branch over `horizonMonths` (1–12).
 * An unknown branch yields an error record listing the valid names.
 */
export function forecastBranchDemand(
  input: ForecastParamsInput,
  ctx: DataContext = getDataContext(),
): ForecastResult | ForecastError {
  const { branch, horizonMonths } = parseInput(forecastParamsSchema, input, 'Invalid forecast parameters');
  const rows = ctx.monthlySales.get();
  const branches = listBranches(rows);

  const resolution = resolveBranch(branch, branches);
  if (resolution.kind !== 'match') {
    return {
      branch,
      error: `Unknown branch '${branch}'. Available: ${branches.join(', ')}`,
      availableBranches: branches,
    };
  }

  const result = buildForecast(resolution.branch, rows, horizonMonths, oneMonthDemand(rows));
  logger.debug('Demand forecast built', {
    branch: result.branch,
    horizonMonths,
    points: result.history.length,
    anomalies: result.anomalyNotes?.length ?? 0,
  });
  return result;
}
