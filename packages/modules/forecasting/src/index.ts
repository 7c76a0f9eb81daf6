export const MODULE_KEY = 'forecasting' as const;
export const MODULE_NAME = 'Demand Forecasting';

// ── Queries ───────────────────────────────────────────────────
export {
  forecastBranchDemand,
  buildForecast,
  oneMonthDemand,
  demandIndexFor,
  isForecastError,
} from './queries/forecast-branch-demand';
export { forecastAllBranches } from './queries/forecast-all-branches';

// ── Services (Pure Functions) ─────────────────────────────────
export {
  ANOMALY_MEDIAN_RATIO,
  MIN_POINTS_FOR_ANOMALY_SCREEN,
  WMA_WINDOW,
  TREND_THRESHOLD,
  detectAnomalies,
  withoutIndices,
  naiveEstimate,
  weightedMovingAverage,
  trendForecast,
  oneStepEnsemble,
  ensemble,
  classifyTrend,
  confidenceFor,
  averageMomGrowth,
} from './services/estimators';

// ── Validation ────────────────────────────────────────────────
export {
  DEFAULT_HORIZON_MONTHS,
  forecastParamsSchema,
  forecastAllParamsSchema,
} from './validation';
export type { ForecastParamsInput, ForecastAllParamsInput } from './validation';

// ── Types ─────────────────────────────────────────────────────
export type {
  TrendLabel,
  ConfidenceLabel,
  ForecastPoint,
  HistoryPoint,
  ForecastResult,
  ForecastError,
  ForecastBatch,
} from './types';
