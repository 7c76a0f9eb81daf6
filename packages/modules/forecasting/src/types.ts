import type { BranchError, UnknownBranchResult } from '@branchlens/shared';

export type TrendLabel = 'growing' | 'stable' | 'declining' | 'insufficient data';

export type ConfidenceLabel = 'low' | 'low-medium' | 'medium';

export interface ForecastPoint {
  month: string;
  naive: number;
  wma: number;
  trend: number;
  ensemble: number;
}

export interface HistoryPoint {
  month: string;
  year: number;
  total: number;
}

export interface ForecastResult {
  branch: string;
  horizonMonths: number;
  trend: TrendLabel;
  confidence: ConfidenceLabel;
  /** Share of the cross-branch one-month-ahead ensemble (0–1). */
  demandIndex: number;
  /** Percent, 0–100 scale; null when no successive pair has a non-zero predecessor. */
  avgMomGrowthPct: number | null;
  /** Raw observations, anomalies included. */
  history: HistoryPoint[];
  forecasts: ForecastPoint[];
  anomalyNotes: string[] | null;
  explanation: string;
}

export type ForecastError = UnknownBranchResult;

export interface ForecastBatch {
  forecasts: ForecastResult[];
  errors: BranchError[];
}
