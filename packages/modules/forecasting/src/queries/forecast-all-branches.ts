import { errorFields, getDataContext, listBranches, logger } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import { ConfigurationError, DataSchemaError, describeError, parseInput } from '@branchlens/shared';
import type { BranchError } from '@branchlens/shared';
import type { ForecastBatch, ForecastResult } from '../types';
import { forecastAllParamsSchema } from '../validation';
import type { ForecastAllParamsInput } from '../validation';
import { buildForecast, oneMonthDemand } from './forecast-branch-demand';

/**
 * Forecasts every known branch. A branch that fails is reported in
 * `errors` and the rest still return; configuration and schema errors
 * abort the whole batch.
 */
export function forecastAllBranches(
  input: ForecastAllParamsInput = {},
  ctx: DataContext = getDataContext(),
): ForecastBatch {
  const { horizonMonths } = parseInput(forecastAllParamsSchema, input, 'Invalid forecast parameters');
  const rows = ctx.monthlySales.get();
  const demand = oneMonthDemand(rows);

  const forecasts: ForecastResult[] = [];
  const errors: BranchError[] = [];

  for (const branch of listBranches(rows)) {
    try {
      forecasts.push(buildForecast(branch, rows, horizonMonths, demand));
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof DataSchemaError) throw err;
      logger.warn('Branch forecast failed', { branch, error: errorFields(err) });
      errors.push({ branch, error: describeError(err) });
    }
  }

  return { forecasts, errors };
}
