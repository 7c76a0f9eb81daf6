import { z } from 'zod';
import { branchNameSchema, horizonMonthsSchema } from '@branchlens/shared';

export const DEFAULT_HORIZON_MONTHS = 3;

export const forecastParamsSchema = z.object({
  branch: branchNameSchema,
  horizonMonths: horizonMonthsSchema.default(DEFAULT_HORIZON_MONTHS),
});

export type ForecastParamsInput = z.input<typeof forecastParamsSchema>;

export const forecastAllParamsSchema = z.object({
  horizonMonths: horizonMonthsSchema.default(DEFAULT_HORIZON_MONTHS),
});

export type ForecastAllParamsInput = z.input<typeof forecastAllParamsSchema>;
