import { z } from 'zod';
import { horizonMonthsSchema, topKSchema } from '@branchlens/shared';

export const INTENT_ACTIONS = ['combo', 'forecast', 'staffing', 'expansion', 'growth'] as const;

export const DEFAULT_HORIZON_MONTHS = 3;
export const DEFAULT_TOP_K = 5;

/** Parameter bundle produced by the question classifier. */
export const intentSchema = z.object({
  action: z.enum(INTENT_ACTIONS),
  branch: z.string().trim().max(200).optional(),
  shift: z.string().trim().min(1).optional(),
  horizonMonths: horizonMonthsSchema.default(DEFAULT_HORIZON_MONTHS),
  topK: topKSchema.default(DEFAULT_TOP_K),
  confidence: z.number().min(0).max(1).optional(),
});

export type IntentInput = z.input<typeof intentSchema>;
export type Intent = z.output<typeof intentSchema>;
export type IntentAction = Intent['action'];
