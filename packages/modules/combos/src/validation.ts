import { z } from 'zod';
import { branchNameSchema, topKSchema } from '@branchlens/shared';

export const comboParamsSchema = z.object({
  branch: branchNameSchema.default('all'),
  topK: topKSchema.default(5),
  includeModifiers: z.boolean().default(false),
  minSupport: z.number().min(0).max(1).default(0.02),
  minConfidence: z.number().min(0).max(1).default(0.15),
  minLift: z.number().min(0).default(1.0),
});

export type ComboParamsInput = z.input<typeof comboParamsSchema>;
