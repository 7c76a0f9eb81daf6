import { z } from 'zod';
import { ALL_BRANCHES } from '@branchlens/shared';

export const growthParamsSchema = z.object({
  branch: z.string().trim().max(200).default(ALL_BRANCHES),
});

export type GrowthParamsInput = z.input<typeof growthParamsSchema>;
