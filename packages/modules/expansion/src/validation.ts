import { z } from 'zod';

/** Empty or `all` evaluates every branch. */
export const expansionParamsSchema = z.object({
  branch: z.string().trim().max(200).default(''),
});

export type ExpansionParamsInput = z.input<typeof expansionParamsSchema>;
