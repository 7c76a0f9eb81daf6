import { z } from 'zod';
import { branchNameSchema } from '@branchlens/shared';
import { SHIFTS } from './types';

export const DEFAULT_SHIFT = 'evening' as const;

export const shiftSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(SHIFTS, { errorMap: () => ({ message: `Shift must be one of: ${SHIFTS.join(', ')}` }) }));

export const staffingParamsSchema = z.object({
  branch: branchNameSchema,
  shift: shiftSchema.default(DEFAULT_SHIFT),
});

export type StaffingParamsInput = z.input<typeof staffingParamsSchema>;
