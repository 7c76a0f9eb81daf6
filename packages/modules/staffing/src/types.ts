import type { UnknownBranchResult } from '@branchlens/shared';

export const SHIFTS = ['morning', 'afternoon', 'evening', 'night'] as const;

export type Shift = (typeof SHIFTS)[number];

export interface StaffingScenarios {
  low: number;
  high: number;
}

export interface StaffingResult {
  branch: string;
  shift: Shift;
  /** Null when no attendance was observed for the branch and shift. */
  recommendedStaff: number | null;
  scenarios: StaffingScenarios | null;
  /** Mean distinct employees per observed day. */
  baselineStaff: number;
  /** Latest month relative to the branch's monthly mean, within [0.5, 2]. */
  demandFactor: number;
  avgHoursPerShift: number;
  daysObserved: number;
  explanation: string;
}

export type StaffingError = UnknownBranchResult;
