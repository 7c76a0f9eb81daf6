export const MODULE_KEY = 'staffing' as const;
export const MODULE_NAME = 'Shift Staffing';

// ── Queries ───────────────────────────────────────────────────
export { recommendStaffing, isStaffingError } from './queries/recommend-staffing';

// ── Services (Pure Functions) ─────────────────────────────────
export {
  SHIFT_START_BOUNDARIES,
  MIN_DEMAND_FACTOR,
  MAX_DEMAND_FACTOR,
  LOW_SCENARIO_RATIO,
  HIGH_SCENARIO_RATIO,
  isShift,
  shiftForHour,
  shiftOf,
  dailyHeadcounts,
  baselineStaff,
  demandFactor,
  recommendHeadcount,
  scenarios,
} from './services/shift-demand';

// ── Validation ────────────────────────────────────────────────
export { DEFAULT_SHIFT, shiftSchema, staffingParamsSchema } from './validation';
export type { StaffingParamsInput } from './validation';

// ── Types ─────────────────────────────────────────────────────
export { SHIFTS } from './types';
export type { Shift, StaffingScenarios, StaffingResult, StaffingError } from './types';
