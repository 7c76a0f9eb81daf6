/**
 * Shift staffing from attendance and monthly demand.
 *
 *   baseline      = mean distinct employees per day on the shift
 *   demand factor = latest monthly total / mean monthly total, within [0.5, 2]
 *   recommended   = max(1, ceil(baseline × factor))
 */

import type { AttendanceRow, MonthlySalesRow } from '@branchlens/core';
import { branchSeries } from '@branchlens/core';
import { clamp, mean, safeDivide } from '@branchlens/shared';
import { SHIFTS } from '../types';
import type { Shift, StaffingScenarios } from '../types';

// ── Constants ────────────────────────────────────────────────────────

/** Punch-in hour before which a shift starts; checked in order. */
export const SHIFT_START_BOUNDARIES: ReadonlyArray<readonly [number, Shift]> = [
  [5, 'night'],
  [12, 'morning'],
  [17, 'afternoon'],
  [22, 'evening'],
];

export const MIN_DEMAND_FACTOR = 0.5;
export const MAX_DEMAND_FACTOR = 2;
export const LOW_SCENARIO_RATIO = 0.85;
export const HIGH_SCENARIO_RATIO = 1.2;

// ── Shift assignment ─────────────────────────────────────────────────

export function isShift(value: string): value is Shift {
  return SHIFTS.some((s) => s === value);
}

export function shiftForHour(hour: number): Shift {
  for (const [before, shift] of SHIFT_START_BOUNDARIES) {
    if (hour < before) return shift;
  }
  return 'night';
}

/** The row's own shift label wins; otherwise the punch-in hour decides. */
export function shiftOf(row: AttendanceRow): Shift | null {
  if (row.shift !== null && isShift(row.shift)) return row.shift;
  return row.punchInHour === null ? null : shiftForHour(row.punchInHour);
}

// ── Estimators ───────────────────────────────────────────────────────

/** Distinct employees per punch-in date. */
export function dailyHeadcounts(rows: readonly AttendanceRow[]): Map<string, number> {
  const perDay = new Map<string, Set<string>>();
  for (const row of rows) {
    let staff = perDay.get(row.punchInDate);
    if (!staff) {
      staff = new Set();
      perDay.set(row.punchInDate, staff);
    }
    staff.add(row.empId);
  }
  return new Map([...perDay].map(([day, staff]) => [day, staff.size]));
}

export function baselineStaff(rows: readonly AttendanceRow[]): number {
  return mean([...dailyHeadcounts(rows).values()]);
}

/** 1 when the branch has no monthly history. */
export function demandFactor(monthly: readonly MonthlySalesRow[], branch: string): number {
  const totals = branchSeries(monthly, branch).map((r) => r.total);
  const latest = totals[totals.length - 1];
  if (latest === undefined) return 1;
  return clamp(safeDivide(latest, mean(totals), 1), MIN_DEMAND_FACTOR, MAX_DEMAND_FACTOR);
}

export function recommendHeadcount(baseline: number, factor: number): number {
  return Math.max(1, Math.ceil(baseline * factor));
}

export function scenarios(baseline: number, factor: number): StaffingScenarios {
  const expected = baseline * factor;
  return {
    low: Math.max(1, Math.ceil(expected * LOW_SCENARIO_RATIO)),
    high: Math.ceil(expected * HIGH_SCENARIO_RATIO),
  };
}
