import { getDataContext, listBranches, logger, resolveBranch } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import { mean, parseInput, round2, round4 } from '@branchlens/shared';
import type { StaffingError, StaffingResult } from '../types';
import { staffingParamsSchema } from '../validation';
import type { StaffingParamsInput } from '../validation';
import {
  baselineStaff,
  dailyHeadcounts,
  demandFactor,
  recommendHeadcount,
  scenarios,
  shiftOf,
} from '../services/shift-demand';

export function isStaffingError(result: StaffingResult | StaffingError): result is StaffingError {
  return 'error' in result;
}

/**
 * Staff needed on one shift at one branch. Known branches are those in
 * attendance or monthly sales; an unsupported shift label is a
 * ValidationError.
 */
export function recommendStaffing(
  input: StaffingParamsInput,
  ctx: DataContext = getDataContext(),
): StaffingResult | StaffingError {
  const { branch, shift } = parseInput(staffingParamsSchema, input, 'Invalid staffing parameters');
  const attendance = ctx.attendance.get();
  const monthly = ctx.monthlySales.get();
  const branches = listBranches([...attendance, ...monthly]);

  const resolution = resolveBranch(branch, branches);
  if (resolution.kind !== 'match') {
    return {
      branch,
      error: `Unknown branch '${branch}'. Available: ${branches.join(', ')}`,
      availableBranches: branches,
    };
  }
  const name = resolution.branch;

  const rows = attendance.filter((r) => r.branch === name && shiftOf(r) === shift);
  const factor = demandFactor(monthly, name);

  if (rows.length === 0) {
    return {
      branch: name,
      shift,
      recommendedStaff: null,
      scenarios: null,
      baselineStaff: 0,
      demandFactor: round4(factor),
      avgHoursPerShift: 0,
      daysObserved: 0,
      explanation: `No attendance records for the ${shift} shift at ${name}; staffing cannot be estimated.`,
    };
  }

  const baseline = baselineStaff(rows);
  const recommended = recommendHeadcount(baseline, factor);
  const range = scenarios(baseline, factor);
  const daysObserved = dailyHeadcounts(rows).size;

  logger.debug('Staffing recommended', { branch: name, shift, rows: rows.length, recommended });

  return {
    branch: name,
    shift,
    recommendedStaff: recommended,
    scenarios: range,
    baselineStaff: round2(baseline),
    demandFactor: round4(factor),
    avgHoursPerShift: round2(mean(rows.map((r) => r.durationHours))),
    daysObserved,
    explanation:
      `Recommended ${recommended} staff for the ${shift} shift at ${name}. ` +
      `Baseline ${round2(baseline)} employees per day over ${daysObserved} observed days, ` +
      `scaled by demand factor ${round4(factor)} (latest month vs monthly average). ` +
      `Scenarios: low ${range.low}, high ${range.high}.`,
  };
}
