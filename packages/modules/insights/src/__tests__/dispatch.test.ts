import { describe, it, expect } from 'vitest';
import { createDataContext } from '@branchlens/core';
import type { MonthlySalesRow, TableSources } from '@branchlens/core';
import { ValidationError, isValidUlid } from '@branchlens/shared';
import { dispatch } from '../queries/dispatch';
import { multiBranch, safeCall } from '../services/envelope';
import { intentSchema } from '../validation';

const MONTHS = ['September', 'October', 'November', 'December'];

function monthly(branch: string, totals: number[]): MonthlySalesRow[] {
  return totals.map((total, i) => ({ branch, month: MONTHS[i]!, monthIndex: 8 + i, year: 2025, total }));
}

function sources(): TableSources {
  return {
    monthlySales: [...monthly('Harbor', [100, 110, 121, 133.1]), ...monthly('Main Street', [50, 50, 50, 50])],
    attendance: [
      { empId: 'E1', branch: 'Harbor', punchInDate: '2025-12-01', punchInHour: 18, durationHours: 6, shift: null },
      { empId: 'E2', branch: 'Harbor', punchInDate: '2025-12-01', punchInHour: 19, durationHours: 6, shift: null },
    ],
    channelSales: [],
    customerOrders: [],
    itemSales: [],
    divisionChannels: [],
    candidateAreas: [],
  };
}

describe('dispatch', () => {
  it('runs one engine for a named branch', () => {
    const response = dispatch({ action: 'forecast', branch: 'Harbor', horizonMonths: 2 }, createDataContext(sources()));
    expect(response).toMatchObject({
      action: 'forecast',
      success: true,
      error: null,
      data: { branch: 'Harbor', horizonMonths: 2 },
    });
    expect(isValidUlid(response.requestId)).toBe(true);
  });

  it('queries every known branch when none is named', () => {
    const response = dispatch({ action: 'forecast' }, createDataContext(sources()));
    if (response.action !== 'forecast' || response.data === null || !('branches' in response.data)) {
      throw new Error('expected a multi-branch forecast');
    }
    expect(Object.keys(response.data.branches)).toEqual(['Harbor', 'Main Street']);
    expect(response.data.errors).toEqual([]);
    expect(response.error).toBeNull();
  });

  it('treats "all" like a missing branch', () => {
    const response = dispatch({ action: 'staffing', branch: 'ALL' }, createDataContext(sources()));
    expect(response).toMatchObject({
      success: true,
      data: {
        branches: {
          Harbor: { recommendedStaff: 3, shift: 'evening' },
          'Main Street': { recommendedStaff: null },
        },
      },
    });
  });

  it('fails the envelope when every branch fails', () => {
    const response = dispatch({ action: 'staffing', shift: 'brunch' }, createDataContext(sources()));
    expect(response).toMatchObject({
      success: false,
      data: null,
      error:
        'Harbor: VALIDATION_ERROR: Invalid staffing parameters; ' +
        'Main Street: VALIDATION_ERROR: Invalid staffing parameters',
    });
  });

  it('reports a missing table as a configuration error', () => {
    const response = dispatch({ action: 'combo', branch: 'Harbor' }, createDataContext(sources()));
    expect(response).toMatchObject({
      action: 'combo',
      success: false,
      data: null,
      error: 'CONFIGURATION_ERROR: Table basketLines was not provided to the data context',
    });
  });

  it('passes the whole chain to growth and expansion', () => {
    const ctx = createDataContext({ ...sources(), basketLines: [] });
    expect(dispatch({ action: 'growth' }, ctx)).toMatchObject({ success: true, data: { branch: 'all', branches: [] } });
    expect(dispatch({ action: 'expansion' }, ctx)).toMatchObject({ success: true, data: { focus: null } });
  });

  it('rejects an invalid intent', () => {
    expect(() => dispatch({ action: 'forecast', horizonMonths: 13 }, createDataContext(sources()))).toThrow(
      ValidationError,
    );
    expect(intentSchema.safeParse({ action: 'chitchat' }).success).toBe(false);
  });
});

describe('envelopes', () => {
  it('wraps thrown errors as CODE: message', () => {
    expect(
      safeCall(() => {
        throw new ValidationError('bad input');
      }),
    ).toEqual({ success: false, data: null, error: 'VALIDATION_ERROR: bad input' });
    expect(safeCall(() => 42)).toEqual({ success: true, data: 42, error: null });
  });

  it('keeps partial results and joins branch errors', () => {
    const result = multiBranch(['Harbor', 'Main Street'], (branch) => {
      if (branch === 'Main Street') throw new Error('no rows');
      return branch.length;
    });
    expect(result).toEqual({
      success: true,
      data: { branches: { Harbor: 6 }, errors: [{ branch: 'Main Street', error: 'Error: no rows' }] },
      error: 'Main Street: Error: no rows',
    });
  });

  it('fails when there is nothing to query', () => {
    expect(multiBranch([], (b) => b)).toEqual({ success: false, data: null, error: 'No branches to query' });
  });
});
