import { describe, it, expect } from 'vitest';
import type { ItemSalesRow, MonthlySalesRow } from '@branchlens/core';
import { branchBeverageStats, findUnderperformers } from '../services/beverage-kpis';
import {
  channelInsight,
  deliveryRepeatRate,
  isBeverageItem,
  isDessertItem,
  revenueMomentum,
  staffingCapacity,
} from '../services/signals';

function latte(branch: string, qty: number): ItemSalesRow {
  return { branch, division: 'Hot-Coffee Based', group: '', description: 'Latte', qty, totalAmount: qty * 5 };
}

describe('branchBeverageStats', () => {
  it('rounds summed revenue to cents', () => {
    const rows: ItemSalesRow[] = [
      { branch: 'Harbor', division: 'Hot-Coffee Based', group: '', description: 'Espresso', qty: 1, totalAmount: 0.1 },
      { branch: 'Harbor', division: 'Frappes', group: '', description: 'Mocha Frappe', qty: 1, totalAmount: 0.2 },
    ];
    expect(branchBeverageStats(rows, [], 'Harbor')).toMatchObject({
      coffeeRevenue: 0.1,
      frappeRevenue: 0.2,
      bevRevenue: 0.3,
      totalRevenue: 0.3,
      penetrationPct: 100,
    });
  });
});

describe('findUnderperformers', () => {
  it('includes a gap of exactly 40%', () => {
    const result = findUnderperformers([latte('Harbor', 10), latte('Main Street', 6)], 'Main Street');
    expect(result).toEqual([{ item: 'Latte', yourQty: 6, bestBranch: 'Harbor', bestQty: 10, gapPct: 40 }]);
  });

  it('excludes a smaller gap', () => {
    expect(findUnderperformers([latte('Harbor', 10), latte('Main Street', 7)], 'Main Street')).toEqual([]);
  });

  it('ignores items whose best volume is three or fewer', () => {
    expect(findUnderperformers([latte('Harbor', 3)], 'Main Street')).toEqual([]);
  });

  it('picks the first branch by name when volumes tie', () => {
    const rows = [latte('Main Street', 8), latte('Harbor', 8)];
    expect(findUnderperformers(rows, 'Riverside')[0]?.bestBranch).toBe('Harbor');
    expect(findUnderperformers(rows, 'Harbor')).toEqual([]);
  });
});

describe('keyword matching', () => {
  it('classifies by case-insensitive substring', () => {
    expect(isBeverageItem('iced spanish latte')).toBe(true);
    expect(isBeverageItem('Chimney Classic')).toBe(false);
    expect(isDessertItem('Lotus Ice Cream Bowl')).toBe(true);
  });
});

describe('channelInsight', () => {
  it('says so when there are no beverage rows', () => {
    expect(channelInsight([], 'Harbor')).toBe('No channel data available for beverages at Harbor.');
  });

  it('says so when beverage revenue is zero', () => {
    const row = { section: 'Harbor', item: 'Shakes', delivery: 0, table: 0, takeAway: 0, total: 0 };
    expect(channelInsight([row], 'Harbor')).toBe('No beverage revenue recorded across any channel at Harbor.');
  });
});

describe('revenueMomentum', () => {
  const month = (name: string, monthIndex: number, total: number): MonthlySalesRow => ({
    branch: 'Harbor',
    month: name,
    monthIndex,
    year: 2025,
    total,
  });

  it('has no data without rows', () => {
    expect(revenueMomentum([], 'Harbor').trend).toBe('no data');
  });

  it('needs two months', () => {
    expect(revenueMomentum([month('December', 11, 100)], 'Harbor')).toEqual({
      monthsAvailable: 1,
      latestMonth: 'N/A',
      momGrowthPct: 0,
      trend: 'insufficient data',
    });
  });

  it('keeps a move inside the 10% band stable', () => {
    const result = revenueMomentum([month('November', 10, 100), month('December', 11, 110)], 'Harbor');
    expect(result).toEqual({ monthsAvailable: 2, latestMonth: 'December', momGrowthPct: 10, trend: 'stable' });
  });

  it('reports zero growth after a zero month', () => {
    const result = revenueMomentum([month('November', 10, 0), month('December', 11, 50)], 'Harbor');
    expect(result.momGrowthPct).toBe(0);
    expect(result.trend).toBe('growing');
  });
});

describe('deliveryRepeatRate', () => {
  it('is all zeros without customers', () => {
    expect(deliveryRepeatRate([], 'Harbor')).toEqual({
      deliveryCustomers: 0,
      repeatCustomers: 0,
      repeatRatePct: 0,
      avgOrdersPerCustomer: 0,
    });
  });
});

describe('staffingCapacity', () => {
  it('distinguishes an empty table from a missing branch', () => {
    expect(staffingCapacity([], 'Harbor', 10).insight).toBe('No attendance data.');
    const other = { empId: 'E1', branch: 'Main Street', punchInDate: '2025-12-01', punchInHour: 9, durationHours: 8, shift: null };
    expect(staffingCapacity([other], 'Harbor', 10).insight).toBe('No attendance data for Harbor.');
  });
});
