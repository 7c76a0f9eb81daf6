import { describe, it, expect } from 'vitest';
import { createDataContext } from '@branchlens/core';
import type { DataContext, MonthlySalesRow, TableSources } from '@branchlens/core';
import { evaluateExpansion, isExpansionError } from '../queries/evaluate-expansion';
import { verdictFor } from '../services/archetype';
import type { ExpansionResult } from '../types';

const MONTHS = ['September', 'October', 'November', 'December'];

function monthly(branch: string, totals: number[], offset = 0): MonthlySalesRow[] {
  return totals.map((total, i) => ({
    branch,
    month: MONTHS[offset + i]!,
    monthIndex: 8 + offset + i,
    year: 2025,
    total,
  }));
}

function sources(): TableSources {
  return {
    monthlySales: [...monthly('Harbor', [100, 110, 121, 133.1]), ...monthly('Main Street', [50, 50, 50], 1)],
    channelSales: [
      { branch: 'Harbor', channel: 'Delivery', numCustomers: 15, sales: 300, avgPerCustomer: 20 },
      { branch: 'Harbor', channel: 'Table', numCustomers: 25, sales: 500, avgPerCustomer: 20 },
      { branch: 'Main Street', channel: 'Take Away', numCustomers: 10, sales: 100, avgPerCustomer: 10 },
    ],
    customerOrders: [
      { branch: 'Harbor', customerName: 'Customer A', numOrders: 3, total: 60 },
      { branch: 'Harbor', customerName: 'Customer B', numOrders: 1, total: 20 },
      { branch: 'Harbor', customerName: 'Customer C', numOrders: 1, total: 20 },
      { branch: 'Harbor', customerName: 'Customer D', numOrders: 1, total: 20 },
    ],
    itemSales: [
      { branch: 'Harbor', division: 'Frappes', group: '', description: 'Mocha Frappe', qty: 10, totalAmount: 75 },
      { branch: 'Harbor', division: 'Croissants', group: '', description: 'Butter Croissant', qty: 5, totalAmount: 25 },
      { branch: 'Main Street', division: 'Hot-Coffee Based', group: '', description: 'Latte', qty: 8, totalAmount: 40 },
    ],
    divisionChannels: [
      { section: 'Harbor', item: 'ITEMS', delivery: 400, table: 600, takeAway: 0, total: 1000 },
      { section: 'Harbor', item: 'Frappes', delivery: 40, table: 60, takeAway: 0, total: 100 },
    ],
    candidateAreas: [
      {
        area: 'Riverside',
        governorate: 'North',
        population: 200_000,
        universityNearby: true,
        footTrafficTier: 4,
        rentTier: 2,
        cafeDensity: 'medium',
        chainPresent: false,
      },
      {
        area: 'Old Town',
        governorate: 'North',
        population: 80_000,
        universityNearby: false,
        footTrafficTier: 3,
        rentTier: 3,
        cafeDensity: 'high',
        chainPresent: true,
      },
    ],
  };
}

function evaluate(branch: string, ctx: DataContext = createDataContext(sources())): ExpansionResult {
  const result = evaluateExpansion({ branch }, ctx);
  if (isExpansionError(result)) throw new Error(result.error);
  return result;
}

describe('evaluateExpansion', () => {
  it('scores and ranks every branch', () => {
    const result = evaluate('all');
    expect(result.scorecards.map((s) => [s.branch, s.compositeScore])).toEqual([
      ['Harbor', 73.92],
      ['Main Street', 42.56],
    ]);
    expect(result.errors).toEqual([]);
    expect(result.focus).toBeNull();
  });

  it('reports each dimension for a branch', () => {
    const harbor = evaluate('').scorecards[0]!;
    expect(harbor.dimensions.demandTrend.score).toBe(55);
    expect(harbor.dimensions.branchStrength.score).toBe(100);
    expect(harbor.dimensions.avgTicketHealth.score).toBe(85);
    expect(harbor.dimensions.repeatCustomer.score).toBe(86.67);
    expect(harbor.dimensions.productMix.score).toBe(75);
    expect(harbor.dimensions.beverageAttachment.score).toBe(50);
  });

  it('falls back to neutral scores where a branch has no rows', () => {
    const main = evaluate('all').scorecards[1]!;
    expect(main.dimensions.branchStrength.score).toBe(32.32);
    expect(main.dimensions.avgTicketHealth.score).toBe(44);
    expect(main.dimensions.repeatCustomer.score).toBe(50);
    expect(main.dimensions.productMix.score).toBe(30);
    expect(main.dimensions.beverageAttachment.score).toBe(50);
  });

  it('builds the archetype from the top branch', () => {
    expect(evaluate('all').bestArchetype).toEqual({
      branch: 'Harbor',
      compositeScore: 73.92,
      channelMix: { Delivery: 300, Table: 500 },
      topCategories: { Frappes: 75, Croissants: 25 },
      beveragePct: 10,
      recommendation: "Replicate the 'Harbor' operating model: Delivery, Table channels, 10.0% beverage attachment.",
    });
  });

  it('derives the verdict from the best composite alone', () => {
    const result = evaluate('all');
    expect(result.verdict).toBe('GO');
    expect(result.verdict).toBe(verdictFor(result.scorecards[0]!.compositeScore));
    expect(result.verdictDetail).toBe(
      "Expansion is recommended. The best archetype ('Harbor') scores 73.92/100, indicating a strong replicable profile.",
    );
  });

  it('keeps every composite within [0, 100]', () => {
    for (const card of evaluate('all').scorecards) {
      expect(card.compositeScore).toBeGreaterThanOrEqual(0);
      expect(card.compositeScore).toBeLessThanOrEqual(100);
    }
  });

  it('ranks only areas without a branch', () => {
    expect(evaluate('all').candidateLocations.map((c) => c.area)).toEqual(['Riverside']);
  });

  it('lists data-coverage risks', () => {
    const { risks } = evaluate('all');
    expect(risks).toHaveLength(5);
    expect(risks[0]).toBe('Sales data covers only 4 months (Sep 2025–Dec 2025); trends may not persist.');
    expect(risks[4]).toBe('Main Street has only 3 months of data, potentially biasing its trend score.');
  });

  it('focuses on a branch matched case-insensitively', () => {
    const result = evaluate('main street');
    expect(result.focus?.branch).toBe('Main Street');
    expect(result.scorecards).toHaveLength(2);
  });

  it('suggests branches for an unknown name', () => {
    const ctx = createDataContext(sources());
    expect(evaluateExpansion({ branch: 'Street' }, ctx)).toEqual({
      error: "Unknown branch 'Street'.",
      availableBranches: ['Harbor', 'Main Street'],
      didYouMean: ['Main Street'],
    });
    expect(evaluateExpansion({ branch: 'Nowhere' }, ctx)).toMatchObject({ didYouMean: null });
  });

  it('returns an explicit empty evaluation when there are no branches', () => {
    const ctx = createDataContext({ ...sources(), monthlySales: [] });
    const result = evaluate('', ctx);
    expect(result.verdict).toBe('NO-GO');
    expect(result.bestArchetype).toBeNull();
    expect(result.scorecards).toEqual([]);
  });

  it('skips candidate areas when no archetype exists', () => {
    const ctx = createDataContext({ ...sources(), monthlySales: [] });
    const result = evaluate('', ctx);
    expect(result.candidateLocations).toEqual([]);
    expect(result.explanation).toBe(
      'No branch could be scored (0 failed). Candidate locations are not ranked without an archetype.',
    );
  });
});
