import { describe, it, expect } from 'vitest';
import { createDataContext } from '@branchlens/core';
import type { BasketLine } from '@branchlens/core';
import { ValidationError } from '@branchlens/shared';
import {
  filterBasketLines,
  buildBaskets,
  averageItemPrices,
  pairKey,
} from '../services/basket-builder';
import type { Basket } from '../services/basket-builder';
import {
  computePairMetrics,
  passesThresholds,
  suggestBundlePrice,
  mineAssociationRules,
} from '../services/association-rules';
import { recommendCombos } from '../queries/recommend-combos';

// ── Fixtures ────────────────────────────────────────────────────────

const PRICES: Record<string, number> = {
  Americano: 3,
  Brownie: 2.5,
  Cappuccino: 4,
  Donut: 1.5,
};

function line(basketId: string, item: string, overrides: Partial<BasketLine> = {}): BasketLine {
  const price = PRICES[item] ?? 0;
  return {
    basketId,
    branch: 'Main Street',
    customerName: '',
    item,
    qty: 1,
    price,
    lineTotal: price,
    isCancellation: false,
    isModifier: false,
    ...overrides,
  };
}

/**
 * 10 baskets: Americano in 5, Brownie in 6, both in 3;
 * Cappuccino in 7, Donut in 2, both in 2.
 */
function sampleLines(): BasketLine[] {
  return [
    line('b01', 'Americano'),
    line('b01', 'Brownie'),
    line('b01', 'Extra Shot', { isModifier: true }),
    line('b02', 'Americano'),
    line('b02', 'Brownie'),
    line('b02', 'Delivery Charge', { price: 1, lineTotal: 1 }),
    line('b03', 'Americano'),
    line('b03', 'Brownie'),
    line('b03', 'Muffin', { isCancellation: true, price: 2, lineTotal: 2 }),
    line('b04', 'Americano'),
    line('b04', 'Cappuccino'),
    line('b05', 'Americano'),
    line('b05', 'Cappuccino'),
    line('b06', 'Brownie'),
    line('b06', 'Cappuccino'),
    line('b07', 'Brownie'),
    line('b07', 'Cappuccino'),
    line('b08', 'Brownie'),
    line('b08', 'Cappuccino'),
    line('b09', 'Cappuccino', { branch: 'Harbor' }),
    line('b09', 'Donut', { branch: 'Harbor' }),
    line('b10', 'Cappuccino', { branch: 'Harbor' }),
    line('b10', 'Donut', { branch: 'Harbor' }),
    line('b11', 'Americano'),
  ];
}

const DEFAULT_THRESHOLDS = { minSupport: 0.02, minConfidence: 0.15, minLift: 1.0 };

// ── Basket Builder ──────────────────────────────────────────────────

describe('filterBasketLines', () => {
  it('drops cancellations, delivery charges and modifiers by default', () => {
    const kept = filterBasketLines(sampleLines(), { branch: 'all', includeModifiers: false });
    const items = new Set(kept.map((l) => l.item));
    expect(items.has('Muffin')).toBe(false);
    expect(items.has('Delivery Charge')).toBe(false);
    expect(items.has('Extra Shot')).toBe(false);
    expect(kept).toHaveLength(21);
  });

  it('keeps modifiers when asked', () => {
    const kept = filterBasketLines(sampleLines(), { branch: 'all', includeModifiers: true });
    expect(kept.some((l) => l.item === 'Extra Shot')).toBe(true);
  });

  it('matches the branch case-insensitively', () => {
    const kept = filterBasketLines(sampleLines(), { branch: 'harbor', includeModifiers: false });
    expect(kept).toHaveLength(4);
    expect(kept.every((l) => l.branch === 'Harbor')).toBe(true);
  });

  it('drops negative quantities', () => {
    const lines = [line('x1', 'Americano', { qty: -1 }), line('x1', 'Brownie')];
    expect(filterBasketLines(lines, { branch: 'all', includeModifiers: false })).toHaveLength(1);
  });
});

describe('buildBaskets', () => {
  it('keeps only baskets with at least two distinct items, ordered by id', () => {
    const lines = filterBasketLines(sampleLines(), { branch: 'all', includeModifiers: false });
    const baskets = buildBaskets(lines);
    expect(baskets).toHaveLength(10);
    expect(baskets[0]!.id).toBe('b01');
    expect(baskets[9]!.id).toBe('b10');
    expect(baskets.find((b) => b.id === 'b11')).toBeUndefined();
  });

  it('collapses repeated lines of the same item', () => {
    const baskets = buildBaskets([
      line('x1', 'Americano'),
      line('x1', 'Americano'),
      line('x2', 'Americano'),
      line('x2', 'Brownie'),
    ]);
    expect(baskets.map((b) => b.id)).toEqual(['x2']);
  });

  it('sums line revenue per item within a basket', () => {
    const baskets = buildBaskets([
      line('x1', 'Americano'),
      line('x1', 'Americano'),
      line('x1', 'Brownie'),
    ]);
    expect(baskets[0]!.revenue.get('Americano')).toBe(6);
  });
});

describe('averageItemPrices', () => {
  it('averages over priced lines only', () => {
    const prices = averageItemPrices([
      line('x1', 'Americano', { price: 3 }),
      line('x2', 'Americano', { price: 4 }),
      line('x3', 'Americano', { price: 0 }),
    ]);
    expect(prices.get('Americano')).toBe(3.5);
  });
});

describe('pairKey', () => {
  it('is independent of argument order', () => {
    expect(pairKey('Brownie', 'Americano')).toBe(pairKey('Americano', 'Brownie'));
  });
});

// ── Association Rules ───────────────────────────────────────────────

describe('computePairMetrics', () => {
  it('computes support, both confidences and lift', () => {
    const m = computePairMetrics(3, 5, 6, 10);
    expect(m.support).toBeCloseTo(0.3, 10);
    expect(m.confidenceAToB).toBeCloseTo(0.6, 10);
    expect(m.confidenceBToA).toBeCloseTo(0.5, 10);
    expect(m.lift).toBeCloseTo(1.0, 10);
  });

  it('returns zeros instead of dividing by zero', () => {
    expect(computePairMetrics(0, 0, 0, 0)).toEqual({
      support: 0,
      confidenceAToB: 0,
      confidenceBToA: 0,
      lift: 0,
    });
  });
});

describe('passesThresholds', () => {
  const metrics = { support: 0.1, confidenceAToB: 0.1, confidenceBToA: 0.2, lift: 1.2 };

  it('accepts a pair when either direction meets the confidence floor', () => {
    expect(passesThresholds(metrics, DEFAULT_THRESHOLDS)).toBe(true);
  });

  it('rejects on support, confidence and lift independently', () => {
    expect(passesThresholds(metrics, { ...DEFAULT_THRESHOLDS, minSupport: 0.2 })).toBe(false);
    expect(passesThresholds(metrics, { ...DEFAULT_THRESHOLDS, minConfidence: 0.3 })).toBe(false);
    expect(passesThresholds(metrics, { ...DEFAULT_THRESHOLDS, minLift: 1.5 })).toBe(false);
  });
});

describe('suggestBundlePrice', () => {
  it('discounts the summed prices by 12%', () => {
    expect(suggestBundlePrice(3, 2.5)).toEqual({
      priceA: 3,
      priceB: 2.5,
      individualTotal: 5.5,
      suggestedComboPrice: 4.84,
      savings: 0.66,
    });
  });

  it('suggests nothing for unpriced items', () => {
    expect(suggestBundlePrice(0, 0).suggestedComboPrice).toBe(0);
  });
});

describe('mineAssociationRules', () => {
  const lines = filterBasketLines(sampleLines(), { branch: 'all', includeModifiers: false });
  const baskets = buildBaskets(lines);
  const ranked = mineAssociationRules(baskets, averageItemPrices(lines), DEFAULT_THRESHOLDS);

  it('ranks qualifying pairs by lift', () => {
    expect(ranked.map((r) => [r.itemA, r.itemB, r.lift])).toEqual([
      ['Cappuccino', 'Donut', 1.4286],
      ['Americano', 'Brownie', 1],
    ]);
  });

  it('reports the full metric record for a pair', () => {
    expect(ranked[1]).toEqual({
      itemA: 'Americano',
      itemB: 'Brownie',
      support: 0.3,
      confidenceAToB: 0.6,
      confidenceBToA: 0.5,
      lift: 1,
      basketCount: 3,
      avgComboRevenue: 5.5,
      priceA: 3,
      priceB: 2.5,
      individualTotal: 5.5,
      suggestedComboPrice: 4.84,
      savings: 0.66,
    });
  });

  it('keeps lift symmetric and confidences consistent with it', () => {
    for (const r of ranked) {
      const supportA = r.support / r.confidenceAToB;
      const supportB = r.support / r.confidenceBToA;
      expect(r.lift).toBeCloseTo(r.support / (supportA * supportB), 3);
      expect(r.support).toBeLessThanOrEqual(Math.min(r.confidenceAToB, r.confidenceBToA));
    }
  });

  it('breaks lift ties by the pair order, not the order pairs were found', () => {
    const tied = (id: string, ...items: string[]): Basket => ({
      id,
      branch: 'Harbor',
      items: new Set(items),
      revenue: new Map(items.map((i) => [i, 1])),
    });
    const byFirstItem = mineAssociationRules(
      [tied('b1', 'Tea', 'Scone'), tied('b2', 'Latte', 'Bagel'), tied('b3', 'Tea', 'Scone'), tied('b4', 'Latte', 'Bagel')],
      new Map(),
      DEFAULT_THRESHOLDS,
    );
    expect(byFirstItem.map((r) => [r.itemA, r.itemB, r.lift])).toEqual([
      ['Bagel', 'Latte', 2],
      ['Scone', 'Tea', 2],
    ]);

    const bySecondItem = mineAssociationRules(
      [tied('b1', 'Americano', 'Muffin'), tied('b2', 'Americano', 'Bagel')],
      new Map(),
      DEFAULT_THRESHOLDS,
    );
    expect(bySecondItem.map((r) => [r.itemA, r.itemB, r.lift])).toEqual([
      ['Americano', 'Bagel', 1],
      ['Americano', 'Muffin', 1],
    ]);
  });

  it('returns nothing when no pair clears the lift floor', () => {
    expect(mineAssociationRules(baskets, new Map(), { ...DEFAULT_THRESHOLDS, minLift: 5 })).toEqual([]);
  });
});

// ── recommendCombos ─────────────────────────────────────────────────

describe('recommendCombos', () => {
  const ctx = createDataContext({ basketLines: sampleLines() });

  it('applies defaults and explains the result', () => {
    const result = recommendCombos({}, ctx);
    expect(result.branch).toBe('all');
    expect(result.totalBaskets).toBe(10);
    expect(result.includeModifiers).toBe(false);
    expect(result.recommendations).toHaveLength(2);
    expect(result.explanation).toBe(
      'Analysed 10 baskets across all branches. Found 2 item pairs passing thresholds ' +
        '(support≥0.02, confidence≥0.15, lift≥1). Returning top 2 by lift. Modifiers excluded.',
    );
  });

  it('truncates to topK', () => {
    const result = recommendCombos({ topK: 1 }, ctx);
    expect(result.recommendations.map((r) => r.itemB)).toEqual(['Donut']);
  });

  it('lets modifiers into the baskets when included', () => {
    const result = recommendCombos({ includeModifiers: true }, ctx);
    expect(result.recommendations[0]).toMatchObject({
      itemA: 'Americano',
      itemB: 'Extra Shot',
      lift: 2,
      basketCount: 1,
    });
  });

  it('returns an empty result for a branch with no baskets', () => {
    const result = recommendCombos({ branch: 'Nowhere' }, ctx);
    expect(result).toEqual({
      branch: 'Nowhere',
      totalBaskets: 0,
      includeModifiers: false,
      recommendations: [],
      explanation: "No baskets with ≥2 items found for branch 'Nowhere'.",
    });
  });

  it('rejects out-of-range parameters', () => {
    expect(() => recommendCombos({ topK: 0 }, ctx)).toThrow(ValidationError);
    expect(() => recommendCombos({ minSupport: 2 }, ctx)).toThrow(ValidationError);
  });
});
