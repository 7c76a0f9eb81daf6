/**
 * Association Rules — support / confidence / lift over co-occurring items.
 *
 * support(A,B)     = baskets with both / total baskets
 * confidence(A→B)  = baskets with both / baskets with A
 * lift(A,B)        = support(A,B) / (support(A) × support(B))
 *
 * A pair survives when support ≥ minSupport, lift ≥ minLift and at least
 * one directional confidence ≥ minConfidence.
 */

import { compareCodePoints, mean, round2, round4, safeDivide } from '@branchlens/shared';
import type { ComboRecommendation, ComboThresholds } from '../types';
import { basketPairs, pairKey } from './basket-builder';
import type { Basket } from './basket-builder';

// ── Constants ────────────────────────────────────────────────────────

/** Bundle price = 88% of the items' summed average prices. */
export const BUNDLE_DISCOUNT_PCT = 0.12;

// ── Counting ─────────────────────────────────────────────────────────

export interface PairCount {
  itemA: string;
  itemB: string;
  count: number;
}

export interface BasketCounts {
  totalBaskets: number;
  itemCounts: Map<string, number>;
  pairs: PairCount[];
}

export function countOccurrences(baskets: readonly Basket[]): BasketCounts {
  const itemCounts = new Map<string, number>();
  const pairCounts = new Map<string, PairCount>();

  for (const basket of baskets) {
    for (const item of basket.items) {
      itemCounts.set(item, (itemCounts.get(item) ?? 0) + 1);
    }
    for (const [a, b] of basketPairs(basket)) {
      const key = pairKey(a, b);
      const entry = pairCounts.get(key);
      if (entry) entry.count++;
      else pairCounts.set(key, { itemA: a, itemB: b, count: 1 });
    }
  }

  return { totalBaskets: baskets.length, itemCounts, pairs: [...pairCounts.values()] };
}

// ── Metrics ──────────────────────────────────────────────────────────

export interface PairMetrics {
  support: number;
  confidenceAToB: number;
  confidenceBToA: number;
  lift: number;
}

/** Raw (unrounded) metrics for one pair. Lift is 0 when either marginal is 0. */
export function computePairMetrics(
  countAB: number,
  countA: number,
  countB: number,
  totalBaskets: number,
): PairMetrics {
  const support = safeDivide(countAB, totalBaskets);
  const supportA = safeDivide(countA, totalBaskets);
  const supportB = safeDivide(countB, totalBaskets);
  return {
    support,
    confidenceAToB: safeDivide(countAB, countA),
    confidenceBToA: safeDivide(countAB, countB),
    lift: safeDivide(support, supportA * supportB),
  };
}

export function passesThresholds(metrics: PairMetrics, thresholds: ComboThresholds): boolean {
  if (metrics.support < thresholds.minSupport) return false;
  if (
    metrics.confidenceAToB < thresholds.minConfidence &&
    metrics.confidenceBToA < thresholds.minConfidence
  ) {
    return false;
  }
  return metrics.lift >= thresholds.minLift;
}

/** Mean of (revenue A + revenue B) over the baskets that contain both. */
export function averageComboRevenue(baskets: readonly Basket[], itemA: string, itemB: string): number {
  const totals: number[] = [];
  for (const basket of baskets) {
    if (basket.items.has(itemA) && basket.items.has(itemB)) {
      totals.push((basket.revenue.get(itemA) ?? 0) + (basket.revenue.get(itemB) ?? 0));
    }
  }
  return round2(mean(totals));
}

export interface BundlePrice {
  priceA: number;
  priceB: number;
  individualTotal: number;
  suggestedComboPrice: number;
  savings: number;
}

export function suggestBundlePrice(avgPriceA: number, avgPriceB: number): BundlePrice {
  const priceA = round2(avgPriceA);
  const priceB = round2(avgPriceB);
  const individualTotal = round2(priceA + priceB);
  const suggestedComboPrice =
    individualTotal > 0 ? round2(individualTotal * (1 - BUNDLE_DISCOUNT_PCT)) : 0;
  return {
    priceA,
    priceB,
    individualTotal,
    suggestedComboPrice,
    savings: round2(individualTotal - suggestedComboPrice),
  };
}

// ── Ranking ──────────────────────────────────────────────────────────

/** Lift descending, then the pair's natural (code-point) order. */
export function compareByLift(a: ComboRecommendation, b: ComboRecommendation): number {
  return (
    b.lift - a.lift ||
    compareCodePoints(a.itemA, b.itemA) ||
    compareCodePoints(a.itemB, b.itemB)
  );
}

/** Every qualifying pair, ranked. */
export function mineAssociationRules(
  baskets: readonly Basket[],
  itemPrices: ReadonlyMap<string, number>,
  thresholds: ComboThresholds,
): ComboRecommendation[] {
  const { totalBaskets, itemCounts, pairs } = countOccurrences(baskets);
  const results: ComboRecommendation[] = [];

  for (const { itemA, itemB, count } of pairs) {
    const metrics = computePairMetrics(
      count,
      itemCounts.get(itemA) ?? 0,
      itemCounts.get(itemB) ?? 0,
      totalBaskets,
    );
    if (!passesThresholds(metrics, thresholds)) continue;

    results.push({
      itemA,
      itemB,
      support: round4(metrics.support),
      confidenceAToB: round4(metrics.confidenceAToB),
      confidenceBToA: round4(metrics.confidenceBToA),
      lift: round4(metrics.lift),
      basketCount: count,
      avgComboRevenue: averageComboRevenue(baskets, itemA, itemB),
      ...suggestBundlePrice(itemPrices.get(itemA) ?? 0, itemPrices.get(itemB) ?? 0),
    });
  }

  return results.sort(compareByLift);
}
