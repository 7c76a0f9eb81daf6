/**
 * Item-Item Cosine Similarity — the learned alternative to association rules.
 *
 * Baskets are split 80/20 with a seeded shuffle. Over the training baskets
 * each item is a binary column of the basket × item incidence matrix;
 * similarity(i, j) = co(i, j) / sqrt(count(i) × count(j)), self-similarity 0.
 * Candidates are scored against pairs that really occur in held-out baskets.
 */

import {
  compareCodePoints,
  round4,
  safeDivide,
  seededShuffle,
} from '@branchlens/shared';
import type { MlComboRecommendation } from '../types';
import { basketPairs, pairKey } from './basket-builder';
import type { Basket } from './basket-builder';

// ── Constants ────────────────────────────────────────────────────────

export const ML_MODEL_NAME = 'Item-Item Cosine Similarity';
export const ML_SPLIT_SEED = 42;
export const TRAIN_FRACTION = 0.8;

// ── Split ────────────────────────────────────────────────────────────

export interface BasketSplit {
  train: Basket[];
  test: Basket[];
}

/**
 * Deterministic split by basket identity. Input order does not matter:
 * baskets are ordered by id before the seeded shuffle. With two or more
 * baskets each side keeps at least one.
 */
export function splitBaskets(
  baskets: readonly Basket[],
  seed: number = ML_SPLIT_SEED,
  trainFraction: number = TRAIN_FRACTION,
): BasketSplit {
  const ordered = [...baskets].sort((a, b) => compareCodePoints(a.id, b.id));
  const shuffled = seededShuffle(ordered, seed);
  let trainSize = Math.floor(shuffled.length * trainFraction);
  if (shuffled.length >= 2) {
    trainSize = Math.min(Math.max(trainSize, 1), shuffled.length - 1);
  }
  return { train: shuffled.slice(0, trainSize), test: shuffled.slice(trainSize) };
}

// ── Similarity ───────────────────────────────────────────────────────

export interface ItemSimilarityModel {
  /** Items in code-point order; row/column order of `matrix`. */
  items: string[];
  /** Symmetric cosine similarity matrix, zero diagonal. */
  matrix: number[][];
  /** Co-occurrence counts, same layout as `matrix`. */
  coCounts: number[][];
  trainBaskets: number;
}

export function fitItemSimilarity(train: readonly Basket[]): ItemSimilarityModel {
  const items = [...new Set(train.flatMap((b) => [...b.items]))].sort(compareCodePoints);
  const index = new Map(items.map((item, i) => [item, i]));
  const n = items.length;

  const counts = new Array<number>(n).fill(0);
  const coCounts = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (const basket of train) {
    const columns = [...basket.items]
      .map((item) => index.get(item))
      .filter((i): i is number => i !== undefined);
    for (const i of columns) {
      counts[i] = (counts[i] ?? 0) + 1;
      const row = coCounts[i];
      if (!row) continue;
      for (const j of columns) {
        if (i !== j) row[j] = (row[j] ?? 0) + 1;
      }
    }
  }

  const matrix = coCounts.map((row, i) =>
    row.map((co, j) => (i === j ? 0 : safeDivide(co, Math.sqrt((counts[i] ?? 0) * (counts[j] ?? 0))))),
  );

  return { items, matrix, coCounts, trainBaskets: train.length };
}

/** Similarity desc, then training support desc, then pair order. */
export function compareMlCandidates(a: MlComboRecommendation, b: MlComboRecommendation): number {
  return (
    b.similarity - a.similarity ||
    b.support - a.support ||
    compareCodePoints(a.itemA, b.itemA) ||
    compareCodePoints(a.itemB, b.itemB)
  );
}

/** Pairs with positive similarity and training support ≥ `minSupport`, ranked. */
export function rankSimilarPairs(model: ItemSimilarityModel, minSupport: number): MlComboRecommendation[] {
  const candidates: MlComboRecommendation[] = [];
  const { items, matrix, coCounts, trainBaskets } = model;

  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const similarity = matrix[i]?.[j] ?? 0;
      const co = coCounts[i]?.[j] ?? 0;
      const support = safeDivide(co, trainBaskets);
      const itemA = items[i];
      const itemB = items[j];
      if (itemA === undefined || itemB === undefined) continue;
      if (similarity <= 0 || support < minSupport) continue;
      candidates.push({
        itemA,
        itemB,
        similarity: round4(similarity),
        support: round4(support),
        trainBasketCount: co,
      });
    }
  }

  return candidates.sort(compareMlCandidates);
}

// ── Evaluation ───────────────────────────────────────────────────────

export interface PrecisionResult {
  precisionAtK: number | null;
  hits: number;
  note: string;
}

/** Unordered pairs that occur together in at least one basket. */
export function truePairs(baskets: readonly Basket[]): Set<string> {
  const pairs = new Set<string>();
  for (const basket of baskets) {
    for (const [a, b] of basketPairs(basket)) pairs.add(pairKey(a, b));
  }
  return pairs;
}

/**
 * precision@K = hits / K, where K is the number of returned candidates and
 * a hit is a candidate that co-occurs in some test basket. Undefined (null)
 * when there are no candidates or the test set holds no pairs.
 */
export function precisionAtK(
  candidates: readonly MlComboRecommendation[],
  test: readonly Basket[],
): PrecisionResult {
  const k = candidates.length;
  if (k === 0) {
    return { precisionAtK: null, hits: 0, note: 'No candidate pairs to evaluate; precision@K is undefined.' };
  }
  const actual = truePairs(test);
  if (actual.size === 0) {
    return {
      precisionAtK: null,
      hits: 0,
      note: 'Held-out baskets contain no item pairs; precision@K is undefined.',
    };
  }
  const hits = candidates.filter((c) => actual.has(pairKey(c.itemA, c.itemB))).length;
  return {
    precisionAtK: round4(hits / k),
    hits,
    note: `${hits} of ${k} recommended pairs appear together in ${test.length} held-out baskets.`,
  };
}
