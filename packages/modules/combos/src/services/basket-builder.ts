/**
 * Basket construction from point-of-sale line items.
 *
 * Baskets are rebuilt on every engine call from the cached line table and
 * are never persisted.
 */

import type { BasketLine } from '@branchlens/core';
import { compareCodePoints, isAllBranches, mean } from '@branchlens/shared';

// ── Constants ────────────────────────────────────────────────────────

/** Logistics rows that are not products (compared upper-case). */
export const NON_PRODUCT_ITEMS: ReadonlySet<string> = new Set(['DELIVERY CHARGE']);

export const MIN_BASKET_ITEMS = 2;

// ── Types ────────────────────────────────────────────────────────────

export interface Basket {
  id: string;
  branch: string;
  items: ReadonlySet<string>;
  /** Line revenue per item within this basket. */
  revenue: ReadonlyMap<string, number>;
}

export interface BasketFilterOptions {
  branch: string;
  includeModifiers: boolean;
}

// ── Filtering ────────────────────────────────────────────────────────

/**
 * Applies, in order: cancellations and negative quantities, non-product
 * rows, modifiers (unless included), then the branch filter
 * (case-insensitive, `all` keeps every branch).
 */
export function filterBasketLines(
  lines: readonly BasketLine[],
  options: BasketFilterOptions,
): BasketLine[] {
  const branch = options.branch.trim().toLowerCase();
  const everyBranch = isAllBranches(branch);

  return lines.filter((line) => {
    if (line.isCancellation || line.qty < 0) return false;
    if (NON_PRODUCT_ITEMS.has(line.item.toUpperCase())) return false;
    if (!options.includeModifiers && line.isModifier) return false;
    if (!everyBranch && line.branch.trim().toLowerCase() !== branch) return false;
    return true;
  });
}

// ── Baskets ──────────────────────────────────────────────────────────

/** Groups lines by basket id; keeps baskets with at least two distinct items, ordered by id. */
export function buildBaskets(lines: readonly BasketLine[]): Basket[] {
  const grouped = new Map<string, { branch: string; revenue: Map<string, number> }>();

  for (const line of lines) {
    let basket = grouped.get(line.basketId);
    if (!basket) {
      basket = { branch: line.branch, revenue: new Map() };
      grouped.set(line.basketId, basket);
    }
    basket.revenue.set(line.item, (basket.revenue.get(line.item) ?? 0) + line.lineTotal);
  }

  const baskets: Basket[] = [];
  for (const [id, { branch, revenue }] of grouped) {
    if (revenue.size < MIN_BASKET_ITEMS) continue;
    baskets.push({ id, branch, items: new Set(revenue.keys()), revenue });
  }
  return baskets.sort((a, b) => compareCodePoints(a.id, b.id));
}

/** Mean unit price per item over priced lines. */
export function averageItemPrices(lines: readonly BasketLine[]): Map<string, number> {
  const prices = new Map<string, number[]>();
  for (const line of lines) {
    if (line.price <= 0) continue;
    const list = prices.get(line.item);
    if (list) list.push(line.price);
    else prices.set(line.item, [line.price]);
  }
  return new Map([...prices].map(([item, list]) => [item, mean(list)]));
}

/** Distinct items of a basket in code-point order. */
export function sortedItems(basket: Basket): string[] {
  return [...basket.items].sort(compareCodePoints);
}

/** Stable key for an unordered item pair. */
export function pairKey(a: string, b: string): string {
  return compareCodePoints(a, b) <= 0 ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/** Every unordered pair of a basket's items, each as [smaller, larger]. */
export function basketPairs(basket: Basket): Array<[string, string]> {
  const items = sortedItems(basket);
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const a = items[i];
      const b = items[j];
      if (a !== undefined && b !== undefined) pairs.push([a, b]);
    }
  }
  return pairs;
}
