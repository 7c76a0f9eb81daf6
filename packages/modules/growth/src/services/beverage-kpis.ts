/**
 * Beverage KPIs from item-level sales: division totals, hero items,
 * underperformers against the best branch, and penetration ranking.
 */

import type { ChannelSalesRow, ItemSalesRow } from '@branchlens/core';
import { compareCodePoints, round1, round2, safeDivide, sum } from '@branchlens/shared';
import type { BranchBeverageStats, HeroItem, Underperformer } from '../types';

// ── Constants ────────────────────────────────────────────────────────

export const COFFEE_DIVISION = 'Hot-Coffee Based';
export const FRAPPE_DIVISION = 'Frappes';
export const SHAKE_DIVISION = 'Shakes';

/** Divisions counted as beverages for penetration and underperformers. */
export const GROWTH_DIVISIONS = [COFFEE_DIVISION, FRAPPE_DIVISION, SHAKE_DIVISION] as const;

export const HERO_ITEM_COUNT = 3;
/** An item this far (%) behind the best branch is an underperformer; inclusive. */
export const UNDERPERFORMER_GAP_PCT = 40;
/** Best-branch volume must exceed this for the gap to count. */
export const UNDERPERFORMER_MIN_BEST_QTY = 3;
export const UNDERPERFORMER_LIMIT = 5;

// ── Division totals ──────────────────────────────────────────────────

export function divisionTotals(
  rows: readonly ItemSalesRow[],
  division: string,
  branch: string,
): { qty: number; revenue: number } {
  const sold = rows.filter((r) => r.division === division && r.branch === branch && r.qty > 0);
  return {
    qty: Math.trunc(sum(sold.map((r) => r.qty))),
    revenue: round2(sum(sold.map((r) => r.totalAmount))),
  };
}

export function branchBeverageStats(
  itemSales: readonly ItemSalesRow[],
  channelSales: readonly ChannelSalesRow[],
  branch: string,
): BranchBeverageStats {
  const coffee = divisionTotals(itemSales, COFFEE_DIVISION, branch);
  const frappe = divisionTotals(itemSales, FRAPPE_DIVISION, branch);
  const shake = divisionTotals(itemSales, SHAKE_DIVISION, branch);
  const totalRevenue = round2(sum(itemSales.filter((r) => r.branch === branch).map((r) => r.totalAmount)));
  const bevRevenue = round2(coffee.revenue + frappe.revenue + shake.revenue);

  return {
    coffeeQty: coffee.qty,
    coffeeRevenue: coffee.revenue,
    frappeQty: frappe.qty,
    frappeRevenue: frappe.revenue,
    shakeQty: shake.qty,
    shakeRevenue: shake.revenue,
    totalBevQty: coffee.qty + frappe.qty + shake.qty,
    bevRevenue,
    totalRevenue,
    penetrationPct: round2(safeDivide(bevRevenue, totalRevenue) * 100),
    totalCustomers: Math.trunc(sum(channelSales.filter((r) => r.branch === branch).map((r) => r.numCustomers))),
  };
}

/** Rank 1 = highest penetration; ties keep branch-name order. */
export function penetrationRanks(stats: ReadonlyMap<string, BranchBeverageStats>): Map<string, number> {
  const ordered = [...stats]
    .sort(([aName, a], [bName, b]) => b.penetrationPct - a.penetrationPct || compareCodePoints(aName, bName));
  return new Map(ordered.map(([branch], i) => [branch, i + 1]));
}

// ── Hero items ───────────────────────────────────────────────────────

/** Top sellers by quantity in one division, revenue-bearing lines only. */
export function heroItems(
  rows: readonly ItemSalesRow[],
  division: string,
  branch: string,
  count: number = HERO_ITEM_COUNT,
): HeroItem[] {
  return rows
    .filter((r) => r.division === division && r.branch === branch && r.qty > 0 && r.totalAmount > 0)
    .sort((a, b) => b.qty - a.qty || compareCodePoints(a.description, b.description))
    .slice(0, count)
    .map((r, i) => ({
      item: r.description,
      qty: Math.trunc(r.qty),
      revenue: round2(r.totalAmount),
      rank: i + 1,
    }));
}

// ── Underperformers ──────────────────────────────────────────────────

/**
 * Items that sell well elsewhere but lag at `branch`. For each item the
 * best branch is the one with the highest quantity (first by name on a
 * tie); the branch itself being best disqualifies the item.
 */
export function findUnderperformers(
  rows: readonly ItemSalesRow[],
  branch: string,
  divisions: readonly string[] = GROWTH_DIVISIONS,
): Underperformer[] {
  const results: Underperformer[] = [];

  for (const division of divisions) {
    // item → branch → qty
    const volumes = new Map<string, Map<string, number>>();
    for (const r of rows) {
      if (r.division !== division || r.qty <= 0) continue;
      let byBranch = volumes.get(r.description);
      if (!byBranch) {
        byBranch = new Map();
        volumes.set(r.description, byBranch);
      }
      byBranch.set(r.branch, (byBranch.get(r.branch) ?? 0) + r.qty);
    }

    for (const item of [...volumes.keys()].sort(compareCodePoints)) {
      const byBranch = volumes.get(item);
      if (!byBranch) continue;
      let bestBranch = '';
      let bestQty = -Infinity;
      for (const b of [...byBranch.keys()].sort(compareCodePoints)) {
        const qty = byBranch.get(b) ?? 0;
        if (qty > bestQty) {
          bestBranch = b;
          bestQty = qty;
        }
      }
      if (bestBranch === branch) continue;

      const best = Math.trunc(bestQty);
      if (best <= UNDERPERFORMER_MIN_BEST_QTY) continue;

      const yourQty = Math.trunc(byBranch.get(branch) ?? 0);
      const gapPct = round1((1 - yourQty / best) * 100);
      if (gapPct >= UNDERPERFORMER_GAP_PCT) {
        results.push({ item, yourQty, bestBranch, bestQty: best, gapPct });
      }
    }
  }

  return results.sort((a, b) => b.gapPct - a.gapPct).slice(0, UNDERPERFORMER_LIMIT);
}
