/**
 * Branch Scorecard — six KPI dimensions on a 0–100 scale plus a weighted composite.
 *
 * Dimensions (weight):
 *   demand trend (0.25)        mean MoM growth, 0% → 50, ±0.5 per point
 *   branch strength (0.20)     revenue relative to the strongest branch
 *   avg-ticket health (0.15)   spend per customer and channel breadth
 *   repeat customer (0.10)     delivery customers with more than one order
 *   product mix (0.15)         SKU breadth and division concentration (HHI)
 *   beverage attachment (0.15) beverage share of product revenue
 *
 * Every score is clamped, so the composite stays in [0, 100] for any input.
 */

import type {
  ChannelSalesRow,
  CustomerOrderRow,
  DivisionChannelRow,
  ItemSalesRow,
  MonthlySalesRow,
} from '@branchlens/core';
import { branchSeries } from '@branchlens/core';
import { clamp, compareCodePoints, mean, round2, round4, safeDivide, sum } from '@branchlens/shared';
import { DIMENSION_KEYS } from '../types';
import type {
  AvgTicketDetail,
  BeverageAttachmentDetail,
  BranchStrengthDetail,
  DemandTrendDetail,
  DimensionKey,
  DimensionScore,
  Dimensions,
  ProductMixDetail,
  RepeatCustomerDetail,
  Scorecard,
} from '../types';

// ── Constants ────────────────────────────────────────────────────────

export const DEFAULT_WEIGHTS = {
  demandTrend: 0.25,
  branchStrength: 0.2,
  avgTicketHealth: 0.15,
  repeatCustomer: 0.1,
  productMix: 0.15,
  beverageAttachment: 0.15,
} as const satisfies Record<DimensionKey, number>;

export const NEUTRAL_SCORE = 50;

export const BEVERAGE_DIVISIONS: ReadonlySet<string> = new Set([
  'Hot-Coffee Based',
  'Frappes',
  'Shakes',
  'Hot and Cold Drinks',
  'Bev Add-ons',
]);

/** Division-channel row holding the product total. */
export const ITEMS_TOTAL_ROW = 'ITEMS';

const CHANNEL_BONUS_PER_EXTRA = 20;
const CHANNEL_BONUS_CAP = 40;
const TICKET_BASELINE = 30;
/** Repeat share (%) that earns a full score. */
const REPEAT_PCT_FOR_FULL_SCORE = 30;
/** Beverage share (%) that earns a full score. */
const BEVERAGE_PCT_FOR_FULL_SCORE = 20;

function scored<D>(raw: number, detail: D): DimensionScore<D> {
  return { score: round2(clamp(raw, 0, 100)), detail };
}

// ── Scorers ──────────────────────────────────────────────────────────

/** Only months with positive predecessors contribute a growth rate. */
export function scoreDemandTrend(totals: readonly number[]): DimensionScore<DemandTrendDetail> {
  if (totals.length < 2) {
    return { score: NEUTRAL_SCORE, detail: { momGrowthRates: [], avgMomGrowthPct: 0 } };
  }
  const growths: number[] = [];
  for (let i = 1; i < totals.length; i++) {
    const prev = totals[i - 1] ?? 0;
    if (prev > 0) growths.push((((totals[i] ?? 0) - prev) / prev) * 100);
  }
  const avgGrowth = mean(growths);
  return scored(50 + avgGrowth * 0.5, {
    momGrowthRates: growths.map(round2),
    avgMomGrowthPct: round2(avgGrowth),
  });
}

export function scoreBranchStrength(total: number, maxTotal: number): DimensionScore<BranchStrengthDetail> {
  return scored(safeDivide(total, maxTotal) * 100, { totalRevenue: round2(total) });
}

/**
 * 0.7 × normalised ticket + 0.3 × channel bonus + 0.3 × 30. The baseline
 * term is added for every branch, single-channel or not.
 */
export function scoreAvgTicket(
  rows: readonly ChannelSalesRow[],
  maxAvgTicket: number,
): DimensionScore<AvgTicketDetail> {
  if (rows.length === 0) {
    return { score: NEUTRAL_SCORE, detail: { avgTicket: 0, channels: 0, channelList: [] } };
  }
  const avgTicket = mean(rows.map((r) => r.avgPerCustomer));
  const ticketNorm = safeDivide(avgTicket, maxAvgTicket) * 100;
  const diversityBonus = Math.min((rows.length - 1) * CHANNEL_BONUS_PER_EXTRA, CHANNEL_BONUS_CAP);
  return scored(ticketNorm * 0.7 + diversityBonus * 0.3 + TICKET_BASELINE * 0.3, {
    avgTicket: round2(avgTicket),
    channels: rows.length,
    channelList: rows.map((r) => r.channel),
  });
}

export function scoreRepeatCustomer(rows: readonly CustomerOrderRow[]): DimensionScore<RepeatCustomerDetail> {
  if (rows.length === 0) {
    return {
      score: NEUTRAL_SCORE,
      detail: {
        totalCustomers: 0,
        repeatCustomers: 0,
        repeatPct: 0,
        note: 'No delivery customer data available; neutral score applied.',
      },
    };
  }
  const repeatCustomers = rows.filter((r) => r.numOrders > 1).length;
  const repeatPct = safeDivide(repeatCustomers, rows.length) * 100;
  return scored(20 + repeatPct * (80 / REPEAT_PCT_FOR_FULL_SCORE), {
    totalCustomers: rows.length,
    repeatCustomers,
    repeatPct: round2(repeatPct),
  });
}

/** Revenue Herfindahl index across divisions; 1 when there is no revenue. */
export function herfindahlIndex(revenueByDivision: ReadonlyMap<string, number>): number {
  const total = sum([...revenueByDivision.values()]);
  if (total <= 0) return 1;
  return sum([...revenueByDivision.values()].map((v) => (v / total) ** 2));
}

export function revenueByDivision(rows: readonly ItemSalesRow[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const row of rows) {
    totals.set(row.division, (totals.get(row.division) ?? 0) + row.totalAmount);
  }
  return totals;
}

export function uniqueSkuCount(rows: readonly ItemSalesRow[]): number {
  return new Set(rows.map((r) => r.description)).size;
}

export function scoreProductMix(
  rows: readonly ItemSalesRow[],
  maxSkus: number,
): DimensionScore<ProductMixDetail> {
  if (rows.length === 0) {
    return { score: NEUTRAL_SCORE, detail: { uniqueSkus: 0, divisions: 0, herfindahl: 1 } };
  }
  const skus = uniqueSkuCount(rows);
  const divisions = revenueByDivision(rows);
  const hhi = herfindahlIndex(divisions);
  const skuNorm = safeDivide(skus, maxSkus) * 100;
  return scored(skuNorm * 0.6 + (1 - hhi) * 100 * 0.4, {
    uniqueSkus: skus,
    divisions: divisions.size,
    herfindahl: round4(hhi),
  });
}

function beverageTotals(rows: readonly DivisionChannelRow[]): { beverage: number; items: number } {
  return {
    beverage: sum(rows.filter((r) => BEVERAGE_DIVISIONS.has(r.item)).map((r) => r.total)),
    items: sum(rows.filter((r) => r.item === ITEMS_TOTAL_ROW).map((r) => r.total)),
  };
}

export function scoreBeverageAttachment(
  rows: readonly DivisionChannelRow[],
): DimensionScore<BeverageAttachmentDetail> {
  if (rows.length === 0) {
    return { score: NEUTRAL_SCORE, detail: { beverageRevenue: 0, itemsRevenue: 0, bevPct: 0 } };
  }
  const { beverage, items } = beverageTotals(rows);
  const pct = safeDivide(beverage, items) * 100;
  return scored(pct * (100 / BEVERAGE_PCT_FOR_FULL_SCORE), {
    beverageRevenue: round2(beverage),
    itemsRevenue: round2(items),
    bevPct: round2(pct),
  });
}

export function compositeScore(
  dimensions: Dimensions,
  weights: Record<DimensionKey, number> = DEFAULT_WEIGHTS,
): number {
  return round2(sum(DIMENSION_KEYS.map((key) => dimensions[key].score * weights[key])));
}

// ── Scorecards ───────────────────────────────────────────────────────

export interface ScoringTables {
  monthlySales: readonly MonthlySalesRow[];
  channelSales: readonly ChannelSalesRow[];
  customerOrders: readonly CustomerOrderRow[];
  itemSales: readonly ItemSalesRow[];
  divisionChannels: readonly DivisionChannelRow[];
}

/** Cross-branch maxima the relative scorers normalise against. */
export interface PeerBenchmarks {
  maxTotal: number;
  maxAvgTicket: number;
  maxSkus: number;
  totals: Map<string, number>;
}

export function peerBenchmarks(tables: ScoringTables): PeerBenchmarks {
  const totals = new Map<string, number>();
  for (const row of tables.monthlySales) {
    totals.set(row.branch, (totals.get(row.branch) ?? 0) + row.total);
  }

  const tickets = new Map<string, number[]>();
  for (const row of tables.channelSales) {
    const list = tickets.get(row.branch) ?? [];
    list.push(row.avgPerCustomer);
    tickets.set(row.branch, list);
  }

  const skus = new Map<string, Set<string>>();
  for (const row of tables.itemSales) {
    const set = skus.get(row.branch) ?? new Set<string>();
    set.add(row.description);
    skus.set(row.branch, set);
  }

  const maxOf = (values: number[]) => (values.length > 0 ? Math.max(...values) : 0);
  return {
    totals,
    maxTotal: maxOf([...totals.values()]),
    maxAvgTicket: maxOf([...tickets.values()].map((list) => mean(list))),
    maxSkus: maxOf([...skus.values()].map((set) => set.size)),
  };
}

export function buildScorecard(branch: string, tables: ScoringTables, peers: PeerBenchmarks): Scorecard {
  const dimensions: Dimensions = {
    demandTrend: scoreDemandTrend(branchSeries(tables.monthlySales, branch).map((r) => r.total)),
    branchStrength: scoreBranchStrength(peers.totals.get(branch) ?? 0, peers.maxTotal),
    avgTicketHealth: scoreAvgTicket(
      tables.channelSales.filter((r) => r.branch === branch),
      peers.maxAvgTicket,
    ),
    repeatCustomer: scoreRepeatCustomer(tables.customerOrders.filter((r) => r.branch === branch)),
    productMix: scoreProductMix(tables.itemSales.filter((r) => r.branch === branch), peers.maxSkus),
    beverageAttachment: scoreBeverageAttachment(
      tables.divisionChannels.filter((r) => r.section === branch),
    ),
  };
  return { branch, dimensions, compositeScore: compositeScore(dimensions) };
}

/** Composite descending, ties by branch name. */
export function rankScorecards(cards: readonly Scorecard[]): Scorecard[] {
  return [...cards].sort(
    (a, b) => b.compositeScore - a.compositeScore || compareCodePoints(a.branch, b.branch),
  );
}
