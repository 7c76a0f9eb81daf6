import type {
  AttendanceRow,
  BasketLine,
  ChannelSalesRow,
  CustomerOrderRow,
  DivisionChannelRow,
  MonthlySalesRow,
} from '@branchlens/core';
import { branchSeries } from '@branchlens/core';
import {
  MONTH_NAMES,
  compareCodePoints,
  isAllBranches,
  mean,
  round1,
  round2,
  safeDivide,
  sum,
} from '@branchlens/shared';
import type {
  BundleRecommendation,
  CustomerMetrics,
  DeliveryRepeatRate,
  MomentumTrend,
  RevenueMomentum,
  StaffingCapacity,
} from '../types';
import { GROWTH_DIVISIONS } from './beverage-kpis';

// ── Keywords ─────────────────────────────────────────────────────────

export const BEVERAGE_KEYWORDS: readonly string[] = [
  'COFFEE',
  'ESPRESSO',
  'LATTE',
  'CAPPUCCINO',
  'AMERICANO',
  'MOCHA',
  'FRAPPE',
  'MILKSHAKE',
  'SHAKE',
  'CHOCOLATE COMBO',
  'MATCHA',
  'MACCHIATO',
  'MACHIATO',
  'FLAT WHITE',
  'AFFOGATO',
  'WHITE MOCHA',
];

export const DESSERT_KEYWORDS: readonly string[] = [
  'CHIMNEY',
  'CONUT',
  'MINI',
  'BOWL',
  'BITES',
  'ICE CREAM',
  'TIRAMISU',
];

export const BUNDLE_LIMIT = 5;
/** Second-half average this far above or below the first half sets the trend. */
export const MOMENTUM_BAND = 0.1;

export function isBeverageItem(description: string): boolean {
  const d = description.toUpperCase();
  return BEVERAGE_KEYWORDS.some((kw) => d.includes(kw));
}

export function isDessertItem(description: string): boolean {
  const d = description.toUpperCase();
  return DESSERT_KEYWORDS.some((kw) => d.includes(kw));
}

// ── Channel insight ──────────────────────────────────────────────────

export const NO_BEVERAGE_DELIVERY = 'No beverage delivery sales';
export const NO_BEVERAGE_TAKE_AWAY = 'No take-away beverage sales';

export function channelInsight(rows: readonly DivisionChannelRow[], branch: string): string {
  const divisions: readonly string[] = GROWTH_DIVISIONS;
  const bev = rows.filter((r) => r.section === branch && divisions.includes(r.item));
  if (bev.length === 0) return `No channel data available for beverages at ${branch}.`;

  const delivery = sum(bev.map((r) => r.delivery));
  const table = sum(bev.map((r) => r.table));
  const takeAway = sum(bev.map((r) => r.takeAway));
  const total = delivery + table + takeAway;
  if (total === 0) return `No beverage revenue recorded across any channel at ${branch}.`;

  const share = (v: number) => ((v / total) * 100).toFixed(0);
  const parts: string[] = [];
  if (delivery > 0) parts.push(`Delivery: ${share(delivery)}%`);
  if (table > 0) parts.push(`Table: ${share(table)}%`);
  if (takeAway > 0) parts.push(`Take-away: ${share(takeAway)}%`);

  let insight = `Channel mix — ${parts.join(', ')}.`;
  if (delivery === 0) insight += ` ${NO_BEVERAGE_DELIVERY} — consider enabling delivery for drinks.`;
  if (takeAway === 0) insight += ` ${NO_BEVERAGE_TAKE_AWAY} — consider promoting grab-and-go beverages.`;
  return insight;
}

// ── Bundles ──────────────────────────────────────────────────────────

/** Dessert/beverage pairs bought in the same basket, most frequent first. */
export function beverageBundles(
  lines: readonly BasketLine[],
  branch: string,
  limit: number = BUNDLE_LIMIT,
): BundleRecommendation[] {
  const wanted = branch.trim().toLowerCase();
  const baskets = new Map<string, Set<string>>();
  for (const line of lines) {
    if (line.isCancellation) continue;
    if (!isAllBranches(branch) && line.branch.trim().toLowerCase() !== wanted) continue;
    let items = baskets.get(line.basketId);
    if (!items) {
      items = new Set();
      baskets.set(line.basketId, items);
    }
    items.add(line.item);
  }

  const counts = new Map<string, BundleRecommendation>();
  for (const items of baskets.values()) {
    if (items.size < 2) continue;
    const beverages = [...items].filter(isBeverageItem);
    const desserts = [...items].filter(isDessertItem);
    for (const dessert of desserts) {
      for (const beverage of beverages) {
        if (dessert === beverage) continue;
        const key = `${dessert}\u0000${beverage}`;
        const entry = counts.get(key) ?? { dessert, beverage, coOccurrenceCount: 0 };
        entry.coOccurrenceCount += 1;
        counts.set(key, entry);
      }
    }
  }

  return [...counts.values()]
    .sort(
      (a, b) =>
        b.coOccurrenceCount - a.coOccurrenceCount ||
        compareCodePoints(a.dessert, b.dessert) ||
        compareCodePoints(a.beverage, b.beverage),
    )
    .slice(0, limit);
}

// ── Revenue momentum ─────────────────────────────────────────────────

/** Latest month-over-month change plus a first-half / second-half trend. */
export function revenueMomentum(rows: readonly MonthlySalesRow[], branch: string): RevenueMomentum {
  const series = branchSeries(rows, branch);
  if (series.length === 0) {
    return { monthsAvailable: 0, latestMonth: 'N/A', momGrowthPct: 0, trend: 'no data' };
  }
  if (series.length < 2) {
    return { monthsAvailable: series.length, latestMonth: 'N/A', momGrowthPct: 0, trend: 'insufficient data' };
  }

  const totals = series.map((r) => r.total);
  const latest = totals[totals.length - 1] ?? 0;
  const previous = totals[totals.length - 2] ?? 0;
  const momGrowthPct = previous > 0 ? round1(((latest - previous) / previous) * 100) : 0;

  const mid = Math.floor(totals.length / 2);
  const firstAvg = mean(totals.slice(0, mid));
  const secondAvg = mean(totals.slice(mid));

  let trend: MomentumTrend = 'stable';
  if (secondAvg > firstAvg * (1 + MOMENTUM_BAND)) trend = 'growing';
  else if (secondAvg < firstAvg * (1 - MOMENTUM_BAND)) trend = 'declining';

  return {
    monthsAvailable: series.length,
    latestMonth: series[series.length - 1]?.month ?? 'N/A',
    momGrowthPct,
    trend,
  };
}

// ── Customers ────────────────────────────────────────────────────────

export function customerMetrics(rows: readonly ChannelSalesRow[], branch: string): CustomerMetrics {
  const own = rows.filter((r) => r.branch === branch);
  const totalCustomers = Math.trunc(sum(own.map((r) => r.numCustomers)));
  const totalSales = sum(own.map((r) => r.sales));

  return {
    totalCustomers,
    totalSales: round2(totalSales),
    avgTicket: round2(safeDivide(totalSales, totalCustomers)),
    channels: own.map((r) => ({
      channel: r.channel,
      customers: Math.trunc(r.numCustomers),
      avgTicket: round2(r.avgPerCustomer),
    })),
  };
}

export function deliveryRepeatRate(rows: readonly CustomerOrderRow[], branch: string): DeliveryRepeatRate {
  const own = rows.filter((r) => r.branch === branch);
  const repeat = own.filter((r) => r.numOrders > 1).length;

  return {
    deliveryCustomers: own.length,
    repeatCustomers: repeat,
    repeatRatePct: round1(safeDivide(repeat, own.length) * 100),
    avgOrdersPerCustomer: round2(mean(own.map((r) => r.numOrders))),
  };
}

// ── Staffing capacity ────────────────────────────────────────────────

function monthYear(isoDate: string): string {
  const year = isoDate.slice(0, 4);
  const month = MONTH_NAMES[Number(isoDate.slice(5, 7)) - 1];
  return month ? `${month.slice(0, 3)} ${year}` : isoDate;
}

/** `Dec 2025`, or `Nov 2025–Dec 2025` when the rows span several months. */
export function attendancePeriod(rows: readonly AttendanceRow[]): string {
  const dates = rows.map((r) => r.punchInDate).sort(compareCodePoints);
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (first === undefined || last === undefined) return 'no dates';
  const from = monthYear(first);
  const to = monthYear(last);
  return from === to ? from : `${from}–${to}`;
}

/** Beverage units produced per attended staff hour. */
export function staffingCapacity(
  rows: readonly AttendanceRow[],
  branch: string,
  beverageQty: number,
): StaffingCapacity {
  if (rows.length === 0) {
    return { totalStaffHours: 0, uniqueEmployees: 0, bevPerStaffHour: 0, insight: 'No attendance data.' };
  }
  const own = rows.filter((r) => r.branch === branch);
  if (own.length === 0) {
    return {
      totalStaffHours: 0,
      uniqueEmployees: 0,
      bevPerStaffHour: 0,
      insight: `No attendance data for ${branch}.`,
    };
  }

  const totalStaffHours = round1(sum(own.map((r) => r.durationHours)));
  const uniqueEmployees = new Set(own.map((r) => r.empId)).size;
  const bevPerStaffHour = round2(safeDivide(beverageQty, totalStaffHours));

  let insight = `${uniqueEmployees} employees, ${totalStaffHours.toFixed(0)} total hours (${attendancePeriod(own)}). `;
  insight +=
    bevPerStaffHour < 1
      ? 'Low beverage throughput per staff hour — consider barista training.'
      : `Producing ${bevPerStaffHour} beverage units per staff hour.`;

  return { totalStaffHours, uniqueEmployees, bevPerStaffHour, insight };
}
