import type { ChannelSalesRow, ItemSalesRow, MonthlySalesRow } from '@branchlens/core';
import { listBranches, sortMonthlySeries } from '@branchlens/core';
import { compareCodePoints, round2 } from '@branchlens/shared';
import type { Archetype, Scorecard, Verdict } from '../types';
import { revenueByDivision } from './scorecard';

// ── Archetype ────────────────────────────────────────────────────────

export const TOP_CATEGORY_COUNT = 5;

export function buildArchetype(
  best: Scorecard,
  channelSales: readonly ChannelSalesRow[],
  itemSales: readonly ItemSalesRow[],
): Archetype {
  const channelMix: Record<string, number> = {};
  for (const row of channelSales) {
    if (row.branch === best.branch) channelMix[row.channel] = round2(row.sales);
  }

  const topCategories: Record<string, number> = {};
  const divisions = [...revenueByDivision(itemSales.filter((r) => r.branch === best.branch))]
    .sort(([aName, a], [bName, b]) => b - a || compareCodePoints(aName, bName))
    .slice(0, TOP_CATEGORY_COUNT);
  for (const [division, revenue] of divisions) topCategories[division] = round2(revenue);

  const beveragePct = best.dimensions.beverageAttachment.detail.bevPct;
  return {
    branch: best.branch,
    compositeScore: best.compositeScore,
    channelMix,
    topCategories,
    beveragePct,
    recommendation:
      `Replicate the '${best.branch}' operating model: ` +
      `${Object.keys(channelMix).join(', ')} channels, ` +
      `${beveragePct.toFixed(1)}% beverage attachment.`,
  };
}

// ── Verdict ──────────────────────────────────────────────────────────

export const GO_THRESHOLD = 65;
export const CAUTION_THRESHOLD = 45;

export function verdictFor(score: number): Verdict {
  if (score >= GO_THRESHOLD) return 'GO';
  if (score >= CAUTION_THRESHOLD) return 'CAUTION';
  return 'NO-GO';
}

export function verdictDetail(verdict: Verdict, branch: string, score: number): string {
  switch (verdict) {
    case 'GO':
      return (
        `Expansion is recommended. The best archetype ('${branch}') ` +
        `scores ${score}/100, indicating a strong replicable profile.`
      );
    case 'CAUTION':
      return (
        `Expansion is conditionally feasible. The best archetype scores ` +
        `${score}/100 — proceed with limited pilot and close monitoring.`
      );
    case 'NO-GO':
      return (
        `Expansion is not recommended at this time. The best archetype ` +
        `scores only ${score}/100 — focus on strengthening existing branches first.`
      );
  }
}

// ── Risks ────────────────────────────────────────────────────────────

function monthLabel(row: MonthlySalesRow): string {
  return `${row.month.slice(0, 3)} ${row.year}`;
}

/** Standing caveats plus the data-coverage ones computed from the monthly table. */
export function expansionRisks(monthlySales: readonly MonthlySalesRow[]): string[] {
  const ordered = sortMonthlySeries(monthlySales);
  const periods = new Set(ordered.map((r) => `${r.year}-${r.monthIndex}`));
  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  const coverage =
    first && last
      ? `Sales data covers only ${periods.size} months (${monthLabel(first)}–${monthLabel(last)}); trends may not persist.`
      : 'No monthly sales history is available; trend scores are neutral.';

  const monthsPerBranch = listBranches(monthlySales).map((branch) => ({
    branch,
    months: monthlySales.filter((r) => r.branch === branch).length,
  }));
  const shortest = [...monthsPerBranch].sort((a, b) => a.months - b.months)[0];
  const history =
    shortest && shortest.months < periods.size
      ? `${shortest.branch} has only ${shortest.months} months of data, potentially biasing its trend score.`
      : 'All branches share the same history window; seasonality is not captured.';

  return [
    coverage,
    'Numeric values are intentionally scaled — scores reflect relative patterns, not absolute revenue.',
    'Repeat-customer signal is delivery-only; TABLE/TAKE-AWAY repeat behavior is unobserved.',
    'Candidate location scores use curated external data (population, foot traffic tiers) — not precise real-estate analytics.',
    history,
  ];
}
