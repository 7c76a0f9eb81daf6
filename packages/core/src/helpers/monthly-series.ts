import type { MonthlySalesRow } from '../data/tables';

/** Chronological order: year, then calendar month. */
export function sortMonthlySeries(rows: readonly MonthlySalesRow[]): MonthlySalesRow[] {
  return [...rows].sort((a, b) => a.year - b.year || a.monthIndex - b.monthIndex);
}

/** One branch's monthly rows in chronological order. */
export function branchSeries(rows: readonly MonthlySalesRow[], branch: string): MonthlySalesRow[] {
  return sortMonthlySeries(rows.filter((r) => r.branch === branch));
}
