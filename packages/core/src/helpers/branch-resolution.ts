import { compareCodePoints, isAllBranches } from '@branchlens/shared';

export type BranchResolution =
  | { kind: 'all' }
  | { kind: 'match'; branch: string }
  | { kind: 'unknown'; requested: string; suggestions: string[] };

/** Sorted distinct branch names from any table keyed by branch. */
export function listBranches(rows: ReadonlyArray<{ branch: string }>): string[] {
  return [...new Set(rows.map((r) => r.branch))].sort(compareCodePoints);
}

/**
 * Resolve a user-supplied branch name against the known set.
 *
 * Exact match first, then case-insensitive; otherwise suggest every branch
 * whose name contains the request. Empty input and `all` mean every branch.
 */
export function resolveBranch(requested: string, branches: readonly string[]): BranchResolution {
  const label = requested.trim();
  if (label === '' || isAllBranches(label)) return { kind: 'all' };

  if (branches.includes(label)) return { kind: 'match', branch: label };

  const lower = label.toLowerCase();
  const caseInsensitive = branches.find((b) => b.toLowerCase() === lower);
  if (caseInsensitive) return { kind: 'match', branch: caseInsensitive };

  const suggestions = branches.filter((b) => b.toLowerCase().includes(lower));
  return { kind: 'unknown', requested: label, suggestions };
}
