import { errorFields, getDataContext, listBranches, logger, resolveBranch } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import {
  ConfigurationError,
  DataSchemaError,
  describeError,
  parseInput,
} from '@branchlens/shared';
import type { BranchError } from '@branchlens/shared';
import type { ExpansionError, ExpansionResult, Scorecard } from '../types';
import { expansionParamsSchema } from '../validation';
import type { ExpansionParamsInput } from '../validation';
import { buildScorecard, peerBenchmarks, rankScorecards } from '../services/scorecard';
import type { ScoringTables } from '../services/scorecard';
import { buildArchetype, expansionRisks, verdictDetail, verdictFor } from '../services/archetype';
import { rankCandidateLocations } from '../services/candidate-locations';

export function isExpansionError(result: ExpansionResult | ExpansionError): result is ExpansionError {
  return 'error' in result;
}

/**
 * Scores every branch on six dimensions, picks the best archetype, issues
 * a GO / CAUTION / NO-GO verdict and ranks candidate areas.
 *
 * An empty branch or `all` evaluates the whole chain; a named branch is
 * matched case-insensitively and its scorecard is returned as `focus`.
 * Scores are always relative to every peer.
 */
export function evaluateExpansion(
  input: ExpansionParamsInput = {},
  ctx: DataContext = getDataContext(),
): ExpansionResult | ExpansionError {
  const { branch } = parseInput(expansionParamsSchema, input, 'Invalid expansion parameters');

  const tables: ScoringTables = {
    monthlySales: ctx.monthlySales.get(),
    channelSales: ctx.channelSales.get(),
    customerOrders: ctx.customerOrders.get(),
    itemSales: ctx.itemSales.get(),
    divisionChannels: ctx.divisionChannels.get(),
  };
  const areas = ctx.candidateAreas.get();
  const branches = listBranches(tables.monthlySales);

  const resolution = resolveBranch(branch, branches);
  if (resolution.kind === 'unknown') {
    return {
      error: `Unknown branch '${resolution.requested}'.`,
      availableBranches: branches,
      didYouMean: resolution.suggestions.length > 0 ? resolution.suggestions : null,
    };
  }
  const focusBranch = resolution.kind === 'match' ? resolution.branch : null;

  // ── Score each branch independently ──
  const peers = peerBenchmarks(tables);
  const cards: Scorecard[] = [];
  const errors: BranchError[] = [];
  for (const b of branches) {
    try {
      cards.push(buildScorecard(b, tables, peers));
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof DataSchemaError) throw err;
      logger.warn('Branch scorecard failed', { branch: b, error: errorFields(err) });
      errors.push({ branch: b, error: describeError(err) });
    }
  }
  const scorecards = rankScorecards(cards);

  const risks = expansionRisks(tables.monthlySales);
  const focus = focusBranch === null ? null : (scorecards.find((c) => c.branch === focusBranch) ?? null);

  const best = scorecards[0];
  if (!best) {
    return {
      verdict: 'NO-GO',
      verdictDetail: 'No branch could be scored; expansion cannot be assessed.',
      bestArchetype: null,
      focus,
      scorecards,
      candidateLocations: [],
      risks,
      errors,
      explanation:
        `No branch could be scored (${errors.length} failed). ` +
        'Candidate locations are not ranked without an archetype.',
    };
  }

  const candidateLocations = rankCandidateLocations(areas);

  const verdict = verdictFor(best.compositeScore);
  logger.debug('Expansion evaluated', {
    branch: focusBranch ?? 'all',
    scored: scorecards.length,
    failed: errors.length,
    best: best.branch,
    verdict,
  });

  return {
    verdict,
    verdictDetail: verdictDetail(verdict, best.branch, best.compositeScore),
    bestArchetype: buildArchetype(best, tables.channelSales, tables.itemSales),
    focus,
    scorecards,
    candidateLocations,
    risks,
    errors,
    explanation:
      `Scored ${scorecards.length} branches across 6 KPI dimensions ` +
      `(demand trend, branch strength, avg ticket, repeat customers, product mix, beverage attachment). ` +
      `Best archetype: '${best.branch}' with composite score ${best.compositeScore}/100. ` +
      `Verdict: ${verdict}. ` +
      `Ranked ${candidateLocations.length} candidate locations for expansion ` +
      `(excluding areas where the chain is already present). ` +
      `Data sources: monthly sales, channel summary, delivery customer orders, ` +
      `item-level sales, division-channel breakdown, plus external area data.`,
  };
}
