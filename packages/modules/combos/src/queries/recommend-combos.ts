import { getDataContext, logger } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import { isAllBranches, parseInput } from '@branchlens/shared';
import type { ComboParams, ComboResult } from '../types';
import { comboParamsSchema } from '../validation';
import type { ComboParamsInput } from '../validation';
import { averageItemPrices, buildBaskets, filterBasketLines } from '../services/basket-builder';
import type { Basket } from '../services/basket-builder';
import { mineAssociationRules } from '../services/association-rules';

export interface PreparedBaskets {
  params: ComboParams;
  branchLabel: string;
  baskets: Basket[];
  itemPrices: Map<string, number>;
}

/** Validates parameters, filters lines and builds baskets. Shared by both combo engines. */
export function prepareBaskets(input: ComboParamsInput, ctx: DataContext): PreparedBaskets {
  const params = parseInput(comboParamsSchema, input, 'Invalid combo parameters');
  const lines = filterBasketLines(ctx.basketLines.get(), params);
  return {
    params,
    branchLabel: params.branch,
    baskets: buildBaskets(lines),
    itemPrices: averageItemPrices(lines),
  };
}

export function emptyComboResult(branch: string, includeModifiers: boolean): ComboResult {
  return {
    branch,
    totalBaskets: 0,
    includeModifiers,
    recommendations: [],
    explanation: `No baskets with ≥2 items found for branch '${branch}'.`,
  };
}

/**
 * Top-K co-purchased item pairs for a branch (or `all`), ranked by lift.
 */
export function recommendCombos(
  input: ComboParamsInput,
  ctx: DataContext = getDataContext(),
): ComboResult {
  const { params, branchLabel, baskets, itemPrices } = prepareBaskets(input, ctx);
  const { topK, includeModifiers, minSupport, minConfidence, minLift } = params;

  if (baskets.length === 0) {
    logger.debug('Combo engine found no qualifying baskets', { branch: branchLabel });
    return emptyComboResult(branchLabel, includeModifiers);
  }

  const ranked = mineAssociationRules(baskets, itemPrices, params);
  const recommendations = ranked.slice(0, topK);

  logger.debug('Combo engine ranked pairs', {
    branch: branchLabel,
    baskets: baskets.length,
    qualifyingPairs: ranked.length,
  });

  const scope = isAllBranches(branchLabel) ? ' across all branches' : ` for branch ${branchLabel}`;
  const explanation =
    `Analysed ${baskets.length} baskets${scope}. ` +
    `Found ${ranked.length} item pairs passing thresholds ` +
    `(support≥${minSupport}, confidence≥${minConfidence}, lift≥${minLift}). ` +
    `Returning top ${recommendations.length} by lift. ` +
    `Modifiers ${includeModifiers ? 'included' : 'excluded'}.`;

  return {
    branch: branchLabel,
    totalBaskets: baskets.length,
    includeModifiers,
    recommendations,
    explanation,
  };
}
