import { errorFields, getDataContext, listBranches, logger, resolveBranch } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import { ConfigurationError, DataSchemaError, describeError, parseInput } from '@branchlens/shared';
import type { BranchError } from '@branchlens/shared';
import type { BeverageProfile, BranchBeverageStats, GrowthResult } from '../types';
import { growthParamsSchema } from '../validation';
import type { GrowthParamsInput } from '../validation';
import {
  COFFEE_DIVISION,
  GROWTH_DIVISIONS,
  SHAKE_DIVISION,
  UNDERPERFORMER_GAP_PCT,
  branchBeverageStats,
  findUnderperformers,
  heroItems,
  penetrationRanks,
} from '../services/beverage-kpis';
import {
  beverageBundles,
  channelInsight,
  customerMetrics,
  deliveryRepeatRate,
  revenueMomentum,
  staffingCapacity,
} from '../services/signals';
import { generateActions } from '../services/actions';

/**
 * Beverage growth strategy for one branch or the whole chain.
 *
 * Branches come from item-level sales. Every branch is benchmarked against
 * all peers even when only one profile is requested. An unknown branch
 * yields no profiles and an explanation listing the known ones.
 */
export function growthStrategy(
  input: GrowthParamsInput = {},
  ctx: DataContext = getDataContext(),
): GrowthResult {
  const { branch } = parseInput(growthParamsSchema, input, 'Invalid growth parameters');

  const itemSales = ctx.itemSales.get();
  const channelSales = ctx.channelSales.get();
  const allBranches = listBranches(itemSales);

  const resolution = resolveBranch(branch, allBranches);
  if (resolution.kind === 'unknown') {
    return {
      branch,
      branches: [],
      errors: [],
      explanation: `Branch '${resolution.requested}' not found. Available: ${allBranches.join(', ')}`,
    };
  }
  const targets = resolution.kind === 'match' ? [resolution.branch] : allBranches;

  const divisionChannels = ctx.divisionChannels.get();
  const basketLines = ctx.basketLines.get();
  const monthlySales = ctx.monthlySales.get();
  const customerOrders = ctx.customerOrders.get();
  const attendance = ctx.attendance.get();

  const stats = new Map<string, BranchBeverageStats>(
    allBranches.map((b) => [b, branchBeverageStats(itemSales, channelSales, b)]),
  );
  const ranks = penetrationRanks(stats);

  const profiles: BeverageProfile[] = [];
  const errors: BranchError[] = [];

  for (const b of targets) {
    try {
      const own = stats.get(b) ?? branchBeverageStats(itemSales, channelSales, b);
      const heroCoffee = heroItems(itemSales, COFFEE_DIVISION, b);
      const heroShake = heroItems(itemSales, SHAKE_DIVISION, b);
      const underperformers = findUnderperformers(itemSales, b, GROWTH_DIVISIONS);
      const insight = channelInsight(divisionChannels, b);
      const bundles = beverageBundles(basketLines, b);
      const momentum = revenueMomentum(monthlySales, b);
      const customers = customerMetrics(channelSales, b);
      const deliveryRepeat = deliveryRepeatRate(customerOrders, b);
      const staffing = staffingCapacity(attendance, b, own.totalBevQty);

      profiles.push({
        branch: b,
        beveragePenetrationPct: own.penetrationPct,
        penetrationRank: ranks.get(b) ?? allBranches.length,
        coffeeQty: own.coffeeQty,
        coffeeRevenue: own.coffeeRevenue,
        milkshakeQty: own.shakeQty,
        milkshakeRevenue: own.shakeRevenue,
        frappeQty: own.frappeQty,
        frappeRevenue: own.frappeRevenue,
        heroCoffeeItems: heroCoffee,
        heroMilkshakeItems: heroShake,
        underperformingItems: underperformers,
        channelInsight: insight,
        bundleRecommendations: bundles,
        revenueMomentum: momentum,
        customerMetrics: customers,
        deliveryRepeatRate: deliveryRepeat,
        staffingCapacity: staffing,
        actions: generateActions({
          branch: b,
          stats,
          heroCoffee,
          heroShake,
          underperformers,
          channelInsight: insight,
          bundles,
          momentum,
          customers,
          staffing,
          deliveryRepeat,
        }),
      });
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof DataSchemaError) throw err;
      logger.warn('Branch growth profile failed', { branch: b, error: errorFields(err) });
      errors.push({ branch: b, error: describeError(err) });
    }
  }

  logger.debug('Growth strategy built', { branch, profiles: profiles.length, failed: errors.length });

  return {
    branch,
    branches: profiles,
    errors,
    explanation:
      `Analysed beverage performance across ${allBranches.length} branches. ` +
      `Beverage divisions: ${GROWTH_DIVISIONS.join(', ')}. ` +
      `Penetration = beverage revenue / total branch revenue. ` +
      `Underperformers = items ≥${UNDERPERFORMER_GAP_PCT}% behind the best branch by qty. ` +
      `Bundles from dessert-beverage basket co-purchases (${new Set(basketLines.map((l) => l.basketId)).size} baskets). ` +
      `Revenue momentum from monthly sales (first-half vs second-half average). ` +
      `Customer metrics from channel traffic and average ticket. ` +
      `Delivery repeat rate from delivery customer orders (${customerOrders.length} customers). ` +
      `Staffing capacity from time attendance (${attendance.length} shift records).`,
  };
}
