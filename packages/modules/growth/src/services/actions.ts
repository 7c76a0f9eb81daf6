/**
 * Rule-based recommendations. Each rule fires on a threshold and emits one
 * sentence; rules run in priority order and the list is capped.
 */

import { formatCount, formatPct, round2 } from '@branchlens/shared';
import type {
  BranchBeverageStats,
  BundleRecommendation,
  CustomerMetrics,
  DeliveryRepeatRate,
  HeroItem,
  RevenueMomentum,
  StaffingCapacity,
  Underperformer,
} from '../types';
import { NO_BEVERAGE_DELIVERY, NO_BEVERAGE_TAKE_AWAY } from './signals';

export const MAX_ACTIONS = 8;

/** Below this share of the benchmark's volume the gap is urgent. */
export const URGENT_VOLUME_RATIO = 0.5;
export const TRAILING_VOLUME_RATIO = 0.8;
/** Month-over-month growth (%) that counts as strong momentum. */
export const STRONG_MOMENTUM_PCT = 20;
/** Spend per customer below this share of the best branch is flagged. */
export const LOW_SPEND_RATIO = 0.6;
export const LOW_THROUGHPUT_PER_HOUR = 0.5;
export const MIN_DELIVERY_CUSTOMERS = 5;
export const LOW_REPEAT_RATE_PCT = 15;

export interface ActionInputs {
  branch: string;
  stats: ReadonlyMap<string, BranchBeverageStats>;
  heroCoffee: readonly HeroItem[];
  heroShake: readonly HeroItem[];
  underperformers: readonly Underperformer[];
  channelInsight: string;
  bundles: readonly BundleRecommendation[];
  momentum: RevenueMomentum;
  customers: CustomerMetrics;
  staffing: StaffingCapacity;
  deliveryRepeat: DeliveryRepeatRate;
}

function benchmark(stats: ReadonlyMap<string, BranchBeverageStats>): { branch: string; qty: number } {
  let best = { branch: '', qty: -Infinity };
  for (const [branch, s] of stats) {
    if (s.totalBevQty > best.qty) best = { branch, qty: s.totalBevQty };
  }
  return best;
}

function bestSpendPerCustomer(
  stats: ReadonlyMap<string, BranchBeverageStats>,
  fallbackBranch: string,
): { branch: string; spend: number } {
  let best = { branch: fallbackBranch, spend: 0 };
  for (const [branch, s] of stats) {
    if (s.totalCustomers <= 0) continue;
    const spend = s.bevRevenue / s.totalCustomers;
    if (spend > best.spend) best = { branch, spend };
  }
  return best;
}

export function generateActions(input: ActionInputs): string[] {
  const { branch, stats, momentum, customers, staffing, deliveryRepeat } = input;
  const own = stats.get(branch);
  const actions: string[] = [];

  // Volume against the strongest beverage branch
  const bench = benchmark(stats);
  const myQty = own?.totalBevQty ?? 0;
  const behind = () => formatPct((1 - myQty / bench.qty) * 100);
  if (myQty < bench.qty * URGENT_VOLUME_RATIO) {
    actions.push(
      `URGENT: Beverage volume is ${myQty} units — ${behind()} behind ${bench.branch} (${bench.qty} units). ` +
        'Prioritise beverage promotion and staff training.',
    );
  } else if (myQty < bench.qty * TRAILING_VOLUME_RATIO) {
    actions.push(
      `Beverage volume (${myQty}) trails ${bench.branch} (${bench.qty}) by ${behind()}. ` +
        'Target coffee upselling during peak hours.',
    );
  }

  const mom = formatPct(momentum.momGrowthPct, 1, true);
  if (momentum.trend === 'declining') {
    actions.push(
      `WARNING: Revenue is declining (MoM: ${mom} in ${momentum.latestMonth}). ` +
        'Investigate root cause — pricing, footfall, or competition.',
    );
  } else if (momentum.trend === 'growing' && momentum.momGrowthPct > STRONG_MOMENTUM_PCT) {
    actions.push(
      `Strong momentum: ${mom} MoM growth in ${momentum.latestMonth}. ` +
        'Capitalise by expanding beverage range while traffic is up.',
    );
  }

  if (customers.totalCustomers > 0) {
    const spend = round2((own?.bevRevenue ?? 0) / customers.totalCustomers);
    const best = bestSpendPerCustomer(stats, branch);
    if (best.spend > 0 && spend < best.spend * LOW_SPEND_RATIO) {
      actions.push(
        `Low beverage spend per customer (${formatCount(spend)} vs ${formatCount(best.spend)} at ${best.branch}). ` +
          'Train staff on upselling drinks with every dessert order.',
      );
    }
  }

  if (staffing.bevPerStaffHour > 0 && staffing.bevPerStaffHour < LOW_THROUGHPUT_PER_HOUR) {
    actions.push(
      `Low beverage throughput (${staffing.bevPerStaffHour} units/staff-hour). ` +
        'Consider dedicated barista shifts or workflow optimisation.',
    );
  }

  if (deliveryRepeat.deliveryCustomers > MIN_DELIVERY_CUSTOMERS && deliveryRepeat.repeatRatePct < LOW_REPEAT_RATE_PCT) {
    actions.push(
      `Delivery repeat rate is only ${formatPct(deliveryRepeat.repeatRatePct)} ` +
        `(${deliveryRepeat.repeatCustomers}/${deliveryRepeat.deliveryCustomers} customers). ` +
        'Launch a loyalty or bundled-delivery beverage deal.',
    );
  } else if (deliveryRepeat.deliveryCustomers === 0) {
    actions.push('No delivery customers — consider launching a delivery beverage menu.');
  }

  const [topCoffee] = input.heroCoffee;
  if (topCoffee) {
    actions.push(`Push hero coffee: ${topCoffee.item} (your #1 seller with ${topCoffee.qty} units).`);
  }
  const [topShake] = input.heroShake;
  if (topShake) {
    actions.push(`Push hero milkshake: ${topShake.item} (your #1 shake with ${topShake.qty} units).`);
  }

  const [worst] = input.underperformers;
  if (worst) {
    actions.push(
      `Growth opportunity: ${worst.item} sells ${worst.bestQty} units at ${worst.bestBranch} ` +
        `but only ${worst.yourQty} here (${formatPct(worst.gapPct)} gap). Investigate visibility and staffing.`,
    );
  }

  if (input.channelInsight.includes(NO_BEVERAGE_DELIVERY)) {
    actions.push('Enable beverage delivery — other branches show delivery demand for drinks.');
  }
  if (input.channelInsight.includes(NO_BEVERAGE_TAKE_AWAY)) {
    actions.push('Add grab-and-go beverage promotion for take-away customers.');
  }

  const [topBundle] = input.bundles;
  if (topBundle) {
    actions.push(
      `Bundle opportunity: ${topBundle.dessert} + ${topBundle.beverage} ` +
        `(co-purchased ${topBundle.coOccurrenceCount}x). Create a combo deal.`,
    );
  }

  return actions.slice(0, MAX_ACTIONS);
}
