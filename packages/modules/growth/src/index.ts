export const MODULE_KEY = 'growth' as const;
export const MODULE_NAME = 'Beverage Growth';

// ── Queries ───────────────────────────────────────────────────
export { growthStrategy } from './queries/growth-strategy';

// ── Services (Pure Functions) ─────────────────────────────────
export {
  COFFEE_DIVISION,
  FRAPPE_DIVISION,
  SHAKE_DIVISION,
  GROWTH_DIVISIONS,
  HERO_ITEM_COUNT,
  UNDERPERFORMER_GAP_PCT,
  UNDERPERFORMER_MIN_BEST_QTY,
  UNDERPERFORMER_LIMIT,
  divisionTotals,
  branchBeverageStats,
  penetrationRanks,
  heroItems,
  findUnderperformers,
} from './services/beverage-kpis';
export {
  BEVERAGE_KEYWORDS,
  DESSERT_KEYWORDS,
  BUNDLE_LIMIT,
  MOMENTUM_BAND,
  isBeverageItem,
  isDessertItem,
  channelInsight,
  beverageBundles,
  revenueMomentum,
  customerMetrics,
  deliveryRepeatRate,
  attendancePeriod,
  staffingCapacity,
} from './services/signals';
export { MAX_ACTIONS, generateActions } from './services/actions';
export type { ActionInputs } from './services/actions';

// ── Validation ────────────────────────────────────────────────
export { growthParamsSchema } from './validation';
export type { GrowthParamsInput } from './validation';

// ── Types ─────────────────────────────────────────────────────
export type {
  HeroItem,
  Underperformer,
  BundleRecommendation,
  MomentumTrend,
  RevenueMomentum,
  ChannelTicket,
  CustomerMetrics,
  DeliveryRepeatRate,
  StaffingCapacity,
  BranchBeverageStats,
  BeverageProfile,
  GrowthResult,
} from './types';
