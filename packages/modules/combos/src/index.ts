export const MODULE_KEY = 'combos' as const;
export const MODULE_NAME = 'Combo Recommendations';

// ── Queries ───────────────────────────────────────────────────
export { recommendCombos, prepareBaskets, emptyComboResult } from './queries/recommend-combos';
export type { PreparedBaskets } from './queries/recommend-combos';
export { recommendCombosMl } from './queries/recommend-combos-ml';
export {
  compareComboSolutions,
  summarizeRules,
  summarizeMl,
} from './queries/compare-combo-solutions';

// ── Services (Pure Functions) ─────────────────────────────────
export {
  NON_PRODUCT_ITEMS,
  MIN_BASKET_ITEMS,
  filterBasketLines,
  buildBaskets,
  averageItemPrices,
  basketPairs,
  pairKey,
} from './services/basket-builder';
export type { Basket, BasketFilterOptions } from './services/basket-builder';
export {
  BUNDLE_DISCOUNT_PCT,
  countOccurrences,
  computePairMetrics,
  passesThresholds,
  averageComboRevenue,
  suggestBundlePrice,
  mineAssociationRules,
} from './services/association-rules';
export type { PairMetrics, BundlePrice } from './services/association-rules';
export {
  ML_MODEL_NAME,
  ML_SPLIT_SEED,
  TRAIN_FRACTION,
  splitBaskets,
  fitItemSimilarity,
  rankSimilarPairs,
  precisionAtK,
  truePairs,
} from './services/cosine-similarity';
export type { BasketSplit, ItemSimilarityModel, PrecisionResult } from './services/cosine-similarity';

// ── Validation ────────────────────────────────────────────────
export { comboParamsSchema } from './validation';
export type { ComboParamsInput } from './validation';

// ── Types ─────────────────────────────────────────────────────
export type {
  ComboThresholds,
  ComboParams,
  ComboRecommendation,
  ComboResult,
  MlComboRecommendation,
  MlComboResult,
  ComboComparison,
} from './types';
