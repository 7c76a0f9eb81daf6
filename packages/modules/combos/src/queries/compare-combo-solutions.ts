import { getDataContext } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import type {
  ComboComparison,
  ComboRecommendation,
  MlComboRecommendation,
} from '../types';
import type { ComboParamsInput } from '../validation';
import { ML_MODEL_NAME } from '../services/cosine-similarity';
import { recommendCombos } from './recommend-combos';
import { recommendCombosMl } from './recommend-combos-ml';

const SUMMARY_PAIRS = 3;

export function summarizeRules(recommendations: readonly ComboRecommendation[]): string {
  if (recommendations.length === 0) return 'The non AI answer: no item pairs passed the thresholds.';
  const pairs = recommendations
    .slice(0, SUMMARY_PAIRS)
    .map((r) => `${r.itemA} + ${r.itemB} (lift ${r.lift.toFixed(2)})`)
    .join('; ');
  return `The non AI answer: ${pairs}.`;
}

export function summarizeMl(
  recommendations: readonly MlComboRecommendation[],
  precision: number | null,
): string {
  const prefix = `The ML [${ML_MODEL_NAME}] answer:`;
  const precisionText =
    precision === null ? 'precision@K n/a' : `precision@K ${precision.toFixed(2)}`;
  if (recommendations.length === 0) return `${prefix} no similar item pairs found (${precisionText}).`;
  const pairs = recommendations
    .slice(0, SUMMARY_PAIRS)
    .map((r) => `${r.itemA} + ${r.itemB} (similarity ${r.similarity.toFixed(2)})`)
    .join('; ');
  return `${prefix} ${pairs} (${precisionText}).`;
}

/** Runs both engines with the same parameters for side-by-side evaluation. */
export function compareComboSolutions(
  input: ComboParamsInput,
  ctx: DataContext = getDataContext(),
): ComboComparison {
  const rules = recommendCombos(input, ctx);
  const ml = recommendCombosMl(input, ctx);

  return {
    branch: rules.branch,
    modelName: ML_MODEL_NAME,
    nonAiAnswerLine: summarizeRules(rules.recommendations),
    mlAnswerLine: summarizeMl(ml.recommendations, ml.precisionAtK),
    nonAiRecommendations: rules.recommendations,
    mlRecommendations: ml.recommendations,
    mlPrecisionAtK: ml.precisionAtK,
  };
}
