import { getDataContext, logger } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import type { MlComboResult } from '../types';
import type { ComboParamsInput } from '../validation';
import {
  ML_MODEL_NAME,
  ML_SPLIT_SEED,
  fitItemSimilarity,
  precisionAtK,
  rankSimilarPairs,
  splitBaskets,
} from '../services/cosine-similarity';
import { prepareBaskets } from './recommend-combos';

/**
 * Cosine-similarity combo recommendations with held-out precision@K.
 * Reproducible run to run: the split seed is fixed and items are ordered.
 */
export function recommendCombosMl(
  input: ComboParamsInput,
  ctx: DataContext = getDataContext(),
): MlComboResult {
  const { params, branchLabel, baskets } = prepareBaskets(input, ctx);

  if (baskets.length === 0) {
    return {
      branch: branchLabel,
      modelName: ML_MODEL_NAME,
      trainBaskets: 0,
      testBaskets: 0,
      recommendations: [],
      precisionAtK: null,
      evaluationNote: 'No baskets with ≥2 items; nothing to train or evaluate.',
      explanation: `No baskets with ≥2 items found for branch '${branchLabel}'.`,
    };
  }

  const { train, test } = splitBaskets(baskets, ML_SPLIT_SEED);
  const model = fitItemSimilarity(train);
  const recommendations = rankSimilarPairs(model, params.minSupport).slice(0, params.topK);
  const evaluation = precisionAtK(recommendations, test);

  logger.debug('Cosine combo model evaluated', {
    branch: branchLabel,
    trainBaskets: train.length,
    testBaskets: test.length,
    items: model.items.length,
    precisionAtK: evaluation.precisionAtK,
  });

  return {
    branch: branchLabel,
    modelName: ML_MODEL_NAME,
    trainBaskets: train.length,
    testBaskets: test.length,
    recommendations,
    precisionAtK: evaluation.precisionAtK,
    evaluationNote: evaluation.note,
    explanation:
      `Trained ${ML_MODEL_NAME} on ${train.length} baskets (seed ${ML_SPLIT_SEED}), ` +
      `held out ${test.length}. ${model.items.length} items, ` +
      `${recommendations.length} pairs returned (support≥${params.minSupport}).`,
  };
}
