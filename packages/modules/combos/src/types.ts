export interface ComboThresholds {
  minSupport: number;
  minConfidence: number;
  minLift: number;
}

export interface ComboParams extends ComboThresholds {
  branch: string;
  topK: number;
  includeModifiers: boolean;
}

export interface ComboRecommendation {
  itemA: string;
  itemB: string;
  /** Share of baskets containing both items (0–1). */
  support: number;
  /** P(B | A). */
  confidenceAToB: number;
  /** P(A | B). */
  confidenceBToA: number;
  lift: number;
  basketCount: number;
  avgComboRevenue: number;
  priceA: number;
  priceB: number;
  individualTotal: number;
  suggestedComboPrice: number;
  savings: number;
}

export interface ComboResult {
  branch: string;
  totalBaskets: number;
  includeModifiers: boolean;
  recommendations: ComboRecommendation[];
  explanation: string;
}

export interface MlComboRecommendation {
  itemA: string;
  itemB: string;
  /** Cosine similarity of the two item columns over training baskets. */
  similarity: number;
  /** Share of training baskets containing both items (0–1). */
  support: number;
  trainBasketCount: number;
}

export interface MlComboResult {
  branch: string;
  modelName: string;
  trainBaskets: number;
  testBaskets: number;
  recommendations: MlComboRecommendation[];
  precisionAtK: number | null;
  evaluationNote: string;
  explanation: string;
}

export interface ComboComparison {
  branch: string;
  modelName: string;
  nonAiAnswerLine: string;
  mlAnswerLine: string;
  nonAiRecommendations: ComboRecommendation[];
  mlRecommendations: MlComboRecommendation[];
  mlPrecisionAtK: number | null;
}
