export const MODULE_KEY = 'expansion' as const;
export const MODULE_NAME = 'Expansion Feasibility';

// ── Queries ───────────────────────────────────────────────────
export { evaluateExpansion, isExpansionError } from './queries/evaluate-expansion';

// ── Services (Pure Functions) ─────────────────────────────────
export {
  DEFAULT_WEIGHTS,
  NEUTRAL_SCORE,
  BEVERAGE_DIVISIONS,
  ITEMS_TOTAL_ROW,
  scoreDemandTrend,
  scoreBranchStrength,
  scoreAvgTicket,
  scoreRepeatCustomer,
  scoreProductMix,
  scoreBeverageAttachment,
  herfindahlIndex,
  revenueByDivision,
  uniqueSkuCount,
  compositeScore,
  peerBenchmarks,
  buildScorecard,
  rankScorecards,
} from './services/scorecard';
export type { ScoringTables, PeerBenchmarks } from './services/scorecard';
export {
  TOP_CATEGORY_COUNT,
  GO_THRESHOLD,
  CAUTION_THRESHOLD,
  buildArchetype,
  verdictFor,
  verdictDetail,
  expansionRisks,
} from './services/archetype';
export {
  CANDIDATE_LIMIT,
  CAFE_DENSITY_SCORES,
  attractiveness,
  describeArea,
  scoreCandidate,
  rankCandidateLocations,
} from './services/candidate-locations';

// ── Validation ────────────────────────────────────────────────
export { expansionParamsSchema } from './validation';
export type { ExpansionParamsInput } from './validation';

// ── Types ─────────────────────────────────────────────────────
export { DIMENSION_KEYS } from './types';
export type {
  DimensionKey,
  DimensionScore,
  DimensionDetails,
  Dimensions,
  DemandTrendDetail,
  BranchStrengthDetail,
  AvgTicketDetail,
  RepeatCustomerDetail,
  ProductMixDetail,
  BeverageAttachmentDetail,
  Scorecard,
  Archetype,
  Verdict,
  CandidateLocation,
  ExpansionResult,
  ExpansionError,
} from './types';
