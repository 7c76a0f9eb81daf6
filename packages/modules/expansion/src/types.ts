import type { CafeDensity } from '@branchlens/core';
import type { BranchError } from '@branchlens/shared';

export const DIMENSION_KEYS = [
  'demandTrend',
  'branchStrength',
  'avgTicketHealth',
  'repeatCustomer',
  'productMix',
  'beverageAttachment',
] as const;

export type DimensionKey = (typeof DIMENSION_KEYS)[number];

// ── Dimension Details ────────────────────────────────────────────────

export interface DemandTrendDetail {
  momGrowthRates: number[];
  avgMomGrowthPct: number;
}

export interface BranchStrengthDetail {
  totalRevenue: number;
}

export interface AvgTicketDetail {
  avgTicket: number;
  channels: number;
  channelList: string[];
}

export interface RepeatCustomerDetail {
  totalCustomers: number;
  repeatCustomers: number;
  repeatPct: number;
  note?: string;
}

export interface ProductMixDetail {
  uniqueSkus: number;
  divisions: number;
  herfindahl: number;
}

export interface BeverageAttachmentDetail {
  beverageRevenue: number;
  itemsRevenue: number;
  bevPct: number;
}

export interface DimensionDetails {
  demandTrend: DemandTrendDetail;
  branchStrength: BranchStrengthDetail;
  avgTicketHealth: AvgTicketDetail;
  repeatCustomer: RepeatCustomerDetail;
  productMix: ProductMixDetail;
  beverageAttachment: BeverageAttachmentDetail;
}

export interface DimensionScore<D> {
  /** 0–100, 2 dp. */
  score: number;
  detail: D;
}

export type Dimensions = { [K in DimensionKey]: DimensionScore<DimensionDetails[K]> };

// ── Results ──────────────────────────────────────────────────────────

export interface Scorecard {
  branch: string;
  dimensions: Dimensions;
  compositeScore: number;
}

export interface Archetype {
  branch: string;
  compositeScore: number;
  /** Channel → sales. */
  channelMix: Record<string, number>;
  /** Top revenue divisions → revenue, highest first. */
  topCategories: Record<string, number>;
  beveragePct: number;
  recommendation: string;
}

export type Verdict = 'GO' | 'CAUTION' | 'NO-GO';

export interface CandidateLocation {
  area: string;
  governorate: string;
  score: number;
  population: number;
  universityNearby: boolean;
  footTrafficTier: number;
  rentTier: number;
  cafeDensity: CafeDensity;
  pros: string[];
  cons: string[];
}

export interface ExpansionResult {
  verdict: Verdict;
  verdictDetail: string;
  /** Null when no branch could be scored. */
  bestArchetype: Archetype | null;
  /** Scorecard of the requested branch; null when every branch was requested. */
  focus: Scorecard | null;
  scorecards: Scorecard[];
  candidateLocations: CandidateLocation[];
  risks: string[];
  errors: BranchError[];
  explanation: string;
}

export interface ExpansionError {
  error: string;
  availableBranches: string[];
  didYouMean: string[] | null;
}
