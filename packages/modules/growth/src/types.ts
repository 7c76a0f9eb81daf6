import type { BranchError } from '@branchlens/shared';

// ── Items ────────────────────────────────────────────────────────────

export interface HeroItem {
  item: string;
  qty: number;
  revenue: number;
  /** 1-based position by quantity. */
  rank: number;
}

export interface Underperformer {
  item: string;
  yourQty: number;
  bestBranch: string;
  bestQty: number;
  /** Volume gap to the best branch, 0–100. */
  gapPct: number;
}

export interface BundleRecommendation {
  dessert: string;
  beverage: string;
  coOccurrenceCount: number;
}

// ── Signals ──────────────────────────────────────────────────────────

export type MomentumTrend = 'growing' | 'declining' | 'stable' | 'no data' | 'insufficient data';

export interface RevenueMomentum {
  monthsAvailable: number;
  /** Month name of the last observation, `N/A` below two months. */
  latestMonth: string;
  momGrowthPct: number;
  trend: MomentumTrend;
}

export interface ChannelTicket {
  channel: string;
  customers: number;
  avgTicket: number;
}

export interface CustomerMetrics {
  totalCustomers: number;
  totalSales: number;
  avgTicket: number;
  channels: ChannelTicket[];
}

export interface DeliveryRepeatRate {
  deliveryCustomers: number;
  repeatCustomers: number;
  repeatRatePct: number;
  avgOrdersPerCustomer: number;
}

export interface StaffingCapacity {
  totalStaffHours: number;
  uniqueEmployees: number;
  bevPerStaffHour: number;
  insight: string;
}

// ── Cross-branch stats ───────────────────────────────────────────────

export interface BranchBeverageStats {
  coffeeQty: number;
  coffeeRevenue: number;
  frappeQty: number;
  frappeRevenue: number;
  shakeQty: number;
  shakeRevenue: number;
  totalBevQty: number;
  bevRevenue: number;
  totalRevenue: number;
  penetrationPct: number;
  totalCustomers: number;
}

// ── Results ──────────────────────────────────────────────────────────

export interface BeverageProfile {
  branch: string;
  beveragePenetrationPct: number;
  penetrationRank: number;
  coffeeQty: number;
  coffeeRevenue: number;
  milkshakeQty: number;
  milkshakeRevenue: number;
  frappeQty: number;
  frappeRevenue: number;
  heroCoffeeItems: HeroItem[];
  heroMilkshakeItems: HeroItem[];
  underperformingItems: Underperformer[];
  channelInsight: string;
  bundleRecommendations: BundleRecommendation[];
  revenueMomentum: RevenueMomentum;
  customerMetrics: CustomerMetrics;
  deliveryRepeatRate: DeliveryRepeatRate;
  staffingCapacity: StaffingCapacity;
  /** Priority-ordered, at most eight. */
  actions: string[];
}

export interface GrowthResult {
  branch: string;
  /** Empty when the requested branch is unknown. */
  branches: BeverageProfile[];
  errors: BranchError[];
  explanation: string;
}
