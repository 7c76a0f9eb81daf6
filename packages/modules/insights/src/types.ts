import type { BranchBatch, ServiceEnvelope } from '@branchlens/shared';
import type { ComboResult } from '@branchlens/module-combos';
import type { ForecastError, ForecastResult } from '@branchlens/module-forecasting';
import type { ExpansionError, ExpansionResult } from '@branchlens/module-expansion';
import type { GrowthResult } from '@branchlens/module-growth';
import type { StaffingError, StaffingResult } from '@branchlens/module-staffing';
import type { IntentAction } from './validation';

/** One branch's result, or every branch's when the intent covers the chain. */
export type PerBranch<T> = T | BranchBatch<T>;

export interface ActionData {
  combo: PerBranch<ComboResult>;
  forecast: PerBranch<ForecastResult | ForecastError>;
  staffing: PerBranch<StaffingResult | StaffingError>;
  expansion: ExpansionResult | ExpansionError;
  growth: GrowthResult;
}

export type ActionResponse<A extends IntentAction> = ServiceEnvelope<ActionData[A]> & {
  action: A;
  requestId: string;
};

export type DispatchResponse = { [A in IntentAction]: ActionResponse<A> }[IntentAction];
