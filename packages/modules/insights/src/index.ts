export const MODULE_KEY = 'insights' as const;
export const MODULE_NAME = 'Insight Dispatch';

// ── Queries ───────────────────────────────────────────────────
export { dispatch, targetBranches } from './queries/dispatch';

// ── Services (Pure Functions) ─────────────────────────────────
export { safeCall, multiBranch, joinBranchErrors } from './services/envelope';

// ── Validation ────────────────────────────────────────────────
export {
  INTENT_ACTIONS,
  DEFAULT_HORIZON_MONTHS,
  DEFAULT_TOP_K,
  intentSchema,
} from './validation';
export type { Intent, IntentInput, IntentAction } from './validation';

// ── Types ─────────────────────────────────────────────────────
export type { PerBranch, ActionData, ActionResponse, DispatchResponse } from './types';
