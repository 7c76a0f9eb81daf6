import { getDataContext, listBranches, logger } from '@branchlens/core';
import type { DataContext } from '@branchlens/core';
import { ALL_BRANCHES, generateUlid, isAllBranches, parseInput } from '@branchlens/shared';
import type { ServiceEnvelope } from '@branchlens/shared';
import { recommendCombos } from '@branchlens/module-combos';
import { forecastBranchDemand } from '@branchlens/module-forecasting';
import { evaluateExpansion } from '@branchlens/module-expansion';
import { growthStrategy } from '@branchlens/module-growth';
import { recommendStaffing } from '@branchlens/module-staffing';
import type { ActionData, ActionResponse, DispatchResponse, PerBranch } from '../types';
import { intentSchema } from '../validation';
import type { Intent, IntentAction, IntentInput } from '../validation';
import { multiBranch, safeCall } from '../services/envelope';

/** A named branch, or every branch in the monthly sales table. */
export function targetBranches(branch: string | undefined, ctx: DataContext): string[] {
  if (branch && !isAllBranches(branch)) return [branch];
  return listBranches(ctx.monthlySales.get());
}

function perBranch<T>(
  intent: Intent,
  ctx: DataContext,
  fn: (branch: string) => T,
): ServiceEnvelope<PerBranch<T>> {
  const known = safeCall(() => targetBranches(intent.branch, ctx));
  if (known.data === null) return { success: false, data: null, error: known.error };

  const [only] = known.data;
  if (known.data.length === 1 && only !== undefined) return safeCall(() => fn(only));
  return multiBranch(known.data, fn);
}

function respond<A extends IntentAction>(
  action: A,
  requestId: string,
  envelope: ServiceEnvelope<ActionData[A]>,
): ActionResponse<A> {
  return { ...envelope, action, requestId };
}

function route(intent: Intent, requestId: string, ctx: DataContext): DispatchResponse {
  switch (intent.action) {
    case 'combo':
      return respond(
        'combo',
        requestId,
        perBranch(intent, ctx, (branch) => recommendCombos({ branch, topK: intent.topK }, ctx)),
      );
    case 'forecast':
      return respond(
        'forecast',
        requestId,
        perBranch(intent, ctx, (branch) =>
          forecastBranchDemand({ branch, horizonMonths: intent.horizonMonths }, ctx),
        ),
      );
    case 'staffing':
      return respond(
        'staffing',
        requestId,
        perBranch(intent, ctx, (branch) => recommendStaffing({ branch, shift: intent.shift }, ctx)),
      );
    case 'expansion':
      return respond('expansion', requestId, safeCall(() => evaluateExpansion({ branch: intent.branch ?? '' }, ctx)));
    case 'growth':
      return respond(
        'growth',
        requestId,
        safeCall(() => growthStrategy({ branch: intent.branch || ALL_BRANCHES }, ctx)),
      );
  }
}

/**
 * Validates a classifier intent and runs the matching engine.
 *
 * Engine failures come back as `{ success: false, error: 'CODE: message' }`;
 * only an invalid intent throws. Each call gets a ULID request id that is
 * also written to the log.
 */
export function dispatch(input: IntentInput, ctx: DataContext = getDataContext()): DispatchResponse {
  const intent = parseInput(intentSchema, input, 'Invalid intent');
  const requestId = generateUlid();
  const start = Date.now();

  const response = route(intent, requestId, ctx);

  logger.info('Intent dispatched', {
    requestId,
    action: intent.action,
    branch: intent.branch || ALL_BRANCHES,
    success: response.success,
    durationMs: Date.now() - start,
  });
  return response;
}
