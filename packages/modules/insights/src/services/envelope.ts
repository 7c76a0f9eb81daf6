import { errorFields, logger } from '@branchlens/core';
import { describeError } from '@branchlens/shared';
import type { BranchBatch, BranchError, ServiceEnvelope } from '@branchlens/shared';

/** Runs an engine call, turning any thrown error into a `CODE: message` envelope. */
export function safeCall<T>(fn: () => T): ServiceEnvelope<T> {
  try {
    return { success: true, data: fn(), error: null };
  } catch (err) {
    logger.warn('Engine call failed', { error: errorFields(err) });
    return { success: false, data: null, error: describeError(err) };
  }
}

export function joinBranchErrors(errors: readonly BranchError[]): string {
  return errors.map((e) => `${e.branch}: ${e.error}`).join('; ');
}

/**
 * Runs `fn` once per branch. Failures are collected rather than thrown;
 * the envelope fails only when no branch succeeded.
 */
export function multiBranch<T>(
  branches: readonly string[],
  fn: (branch: string) => T,
): ServiceEnvelope<BranchBatch<T>> {
  const results: Record<string, T> = {};
  const errors: BranchError[] = [];

  for (const branch of branches) {
    try {
      results[branch] = fn(branch);
    } catch (err) {
      logger.warn('Branch call failed', { branch, error: errorFields(err) });
      errors.push({ branch, error: describeError(err) });
    }
  }

  if (Object.keys(results).length === 0) {
    return { success: false, data: null, error: joinBranchErrors(errors) || 'No branches to query' };
  }
  return {
    success: true,
    data: { branches: results, errors },
    error: errors.length > 0 ? joinBranchErrors(errors) : null,
  };
}
