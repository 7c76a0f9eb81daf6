/** Envelope returned by dispatch for every engine call. */
export interface ServiceEnvelope<T> {
  success: boolean;
  data: T | null;
  error: string | null;
}

/** One branch that failed inside a multi-branch batch. */
export interface BranchError {
  branch: string;
  error: string;
}

/** Partial results of a batch run over several branches. */
export interface BranchBatch<T> {
  branches: Record<string, T>;
  errors: BranchError[];
}

/** Returned instead of a result when a requested branch does not exist. */
export interface UnknownBranchResult {
  branch: string;
  error: string;
  availableBranches: string[];
}
