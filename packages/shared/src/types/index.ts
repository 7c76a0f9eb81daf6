export type { ServiceEnvelope, BranchError, BranchBatch, UnknownBranchResult } from './api';
