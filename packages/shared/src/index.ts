export {
  AppError,
  ValidationError,
  ConfigurationError,
  DataSchemaError,
  describeError,
} from './errors';
export {
  ALL_BRANCHES,
  branchNameSchema,
  topKSchema,
  horizonMonthsSchema,
  parseInput,
  isAllBranches,
} from './validation';
export * from './utils';
export * from './types';
