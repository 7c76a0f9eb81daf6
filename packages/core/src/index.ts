export { logger, log, setLogLevel, getLogLevel, isLogLevel, errorFields } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
export {
  getAnalyticsConfig,
  buildAnalyticsConfig,
  resetAnalyticsConfig,
} from './config';
export type { AnalyticsConfig } from './config';
export { parseCsv, parseCsvLine, isParseError } from './data/csv-parser';
export type { CsvParseResult, CsvParseError } from './data/csv-parser';
export {
  TABLE_DEFINITIONS,
  TABLE_KEYS,
  normalizeDate,
  parseHour,
} from './data/tables';
export type {
  BasketLine,
  MonthlySalesRow,
  ChannelSalesRow,
  CustomerOrderRow,
  ItemSalesRow,
  DivisionChannelRow,
  AttendanceRow,
  CandidateAreaRow,
  CafeDensity,
  TableRows,
  TableKey,
  TableLocation,
  TableDefinition,
  RowParseResult,
} from './data/tables';
export {
  LazyTable,
  createDataContext,
  createFileDataContext,
  getDataContext,
  setDataContext,
  loadedTables,
  loadTableFile,
  parseTableCsv,
  tablePath,
} from './data/data-context';
export type { DataContext, TableSources } from './data/data-context';
export { listBranches, resolveBranch } from './helpers/branch-resolution';
export type { BranchResolution } from './helpers/branch-resolution';
export { sortMonthlySeries, branchSeries } from './helpers/monthly-series';
