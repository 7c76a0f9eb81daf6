export { generateUlid, isValidUlid } from './ulid';
export {
  roundTo,
  round1,
  round2,
  round4,
  clamp,
  safeDivide,
  sum,
  mean,
  median,
  fitLinearTrend,
  periodOverPeriodPct,
} from './math';
export type { LinearFit } from './math';
export { MONTH_NAMES, monthIndex, monthNameAfter } from './months';
export type { MonthName } from './months';
export { createSeededRandom, seededShuffle } from './seeded-random';
export { formatCount, formatPct } from './format';
export { compareCodePoints } from './compare';
