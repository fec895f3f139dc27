// Pure analysis core: no framework, no I/O
export * from './types';
export { MalformedInputError } from './errors';
export {
  DEFAULT_COLUMN_MAPS,
  FIRST_DATA_ROW_INDEX,
  HEADER_ROW_INDEX,
  load,
  loadWithStats,
  toNumber,
  toTimestampKey,
} from './tabular-loader';
export type { LoadResult, LoadStats } from './tabular-loader';
export {
  DEFAULT_PR_THRESHOLD,
  DEFAULT_PV_CAPACITY_MWP,
  KW_PER_MW,
  classifyStatus,
  computePr,
  simulatedEnergyKwh,
} from './performance-ratio';
export { SOILING_FACTOR, classifyIssue } from './issue-classifier';
export {
  DEFAULT_EFFICIENCY_THRESHOLD,
  analyzeInverterSet,
  analyzeInverters,
} from './inverter-analyzer';
export type { InverterSetAnalysis } from './inverter-analyzer';
export {
  countByStatus,
  countIssues,
  describePr,
  prTimeline,
  quantile,
} from './pr-statistics';
export type { PrDescription, ProblemIssue } from './pr-statistics';
