export { TopHits, destroyTopHits } from './services/top-hits.js';
export type { HitListState, TopHitsOptions } from './services/top-hits.js';
export { RecordStore, allocateSlots } from './services/record-store.js';
export type { RecordSlots } from './services/record-store.js';
export { SortedView, allocateRanks, compareByKeyDescending } from './services/sorted-view.js';
export type { RankBuffer, KeyOf } from './services/sorted-view.js';
export { flagReportableTargets, flagReportableDomains } from './services/threshold.js';
export type { ReportingPolicy, ThresholdSummary } from './services/threshold.js';
export { ReportingThresholds } from './services/reporting-thresholds.js';
export { buildHitList, loadHitList, loadAndMerge } from './services/hit-list-loader.js';
export type { LoadError } from './services/hit-list-loader.js';
export {
  formatTargets,
  formatDomains,
  formatGeneral,
  domainBias,
  summarizeReported,
} from './services/report-formatter.js';
export type { ReportOptions, SearchSpace, ReportedHitSummary } from './services/report-formatter.js';
export { runMergeBenchmark, createRandom, isRankedDescending } from './services/benchmark.js';
export type { BenchmarkOptions, BenchmarkResult } from './services/benchmark.js';
export {
  createEmptyHit,
  createEmptyDomain,
  findBestDomain,
  nameLength,
} from './models/hit.js';
export type { Hit, Domain, AlignmentDisplay, HitFields } from './models/hit.js';
export { HitListFileSchema, HitInputSchema, DomainInputSchema } from './models/hit-input.js';
export type { HitListFile, HitInput, DomainInput } from './models/hit-input.js';
export { ThresholdConfigSchema } from './models/threshold-config.js';
export type { ThresholdConfig, ThresholdConfigInput, ZSetBy } from './models/threshold-config.js';
export {
  HitListError,
  AllocationError,
  ListStateError,
  InvariantError,
  ConfigurationError,
  HitListFormatError,
  ErrorCategory,
  isRetryableError,
  getErrorCategory,
} from './lib/errors/HitListErrors.js';
export { Logger, logger } from './lib/logger.js';
export type { LogLevel, LoggerConfig } from './lib/logger.js';
export { ConfigurationManager, createConfigManager, DEFAULT_HIT_LIST_CONFIG } from './lib/env-config.js';
export type { HitListConfig } from './lib/env-config.js';
export { ok, err, trySync } from './lib/result-types.js';
export type { Result } from './lib/result-types.js';
