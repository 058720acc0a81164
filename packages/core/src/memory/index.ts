/**
 * Memory Module — tiered conversation memory for Tiermind
 */

export { MemoryManager, type MemoryManagerDeps, type MemoryOracles, type ImportResult } from './manager.js';
export {
  TieredStore,
  BUCKET_TIERS,
  SUMMARY_TIERS,
  periodFromId,
  type TieredStoreDeps,
  type TieredStoreHooks,
  type PromotionStep,
  type SnapshotInfo,
} from './tiered-store.js';
export { MemoryIndexService, type MemoryIndexServiceDeps } from './memory-index.js';
export { CleanupScheduler, type CleanupSchedulerDeps } from './cleanup-scheduler.js';
export { ContextLoader, formatContext, parseDateReferences, type ContextLoaderDeps } from './context-loader.js';
export { ImportanceScorer, retentionStrategy, type ImportanceScorerDeps } from './importance-scorer.js';
export { Summarizer, type SummarizerDeps } from './summarizer.js';
export { UserLocks } from './locks.js';
export { runPool } from './worker-pool.js';
export { countTokens } from './token-counter.js';
export { renderBucket, renderIndex, renderProtectedFacts } from './render.js';
export { registerMemoryRoutes, type MemoryRoutesOptions } from './memory-routes.js';

// Oracles
export { LlmScoringOracle, LlmSummarizationOracle, LlmRankingOracle, type LlmOracleOptions } from './llm-oracles.js';
export { withTimeout } from './oracles.js';
export type {
  ScoringOracle,
  ScoringOracleInput,
  ScoringOracleOutput,
  SummarizationOracle,
  SummarizationInput,
  SummarizationOracleOutput,
  RankingOracle,
  RankingInput,
  RankingOracleOutput,
} from './oracles.js';

export {
  MemoryError,
  StorageError,
  StaleBucketError,
  OracleTimeoutError,
  OracleMalformedResponseError,
  ProtectionViolationError,
  MemoryNotFoundError,
  MemoryValidationError,
} from './errors.js';

export type {
  Clock,
  RetentionStrategy,
  CleanupState,
  CleanupReport,
  CleanupRunStats,
  ContextBucket,
  OmittedBucket,
  LoadedContext,
  MemoryStats,
  TierStats,
  RecentMessage,
} from './types.js';
