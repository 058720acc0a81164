/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Config types
export {
  CoreConfigSchema,
  LoggingConfigSchema,
  GatewayConfigSchema,
  ModelConfigSchema,
  MemoryConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type CoreConfig,
  type LoggingConfig,
  type GatewayConfig,
  type ModelConfig,
  type MemoryConfig,
  type Config,
  type PartialConfig,
} from './config.js';

// AI types
export {
  TokenUsageSchema,
  AIMessageRoleSchema,
  AIMessageSchema,
  AIRequestSchema,
  StopReasonSchema,
  AIResponseSchema,
  AIProviderNameSchema,
  type TokenUsage,
  type AIMessageRole,
  type AIMessage,
  type AIRequest,
  type StopReason,
  type AIResponse,
  type AIProviderName,
} from './ai.js';

// Memory types
export {
  TierSchema,
  BucketTierSchema,
  SummaryTierSchema,
  SpeakerSchema,
  PeriodSchema,
  ImportanceScoreSchema,
  ConversationEntrySchema,
  BucketStateSchema,
  HighlightSchema,
  PinnedEntrySchema,
  LogBucketSchema,
  SummaryBucketSchema,
  BucketSchema,
  ProtectedFactSchema,
  PreferencesDocumentSchema,
  IndexBucketEntrySchema,
  MemoryIndexSchema,
  PromotionJournalSchema,
  type Tier,
  type BucketTier,
  type SummaryTier,
  type Speaker,
  type Period,
  type ImportanceScore,
  type ConversationEntry,
  type BucketState,
  type Highlight,
  type PinnedEntry,
  type LogBucket,
  type SummaryBucket,
  type Bucket,
  type ProtectedFact,
  type PreferencesDocument,
  type IndexBucketEntry,
  type MemoryIndex,
  type PromotionJournal,
} from './memory.js';
