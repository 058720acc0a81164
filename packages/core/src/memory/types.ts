/**
 * Memory module types that are not persisted documents.
 */

import type {
  BucketTier,
  ConversationEntry,
  MemoryIndex,
  Period,
  ProtectedFact,
  Tier,
} from '@tiermind/shared';

export type Clock = () => number;

export type RetentionStrategy = 'pin-to-index' | 'keep-in-summaries' | 'archive-after-week' | 'trim-after-day';

export type CleanupState = 'idle' | 'scoring' | 'summarizing' | 'compressing' | 'done';

export type SizeTriggeredStage = BucketTier | 'archive';

export interface CleanupReport {
  userId: string;
  startedAt: number;
  finishedAt: number;
  scored: number;
  softTrimmedEntries: number;
  softTrimmedBuckets: number;
  weekly: number;
  monthly: number;
  yearly: number;
  archived: number;
  compressed: number;
  deferred: number;
  sizeTriggered: SizeTriggeredStage[];
  aborted: boolean;
  noop: boolean;
}

export interface CleanupRunStats {
  processedUsers: number;
  softTrimmed: number;
  weeklySummaries: number;
  monthlySummaries: number;
  yearlySummaries: number;
  archived: number;
  compressed: number;
  deferred: number;
  errors: Array<{ userId: string; error: string }>;
  reports: CleanupReport[];
}

export interface ContextBucket {
  bucketId: string;
  tier: BucketTier;
  period: Period;
  source: 'active' | 'archived';
  text: string;
  tokens: number;
  justification?: string;
}

export interface OmittedBucket {
  bucketId: string;
  tier: BucketTier;
  tokens: number;
  reason: 'budget' | 'unavailable';
}

export interface LoadedContext {
  userId: string;
  query: string;
  index: MemoryIndex;
  protectedEntries: ProtectedFact[];
  standardTiers: ContextBucket[];
  extraTiers: ContextBucket[];
  totalTokens: number;
  budgetTokens: number;
  degraded: boolean;
  notes: string[];
  omitted: OmittedBucket[];
  dateReferences: string[];
}

export interface TierStats {
  buckets: number;
  bytes: number;
}

export interface MemoryStats {
  userId: string;
  tiers: Record<Tier, TierStats>;
  archivedBuckets: number;
  compressedBuckets: number;
  totalEntries: number;
  protectedFacts: number;
  highlights: number;
  indexGeneration: number;
  lastCleanupAt: number | null;
  cleanupCount: number;
}

export interface RecentMessage extends ConversationEntry {
  bucketId: string;
}
