/**
 * Memory Types for Tiermind
 *
 * Zod schemas for the on-disk documents of the tiered conversation memory:
 * log buckets (daily), summary buckets (weekly/monthly/yearly), the master
 * index and the protected preferences document.
 */

import { z } from 'zod';

// ─── Tiers ────────────────────────────────────────────────────

export const TierSchema = z.enum(['daily', 'weekly', 'monthly', 'yearly', 'archive']);
export type Tier = z.infer<typeof TierSchema>;

export const BucketTierSchema = z.enum(['daily', 'weekly', 'monthly', 'yearly']);
export type BucketTier = z.infer<typeof BucketTierSchema>;

export const SummaryTierSchema = z.enum(['weekly', 'monthly', 'yearly']);
export type SummaryTier = z.infer<typeof SummaryTierSchema>;

export const SpeakerSchema = z.enum(['user', 'assistant']);
export type Speaker = z.infer<typeof SpeakerSchema>;

/** Inclusive calendar range, both ends as YYYY-MM-DD. */
export const PeriodSchema = z.object({
  start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  end: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});
export type Period = z.infer<typeof PeriodSchema>;

// ─── Importance ───────────────────────────────────────────────

export const ImportanceScoreSchema = z.object({
  frequency: z.number().int().min(0).max(3),
  recency: z.number().int().min(0).max(2),
  explicit: z.number().int().min(0).max(2),
  relevance: z.number().int().min(0).max(3),
  total: z.number().int().min(0).max(10),
  source: z.enum(['oracle', 'rules']),
  reasoning: z.string().max(2000).default(''),
  scoredAt: z.number().int().nonnegative(),
});
export type ImportanceScore = z.infer<typeof ImportanceScoreSchema>;

// ─── Entries ──────────────────────────────────────────────────

export const ConversationEntrySchema = z.object({
  id: z.string().min(1),
  speaker: SpeakerSchema,
  timestamp: z.number().int().nonnegative(),
  text: z.string(),
  importance: ImportanceScoreSchema.optional(),
  trimmed: z.boolean().default(false),
  originalLength: z.number().int().nonnegative().optional(),
});
export type ConversationEntry = z.infer<typeof ConversationEntrySchema>;

// ─── Bucket lifecycle ─────────────────────────────────────────

export const BucketStateSchema = z.discriminatedUnion('phase', [
  z.object({
    phase: z.literal('active'),
    softTrimmedAt: z.number().int().nonnegative().nullable().default(null),
  }),
  z.object({
    phase: z.literal('promoted'),
    promotedAt: z.number().int().nonnegative(),
    successorId: z.string().min(1),
    successorTier: SummaryTierSchema,
  }),
]);
export type BucketState = z.infer<typeof BucketStateSchema>;

// ─── Summary parts ────────────────────────────────────────────

export const HighlightSchema = z.object({
  entryId: z.string().min(1),
  bucketId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  speaker: SpeakerSchema,
  text: z.string(),
  score: z.number().int().min(0).max(10),
});
export type Highlight = z.infer<typeof HighlightSchema>;

/**
 * Verbatim copy of an entry carried into a summary. `protected` entries ride
 * upward through every tier; `window` entries were still inside the
 * protection window when a size trigger promoted their bucket early.
 */
export const PinnedEntrySchema = z.object({
  entryId: z.string().min(1),
  bucketId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  speaker: SpeakerSchema,
  text: z.string(),
  reason: z.enum(['protected', 'window']).default('protected'),
  score: z.number().int().min(0).max(10).optional(),
});
export type PinnedEntry = z.infer<typeof PinnedEntrySchema>;

// ─── Buckets ──────────────────────────────────────────────────

const BucketBaseSchema = z.object({
  id: z.string().min(1),
  period: PeriodSchema,
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
  state: BucketStateSchema,
});

export const LogBucketSchema = BucketBaseSchema.extend({
  kind: z.literal('log'),
  tier: z.literal('daily'),
  entries: z.array(ConversationEntrySchema),
});
export type LogBucket = z.infer<typeof LogBucketSchema>;

export const SummaryBucketSchema = BucketBaseSchema.extend({
  kind: z.literal('summary'),
  tier: SummaryTierSchema,
  sourceTier: BucketTierSchema,
  sourceBucketIds: z.array(z.string().min(1)).min(1),
  themes: z.array(z.string().min(1)).max(5),
  highlights: z.array(HighlightSchema),
  decisions: z.array(z.string()),
  recurringActivities: z.array(z.string()),
  crossReferences: z.array(z.string()),
  pinned: z.array(PinnedEntrySchema),
  narrative: z.string(),
  entryCount: z.number().int().nonnegative(),
});
export type SummaryBucket = z.infer<typeof SummaryBucketSchema>;

export const BucketSchema = z.discriminatedUnion('kind', [LogBucketSchema, SummaryBucketSchema]);
export type Bucket = z.infer<typeof BucketSchema>;

// ─── Protected preferences ────────────────────────────────────

export const ProtectedFactSchema = z.object({
  entryId: z.string().min(1),
  bucketId: z.string().min(1),
  speaker: SpeakerSchema,
  text: z.string(),
  timestamp: z.number().int().nonnegative(),
  reason: z.enum(['marker', 'manual', 'preference']),
  note: z.string().max(500).optional(),
  protectedAt: z.number().int().nonnegative(),
});
export type ProtectedFact = z.infer<typeof ProtectedFactSchema>;

export const PreferencesDocumentSchema = z.object({
  userId: z.string().min(1),
  updatedAt: z.number().int().nonnegative(),
  facts: z.array(ProtectedFactSchema),
});
export type PreferencesDocument = z.infer<typeof PreferencesDocumentSchema>;

// ─── Memory index ─────────────────────────────────────────────

export const IndexBucketEntrySchema = z.object({
  id: z.string().min(1),
  tier: BucketTierSchema,
  period: PeriodSchema,
  themes: z.array(z.string()),
  entryCount: z.number().int().nonnegative(),
  bytes: z.number().int().nonnegative(),
  tokens: z.number().int().nonnegative(),
});
export type IndexBucketEntry = z.infer<typeof IndexBucketEntrySchema>;

export const MemoryIndexSchema = z.object({
  userId: z.string().min(1),
  displayName: z.string().optional(),
  generation: z.number().int().nonnegative(),
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
  tiers: z.object({
    daily: z.array(IndexBucketEntrySchema),
    weekly: z.array(IndexBucketEntrySchema),
    monthly: z.array(IndexBucketEntrySchema),
    yearly: z.array(IndexBucketEntrySchema),
  }),
  archive: z.object({
    buckets: z.number().int().nonnegative(),
    compressed: z.number().int().nonnegative(),
  }),
  highlights: z.array(HighlightSchema),
  protectedFacts: z.array(ProtectedFactSchema),
  stats: z.object({
    totalEntries: z.number().int().nonnegative(),
    bytesByTier: z.record(TierSchema, z.number().int().nonnegative()),
    topTopics: z.array(z.object({ topic: z.string(), count: z.number().int().nonnegative() })),
    lastCleanupAt: z.number().int().nonnegative().nullable(),
    cleanupCount: z.number().int().nonnegative(),
  }),
  restoredFrom: z.number().int().nonnegative().optional(),
});
export type MemoryIndex = z.infer<typeof MemoryIndexSchema>;

// ─── Promotion journal ────────────────────────────────────────

export const PromotionJournalSchema = z.object({
  startedAt: z.number().int().nonnegative(),
  fromTier: BucketTierSchema,
  toTier: SummaryTierSchema,
  successorId: z.string().min(1),
  sourceIds: z.array(z.string().min(1)).min(1),
});
export type PromotionJournal = z.infer<typeof PromotionJournalSchema>;
