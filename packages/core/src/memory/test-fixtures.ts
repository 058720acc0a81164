/**
 * Test fixtures — builders for entries and buckets used across the memory
 * test suites.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  BucketTier,
  ConversationEntry,
  ImportanceScore,
  LogBucket,
  Period,
  PinnedEntry,
  Speaker,
  SummaryBucket,
  SummaryTier,
} from '@tiermind/shared';

export function makeTempDir(prefix = 'tiermind-'): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export function makeEntry(
  id: string,
  at: string,
  text: string,
  speaker: Speaker = 'user',
  extra: Partial<ConversationEntry> = {}
): ConversationEntry {
  return { id, speaker, timestamp: Date.parse(at), text, trimmed: false, ...extra };
}

/** Rule-sourced score with the given total spread across the dimensions. */
export function makeScore(total: number, scoredAt = 0): ImportanceScore {
  const frequency = Math.min(3, total);
  const recency = Math.min(2, total - frequency);
  const explicit = Math.min(2, total - frequency - recency);
  const relevance = total - frequency - recency - explicit;
  return { frequency, recency, explicit, relevance, total, source: 'rules', reasoning: '', scoredAt };
}

export function makeLogBucket(dateKey: string, entries: ConversationEntry[], at = 0): LogBucket {
  return {
    kind: 'log',
    tier: 'daily',
    id: dateKey.replace(/-/g, ''),
    period: { start: dateKey, end: dateKey },
    createdAt: at,
    updatedAt: at,
    state: { phase: 'active', softTrimmedAt: null },
    entries,
  };
}

export function makePinned(entry: ConversationEntry, bucketId: string, reason: PinnedEntry['reason'] = 'protected'): PinnedEntry {
  return {
    entryId: entry.id,
    bucketId,
    timestamp: entry.timestamp,
    speaker: entry.speaker,
    text: entry.text,
    reason,
  };
}

export interface SummaryFixture {
  id: string;
  tier: SummaryTier;
  sourceTier: BucketTier;
  sourceBucketIds: string[];
  period: Period;
  pinned?: PinnedEntry[];
  themes?: string[];
  narrative?: string;
  at?: number;
}

export function makeSummary(fixture: SummaryFixture): SummaryBucket {
  const at = fixture.at ?? 0;
  return {
    kind: 'summary',
    tier: fixture.tier,
    id: fixture.id,
    period: fixture.period,
    createdAt: at,
    updatedAt: at,
    state: { phase: 'active', softTrimmedAt: null },
    sourceTier: fixture.sourceTier,
    sourceBucketIds: fixture.sourceBucketIds,
    themes: fixture.themes ?? [],
    highlights: [],
    decisions: [],
    recurringActivities: [],
    crossReferences: [],
    pinned: fixture.pinned ?? [],
    narrative: fixture.narrative ?? '',
    entryCount: 0,
  };
}
