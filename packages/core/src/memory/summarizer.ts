/**
 * Summarizer — soft trim, summarize-up and archive compression.
 *
 * All three operations are idempotent. `softTrim` and `summarizeUp` are
 * pure over the buckets they are handed; the scheduler writes results back
 * through the TieredStore, which enforces staleness and protection again
 * at write time.
 */

import type {
  Bucket,
  BucketTier,
  ConversationEntry,
  Highlight,
  LogBucket,
  MemoryConfig,
  Period,
  PinnedEntry,
  SummaryBucket,
  SummaryTier,
} from '@tiermind/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { DAY_MS, formatPeriod, groupIdFor } from './calendar.js';
import { MemoryValidationError, StaleBucketError } from './errors.js';
import {
  withTimeout,
  type SummarizationInput,
  type SummarizationOracle,
  type SummarizationOracleOutput,
  type SummarizationSource,
} from './oracles.js';
import { NEXT_TIER, type TieredStore } from './tiered-store.js';
import { countTopics, topTopics } from './topics.js';

const MIN_THEMES = 2;
const MAX_THEMES = 5;
/** Neutral labels for groups whose material yields fewer than two topics. */
const FALLBACK_THEMES = ['small talk', 'routine check-ins'];
const DECISION_RE = /\b(?:decided|decide|decision|agreed|will go with)\b/i;

export interface SummarizerDeps {
  config: MemoryConfig['summarizer'];
  protection: MemoryConfig['protection'];
  store: TieredStore;
  oracle?: SummarizationOracle;
  logger?: SecureLogger;
}

export interface SoftTrimResult {
  entries: ConversationEntry[];
  trimmed: number;
  /** No entry is held back by the protection window any more. */
  complete: boolean;
}

export interface SummarizeContext {
  now: number;
  protectedIds: ReadonlySet<string>;
  /** Summary ids already used in the target tier, active or archived. */
  existingIds: ReadonlySet<string>;
  signal?: AbortSignal;
}

export type SummarizeResult =
  | { status: 'summarized'; summary: SummaryBucket; sourceIds: string[]; partial: boolean }
  | { status: 'deferred'; reason: string };

/** Single descriptive line standing in for a trimmed entry. */
export function describeEntry(entry: ConversationEntry, maxChars: number): string {
  const line = entry.text.replace(/\s+/g, ' ').trim();
  const who = entry.speaker === 'user' ? 'User' : 'Assistant';
  const body = line.length > maxChars ? `${line.slice(0, maxChars - 1).trimEnd()}…` : line;
  return `${who}: ${body}`;
}

/** First free id for a calendar group: the group id itself, then `-p2`, `-p3`, … */
export function allocateSummaryId(groupId: string, existing: ReadonlySet<string>): string {
  if (!existing.has(groupId)) return groupId;
  let part = 2;
  while (existing.has(`${groupId}-p${part}`)) part++;
  return `${groupId}-p${part}`;
}

function spanOf(buckets: readonly Bucket[]): Period {
  let start = buckets[0]?.period.start ?? '';
  let end = buckets[0]?.period.end ?? '';
  for (const b of buckets) {
    if (b.period.start < start) start = b.period.start;
    if (b.period.end > end) end = b.period.end;
  }
  return { start, end };
}

function pinnedFrom(entry: ConversationEntry, bucketId: string, reason: PinnedEntry['reason']): PinnedEntry {
  return {
    entryId: entry.id,
    bucketId,
    timestamp: entry.timestamp,
    speaker: entry.speaker,
    text: entry.text,
    reason,
    score: entry.importance?.total,
  };
}

function dedupeBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

function cleanList(values: readonly string[]): string[] {
  return dedupeBy(
    values.map((v) => v.trim()).filter((v) => v.length > 0),
    (v) => v.toLowerCase()
  );
}

export class Summarizer {
  private readonly config: MemoryConfig['summarizer'];
  private readonly windowMs: number;
  private readonly store: TieredStore;
  private readonly oracle: SummarizationOracle | undefined;
  private readonly logger: SecureLogger;

  constructor(deps: SummarizerDeps) {
    this.config = deps.config;
    this.windowMs = deps.protection.windowDays * DAY_MS;
    this.store = deps.store;
    this.oracle = deps.oracle;
    this.logger = deps.logger ?? createNoopLogger();
  }

  isInWindow(timestamp: number, now: number): boolean {
    return now - timestamp < this.windowMs;
  }

  private isLowScore(entry: ConversationEntry): boolean {
    return entry.importance !== undefined && entry.importance.total <= this.config.maxTrimScore;
  }

  // ── Soft trim ────────────────────────────────────────────────

  /**
   * Collapse low-scoring entries to one descriptive line. Unscored,
   * protected and in-window entries are left as they are.
   */
  softTrim(bucket: LogBucket, now: number, protectedIds: ReadonlySet<string>): SoftTrimResult {
    let trimmed = 0;
    let heldBack = false;

    const entries = bucket.entries.map((entry) => {
      if (entry.trimmed || !this.isLowScore(entry) || protectedIds.has(entry.id)) {
        return entry;
      }
      if (this.isInWindow(entry.timestamp, now)) {
        heldBack = true;
        return entry;
      }
      trimmed++;
      return {
        ...entry,
        text: describeEntry(entry, this.config.trimmedLineChars),
        trimmed: true,
        originalLength: entry.text.length,
      };
    });

    return { entries, trimmed, complete: !heldBack };
  }

  // ── Summarize up ─────────────────────────────────────────────

  /**
   * Merge the buckets of one calendar group into a summary for
   * `targetTier`. When the oracle fails the oldest half is tried once; a
   * second failure defers the whole group to the next cycle.
   */
  async summarizeUp(
    buckets: readonly Bucket[],
    targetTier: SummaryTier,
    ctx: SummarizeContext
  ): Promise<SummarizeResult> {
    const ordered = this.validateGroup(buckets, targetTier);

    try {
      return await this.attempt(ordered, targetTier, ctx, false);
    } catch (error) {
      if (ctx.signal?.aborted) throw error;
      const half = ordered.slice(0, Math.ceil(ordered.length / 2));
      this.logger.warn('Summarization failed, retrying with the oldest half', {
        tier: targetTier,
        buckets: ordered.length,
        retryWith: half.length,
        error: toErrorMessage(error),
      });

      try {
        return await this.attempt(half, targetTier, ctx, half.length < ordered.length);
      } catch (retryError) {
        if (ctx.signal?.aborted) throw retryError;
        const reason = toErrorMessage(retryError);
        this.logger.warn('Summarization deferred to the next cycle', {
          tier: targetTier,
          buckets: ordered.map((b) => b.id),
          error: reason,
        });
        return { status: 'deferred', reason };
      }
    }
  }

  private validateGroup(buckets: readonly Bucket[], targetTier: SummaryTier): Bucket[] {
    const first = buckets[0];
    if (!first) {
      throw new MemoryValidationError('summarizeUp needs at least one bucket');
    }
    if (NEXT_TIER[first.tier] !== targetTier) {
      throw new MemoryValidationError(`Cannot summarize ${first.tier} buckets into ${targetTier}`);
    }

    const groupId = groupIdFor(targetTier, first.period);
    for (const bucket of buckets) {
      if (bucket.state.phase !== 'active') {
        throw new StaleBucketError(bucket.id);
      }
      if (bucket.tier !== first.tier) {
        throw new MemoryValidationError(`Bucket ${bucket.id} is not a ${first.tier} bucket`);
      }
      if (groupIdFor(targetTier, bucket.period) !== groupId) {
        throw new MemoryValidationError(`Bucket ${bucket.id} does not belong to ${targetTier} group ${groupId}`);
      }
    }
    return [...buckets].sort((a, b) => a.period.start.localeCompare(b.period.start));
  }

  private async attempt(
    batch: Bucket[],
    targetTier: SummaryTier,
    ctx: SummarizeContext,
    partial: boolean
  ): Promise<SummarizeResult> {
    const period = spanOf(batch);
    const input: SummarizationInput = {
      targetTier,
      period,
      sources: batch.map((b) => this.toSource(b)),
    };

    const oracle = this.oracle;
    const digest = oracle
      ? await withTimeout(
          'summarization',
          this.config.oracleTimeoutMs,
          (signal) => oracle.summarize(input, signal),
          ctx.signal
        )
      : this.localDigest(batch, input);

    const summary = this.buildSummary(batch, targetTier, period, digest, ctx);
    this.logger.debug('Summarized buckets', {
      tier: targetTier,
      bucketId: summary.id,
      sources: batch.length,
      highlights: summary.highlights.length,
      pinned: summary.pinned.length,
    });
    return { status: 'summarized', summary, sourceIds: batch.map((b) => b.id), partial };
  }

  private toSource(bucket: Bucket): SummarizationSource {
    if (bucket.kind === 'log') {
      return {
        bucketId: bucket.id,
        tier: bucket.tier,
        period: bucket.period,
        lines: bucket.entries
          .filter((e) => !this.isLowScore(e))
          .map((e) => ({ speaker: e.speaker, timestamp: e.timestamp, text: e.text })),
        themes: [],
        narrative: '',
      };
    }
    return {
      bucketId: bucket.id,
      tier: bucket.tier,
      period: bucket.period,
      lines: [],
      themes: bucket.themes,
      narrative: bucket.narrative,
    };
  }

  private materialTexts(batch: readonly Bucket[]): string[] {
    return batch.flatMap((b) =>
      b.kind === 'log'
        ? b.entries.filter((e) => !this.isLowScore(e)).map((e) => e.text)
        : [b.themes.join(' '), ...b.highlights.map((h) => h.text)]
    );
  }

  /**
   * Deterministic digest used when no summarization oracle is configured.
   */
  private localDigest(batch: readonly Bucket[], input: SummarizationInput): SummarizationOracleOutput {
    const topics = topTopics(countTopics(this.materialTexts(batch)), MAX_THEMES);

    const perBucket = new Map<string, number>();
    for (const bucket of batch) {
      const texts = bucket.kind === 'log' ? bucket.entries.map((e) => e.text) : [bucket.themes.join(' ')];
      for (const topic of countTopics([texts.join(' ')]).keys()) {
        perBucket.set(topic, (perBucket.get(topic) ?? 0) + 1);
      }
    }
    const unit = batch[0]?.tier === 'daily' ? 'days' : `${batch[0]?.tier ?? 'daily'} periods`;
    const recurring = topTopics(perBucket, MAX_THEMES)
      .filter((t) => t.count >= 2)
      .map((t) => `${t.topic} (${t.count} ${unit})`);

    const decisions = batch.flatMap((b) =>
      b.kind === 'log'
        ? b.entries.filter((e) => !this.isLowScore(e) && DECISION_RE.test(e.text)).map((e) => e.text)
        : b.decisions
    );

    const entryCount = this.entryCountOf(batch);
    const themeList = topics.map((t) => t.topic);
    const narrative =
      `${entryCount} ${entryCount === 1 ? 'entry' : 'entries'} across ${batch.length} ` +
      `${batch[0]?.tier ?? 'daily'} ${batch.length === 1 ? 'bucket' : 'buckets'} (${formatPeriod(input.period)}).` +
      (themeList.length > 0 ? ` Main themes: ${themeList.join(', ')}.` : '');

    return {
      themes: themeList,
      decisions,
      recurringActivities: recurring,
      crossReferences: batch.flatMap((b) => (b.kind === 'summary' ? b.crossReferences : [])),
      narrative,
    };
  }

  private entryCountOf(batch: readonly Bucket[]): number {
    return batch.reduce((sum, b) => sum + (b.kind === 'log' ? b.entries.length : b.entryCount), 0);
  }

  private buildSummary(
    batch: readonly Bucket[],
    targetTier: SummaryTier,
    period: Period,
    digest: SummarizationOracleOutput,
    ctx: SummarizeContext
  ): SummaryBucket {
    const first = batch[0];
    const sourceTier: BucketTier = first?.tier ?? 'daily';

    const highlights: Highlight[] = [];
    const pinned: PinnedEntry[] = [];
    for (const bucket of batch) {
      if (bucket.kind === 'log') {
        for (const entry of bucket.entries) {
          const score = entry.importance?.total;
          if (score !== undefined && score >= this.config.minScoreForHighlight) {
            highlights.push({
              entryId: entry.id,
              bucketId: bucket.id,
              timestamp: entry.timestamp,
              speaker: entry.speaker,
              text: entry.text,
              score,
            });
          }
          if (ctx.protectedIds.has(entry.id)) {
            pinned.push(pinnedFrom(entry, bucket.id, 'protected'));
          } else if (this.isInWindow(entry.timestamp, ctx.now)) {
            pinned.push(pinnedFrom(entry, bucket.id, 'window'));
          }
        }
      } else {
        highlights.push(...bucket.highlights);
        for (const pin of bucket.pinned) {
          if (ctx.protectedIds.has(pin.entryId)) {
            pinned.push({ ...pin, reason: 'protected' });
          } else if (this.isInWindow(pin.timestamp, ctx.now)) {
            pinned.push({ ...pin, reason: 'window' });
          }
        }
      }
    }

    let themes = cleanList(digest.themes).slice(0, MAX_THEMES);
    if (themes.length < MIN_THEMES) {
      const extra = topTopics(countTopics(this.materialTexts(batch)), MAX_THEMES).map((t) => t.topic);
      themes = cleanList([...themes, ...extra, ...FALLBACK_THEMES]).slice(0, MIN_THEMES);
    }

    const groupId = groupIdFor(targetTier, period);
    return {
      kind: 'summary',
      tier: targetTier,
      id: allocateSummaryId(groupId, ctx.existingIds),
      period,
      createdAt: ctx.now,
      updatedAt: ctx.now,
      state: { phase: 'active', softTrimmedAt: null },
      sourceTier,
      sourceBucketIds: batch.map((b) => b.id),
      themes,
      highlights: dedupeBy(highlights, (h) => h.entryId).sort((a, b) => a.timestamp - b.timestamp),
      decisions: cleanList(digest.decisions),
      recurringActivities: cleanList(digest.recurringActivities),
      crossReferences: cleanList(digest.crossReferences),
      pinned: dedupeBy(pinned, (p) => p.entryId).sort((a, b) => a.timestamp - b.timestamp),
      narrative: digest.narrative.trim(),
      entryCount: this.entryCountOf(batch),
    };
  }

  // ── Archive compression ──────────────────────────────────────

  /** Gzip one archived bucket. Returns false when it was already compressed. */
  async compressArchive(userId: string, tier: BucketTier, bucketId: string): Promise<boolean> {
    const compressed = await this.store.compressArchived(userId, tier, bucketId);
    if (compressed) {
      this.logger.debug('Compressed archived bucket', { userId, tier, bucketId });
    }
    return compressed;
  }
}
