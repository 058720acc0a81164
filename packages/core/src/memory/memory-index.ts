/**
 * MemoryIndexService — maintains the per-user master index document.
 *
 * A full rebuild re-derives every tier listing from the live store and
 * bumps the generation; the previous generation is snapshotted first when
 * asked. Appends only refresh the listing of the touched daily bucket.
 */

import type {
  Bucket,
  Highlight,
  IndexBucketEntry,
  LogBucket,
  MemoryConfig,
  MemoryIndex,
} from '@tiermind/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { MemoryNotFoundError } from './errors.js';
import { renderBucket } from './render.js';
import { BUCKET_TIERS, type TieredStore } from './tiered-store.js';
import { countTokens } from './token-counter.js';
import { countTopics, topTopics } from './topics.js';
import type { Clock } from './types.js';

const HIGHLIGHT_LIMIT = 50;
const HIGHLIGHT_MIN_SCORE = 8;
const DAILY_THEMES = 3;
const TOP_TOPICS = 10;

export interface MemoryIndexServiceDeps {
  store: TieredStore;
  config: MemoryConfig;
  logger?: SecureLogger;
  clock?: Clock;
}

export interface RebuildOptions {
  /** Snapshot the current generation before replacing it. */
  snapshot?: boolean;
  /** Record a completed cleanup cycle at this time. */
  cleanupAt?: number;
  displayName?: string;
  /** Highlights to start from instead of the current index's. */
  baseHighlights?: Highlight[];
  restoredFrom?: number;
}

function sortHighlights(highlights: Highlight[]): Highlight[] {
  const unique = new Map<string, Highlight>();
  for (const h of highlights) {
    if (!unique.has(h.entryId)) unique.set(h.entryId, h);
  }
  return [...unique.values()]
    .sort((a, b) => b.score - a.score || b.timestamp - a.timestamp)
    .slice(0, HIGHLIGHT_LIMIT);
}

export class MemoryIndexService {
  private readonly store: TieredStore;
  private readonly config: MemoryConfig;
  private readonly logger: SecureLogger;
  private readonly clock: Clock;

  constructor(deps: MemoryIndexServiceDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? Date.now;
  }

  describeBucket(bucket: Bucket, bytes: number): IndexBucketEntry {
    const themes =
      bucket.kind === 'log'
        ? topTopics(countTopics(bucket.entries.map((e) => e.text)), DAILY_THEMES).map((t) => t.topic)
        : bucket.themes;
    return {
      id: bucket.id,
      tier: bucket.tier,
      period: bucket.period,
      themes,
      entryCount: bucket.kind === 'log' ? bucket.entries.length : bucket.entryCount,
      bytes,
      tokens: countTokens(renderBucket(bucket)),
    };
  }

  /** Current index, rebuilt from the store when missing or stale after recovery. */
  async ensure(userId: string): Promise<MemoryIndex> {
    const current = await this.store.readIndex(userId);
    if (current && !this.store.consumeRecovery(userId)) return current;
    return this.rebuild(userId);
  }

  async rebuild(userId: string, options: RebuildOptions = {}): Promise<MemoryIndex> {
    const now = this.clock();
    const previous = await this.store.readIndex(userId);
    if (previous && options.snapshot) {
      await this.store.snapshotIndex(userId, previous, this.config.cleanup.snapshotRetention);
    }

    const tiers: MemoryIndex['tiers'] = { daily: [], weekly: [], monthly: [], yearly: [] };
    const highlights: Highlight[] = [...(options.baseHighlights ?? previous?.highlights ?? [])];
    const topicTexts: string[] = [];

    for (const tier of BUCKET_TIERS) {
      for await (const bucket of await this.store.readTier(userId, tier)) {
        tiers[tier].push(this.describeBucket(bucket, await this.store.bucketBytes(userId, tier, bucket.id)));
        if (bucket.kind === 'log') {
          for (const entry of bucket.entries) {
            topicTexts.push(entry.text);
            const score = entry.importance?.total;
            if (score !== undefined && score >= HIGHLIGHT_MIN_SCORE) {
              highlights.push({
                entryId: entry.id,
                bucketId: bucket.id,
                timestamp: entry.timestamp,
                speaker: entry.speaker,
                text: entry.text,
                score,
              });
            }
          }
        } else {
          highlights.push(...bucket.highlights);
          topicTexts.push(...bucket.themes);
        }
      }
    }

    const archived = await this.store.listArchived(userId);
    const sizes = await this.store.tierSizes(userId);
    const prefs = await this.store.readPreferences(userId);

    const index: MemoryIndex = {
      userId,
      displayName: options.displayName ?? previous?.displayName,
      generation: previous ? previous.generation + 1 : 0,
      createdAt: previous?.createdAt ?? now,
      updatedAt: now,
      tiers,
      archive: {
        buckets: archived.length,
        compressed: archived.filter((a) => a.compressed).length,
      },
      highlights: sortHighlights(highlights),
      protectedFacts: prefs.facts,
      stats: {
        totalEntries: BUCKET_TIERS.reduce((sum, t) => sum + tiers[t].reduce((s, e) => s + e.entryCount, 0), 0),
        bytesByTier: {
          daily: sizes.daily.bytes,
          weekly: sizes.weekly.bytes,
          monthly: sizes.monthly.bytes,
          yearly: sizes.yearly.bytes,
          archive: sizes.archive.bytes,
        },
        topTopics: topTopics(countTopics(topicTexts), TOP_TOPICS),
        lastCleanupAt: options.cleanupAt ?? previous?.stats.lastCleanupAt ?? null,
        cleanupCount: (previous?.stats.cleanupCount ?? 0) + (options.cleanupAt !== undefined ? 1 : 0),
      },
      restoredFrom: options.restoredFrom,
    };

    await this.store.writeIndex(userId, index);
    this.logger.debug('Rebuilt memory index', { userId, generation: index.generation });
    return index;
  }

  /**
   * Refresh the listing of one daily bucket after an append. Keeps the
   * generation; rebuilds when no index exists yet.
   */
  async refreshDaily(userId: string, bucket: LogBucket): Promise<MemoryIndex> {
    const index = await this.store.readIndex(userId);
    if (!index) return this.rebuild(userId);

    const bytes = await this.store.bucketBytes(userId, 'daily', bucket.id);
    const entry = this.describeBucket(bucket, bytes);
    const previousBytes = index.tiers.daily.find((e) => e.id === bucket.id)?.bytes ?? 0;

    index.tiers.daily = [...index.tiers.daily.filter((e) => e.id !== bucket.id), entry].sort((a, b) =>
      a.id.localeCompare(b.id)
    );
    index.stats.totalEntries = BUCKET_TIERS.reduce(
      (sum, t) => sum + index.tiers[t].reduce((s, e) => s + e.entryCount, 0),
      0
    );
    index.stats.bytesByTier.daily = (index.stats.bytesByTier.daily ?? 0) - previousBytes + bytes;
    index.updatedAt = this.clock();

    await this.store.writeIndex(userId, index);
    return index;
  }

  /**
   * Restore the protected facts and curated highlights of a snapshot. Tier
   * listings are re-derived from the live store.
   */
  async rollback(userId: string, generation: number): Promise<MemoryIndex> {
    const snapshot = await this.store.readSnapshot(userId, generation);
    if (!snapshot) {
      throw new MemoryNotFoundError(`Index snapshot ${generation} for user ${userId}`);
    }

    await this.store.writePreferences(userId, {
      userId,
      updatedAt: this.clock(),
      facts: snapshot.protectedFacts,
    });

    const index = await this.rebuild(userId, {
      snapshot: true,
      baseHighlights: snapshot.highlights,
      restoredFrom: generation,
    });
    this.logger.info('Rolled memory index back', { userId, restoredFrom: generation, generation: index.generation });
    return index;
  }
}
