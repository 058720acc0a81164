/**
 * CleanupScheduler — runs the daily maintenance cycle per user.
 *
 * A cycle moves through idle → scoring → summarizing → compressing → done
 * and back to idle. Size ceilings are checked before the time-based work so
 * an oversized tier is relieved first. Every write goes through the
 * TieredStore; the whole cycle holds the user's lock so appends and
 * protection changes never interleave with it.
 */

import type { Bucket, BucketTier, MemoryConfig, SummaryTier } from '@tiermind/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { DAY_MS, closedForMs, groupIdFor, groupPeriod } from './calendar.js';
import { buildScoringHistory, type ImportanceScorer } from './importance-scorer.js';
import type { UserLocks } from './locks.js';
import type { MemoryIndexService } from './memory-index.js';
import type { Summarizer } from './summarizer.js';
import { periodFromId, type TieredStore } from './tiered-store.js';
import type { CleanupReport, CleanupRunStats, CleanupState, Clock } from './types.js';
import { runPool } from './worker-pool.js';

export interface CleanupSchedulerDeps {
  store: TieredStore;
  scorer: ImportanceScorer;
  summarizer: Summarizer;
  index: MemoryIndexService;
  locks: UserLocks;
  config: MemoryConfig;
  logger?: SecureLogger;
  clock?: Clock;
}

export interface CycleOptions {
  signal?: AbortSignal;
}

type PromotionMode = 'time' | 'size';

const HISTORY_LIMIT = 50;

function emptyReport(userId: string, now: number): CleanupReport {
  return {
    userId,
    startedAt: now,
    finishedAt: now,
    scored: 0,
    softTrimmedEntries: 0,
    softTrimmedBuckets: 0,
    weekly: 0,
    monthly: 0,
    yearly: 0,
    archived: 0,
    compressed: 0,
    deferred: 0,
    sizeTriggered: [],
    aborted: false,
    noop: true,
  };
}

function changed(report: CleanupReport): boolean {
  return (
    report.scored +
      report.softTrimmedEntries +
      report.softTrimmedBuckets +
      report.weekly +
      report.monthly +
      report.yearly +
      report.compressed >
    0
  );
}

function groupBy(buckets: readonly Bucket[], toTier: SummaryTier): Map<string, Bucket[]> {
  const groups = new Map<string, Bucket[]>();
  for (const bucket of buckets) {
    const id = groupIdFor(toTier, bucket.period);
    const group = groups.get(id);
    if (group) group.push(bucket);
    else groups.set(id, [bucket]);
  }
  return groups;
}

export class CleanupScheduler {
  private readonly store: TieredStore;
  private readonly scorer: ImportanceScorer;
  private readonly summarizer: Summarizer;
  private readonly index: MemoryIndexService;
  private readonly locks: UserLocks;
  private readonly config: MemoryConfig;
  private readonly logger: SecureLogger;
  private readonly clock: Clock;
  private readonly states = new Map<string, CleanupState>();
  private history: CleanupReport[] = [];
  /** Users whose index missed a rebuild after committed changes. */
  private readonly staleIndexes = new Set<string>();
  private controller: AbortController | null = null;
  private running: Promise<CleanupRunStats> | null = null;

  constructor(deps: CleanupSchedulerDeps) {
    this.store = deps.store;
    this.scorer = deps.scorer;
    this.summarizer = deps.summarizer;
    this.index = deps.index;
    this.locks = deps.locks;
    this.config = deps.config;
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? Date.now;
  }

  getState(userId: string): CleanupState {
    return this.states.get(userId) ?? 'idle';
  }

  getHistory(): CleanupReport[] {
    return [...this.history];
  }

  /** Abort a running sweep at its next step boundary and wait for it to settle. */
  async stop(): Promise<void> {
    this.controller?.abort();
    if (this.running) {
      await this.running.catch((error: unknown) => {
        this.logger.warn('Cleanup sweep ended with an error during shutdown', { error: toErrorMessage(error) });
      });
    }
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /** One sweep over every known user. Concurrent calls share the sweep in flight. */
  async runDaily(): Promise<CleanupRunStats> {
    if (this.running) return this.running;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.store
      .listUsers()
      .then((users) => this.runAll(users, { signal: controller.signal }))
      .finally(() => {
        this.running = null;
        this.controller = null;
      });
    return this.running;
  }

  async runAll(userIds: readonly string[], options: CycleOptions = {}): Promise<CleanupRunStats> {
    const results = await runPool(userIds, this.config.cleanup.concurrency, (userId) =>
      this.runCycle(userId, options)
    );

    const stats: CleanupRunStats = {
      processedUsers: 0,
      softTrimmed: 0,
      weeklySummaries: 0,
      monthlySummaries: 0,
      yearlySummaries: 0,
      archived: 0,
      compressed: 0,
      deferred: 0,
      errors: [],
      reports: [],
    };
    results.forEach((result, i) => {
      const userId = userIds[i] ?? '';
      if (result.status === 'rejected') {
        stats.errors.push({ userId, error: toErrorMessage(result.reason) });
        return;
      }
      const report = result.value;
      stats.reports.push(report);
      if (!report.aborted) stats.processedUsers++;
      stats.softTrimmed += report.softTrimmedEntries;
      stats.weeklySummaries += report.weekly;
      stats.monthlySummaries += report.monthly;
      stats.yearlySummaries += report.yearly;
      stats.archived += report.archived;
      stats.compressed += report.compressed;
      stats.deferred += report.deferred;
    });

    this.logger.info('Cleanup sweep finished', {
      users: userIds.length,
      processed: stats.processedUsers,
      errors: stats.errors.length,
    });
    return stats;
  }

  // ── Cycle ────────────────────────────────────────────────────

  async runCycle(userId: string, options: CycleOptions = {}): Promise<CleanupReport> {
    return this.locks.runExclusive(userId, () => this.cycle(userId, options.signal));
  }

  /**
   * Promotions committed before an abort or failure still have to reach the
   * index. A failed rebuild leaves the user marked so the next cycle rebuilds
   * even when it finds nothing to do.
   */
  private async rebuildAfterPartialCycle(userId: string, log: SecureLogger): Promise<void> {
    try {
      await this.index.rebuild(userId, { snapshot: true });
    } catch (error) {
      this.staleIndexes.add(userId);
      log.error('Index rebuild after partial cleanup failed', { error: toErrorMessage(error) });
    }
  }

  private setState(userId: string, state: CleanupState): void {
    this.states.set(userId, state);
    this.logger.trace('Cleanup state', { userId, state });
  }

  private async cycle(userId: string, signal?: AbortSignal): Promise<CleanupReport> {
    const now = this.clock();
    const report = emptyReport(userId, now);
    const log = this.logger.child({ userId });

    try {
      signal?.throwIfAborted();
      this.setState(userId, 'scoring');
      await this.scoreDailies(userId, now, report, signal);

      signal?.throwIfAborted();
      this.setState(userId, 'summarizing');
      await this.relieveCeilings(userId, now, report, signal);
      await this.softTrim(userId, now, report, signal);
      await this.promoteDailies(userId, now, 'time', report, signal);
      await this.promoteSummaries(userId, 'weekly', 'monthly', now, 'time', report, signal);
      await this.promoteSummaries(userId, 'monthly', 'yearly', now, 'time', report, signal);

      this.setState(userId, 'compressing');
      await this.compress(userId, now, 'time', report, signal);

      report.noop = !changed(report);
      const recovered = this.store.consumeRecovery(userId);
      const stale = this.staleIndexes.delete(userId);
      if (!report.noop || recovered || stale) {
        await this.index.rebuild(userId, { snapshot: true, cleanupAt: now });
      }
      this.setState(userId, 'done');
    } catch (error) {
      if (changed(report)) {
        await this.rebuildAfterPartialCycle(userId, log);
      }
      if (!signal?.aborted) throw error;
      report.aborted = true;
      report.noop = !changed(report);
      log.info('Cleanup cycle aborted', { state: this.getState(userId) });
    } finally {
      report.finishedAt = this.clock();
      this.setState(userId, 'idle');
    }

    this.history = [...this.history, report].slice(-HISTORY_LIMIT);
    if (report.noop) {
      log.debug('Cleanup cycle found nothing to do');
    } else {
      log.info('Cleanup cycle finished', {
        scored: report.scored,
        softTrimmed: report.softTrimmedEntries,
        weekly: report.weekly,
        monthly: report.monthly,
        yearly: report.yearly,
        compressed: report.compressed,
        deferred: report.deferred,
        sizeTriggered: report.sizeTriggered,
      });
    }
    return report;
  }

  private async activeBuckets(userId: string, tier: BucketTier): Promise<Bucket[]> {
    return (await this.store.readTier(userId, tier)).toArray();
  }

  private async scoreDailies(userId: string, now: number, report: CleanupReport, signal?: AbortSignal): Promise<void> {
    const dailies = await this.activeBuckets(userId, 'daily');
    const history = buildScoringHistory(
      dailies.flatMap((b) => (b.kind === 'log' ? b.entries : [])),
      now,
      this.config.scoring.topicWindowDays
    );

    for (const bucket of dailies) {
      if (bucket.kind !== 'log' || bucket.entries.every((e) => e.importance)) continue;
      signal?.throwIfAborted();
      const result = await this.scorer.scoreEntries(bucket.entries, history, signal);
      await this.store.replaceEntries(userId, bucket.id, result.entries);
      report.scored += result.scored;
    }
  }

  private async relieveCeilings(
    userId: string,
    now: number,
    report: CleanupReport,
    signal?: AbortSignal
  ): Promise<void> {
    const ceilings = this.config.cleanup.ceilingsBytes;

    if ((await this.store.tierSizes(userId)).daily.bytes > ceilings.daily) {
      report.sizeTriggered.push('daily');
      await this.promoteDailies(userId, now, 'size', report, signal);
    }
    if ((await this.store.tierSizes(userId)).weekly.bytes > ceilings.weekly) {
      report.sizeTriggered.push('weekly');
      await this.promoteSummaries(userId, 'weekly', 'monthly', now, 'size', report, signal);
    }
    if ((await this.store.tierSizes(userId)).monthly.bytes > ceilings.monthly) {
      report.sizeTriggered.push('monthly');
      await this.promoteSummaries(userId, 'monthly', 'yearly', now, 'size', report, signal);
    }
    const sizes = await this.store.tierSizes(userId);
    if (sizes.yearly.bytes > ceilings.yearly) {
      // Nothing sits above the yearly tier; the overflow is only reported.
      report.sizeTriggered.push('yearly');
      this.logger.warn('Yearly tier exceeds its ceiling', { userId, bytes: sizes.yearly.bytes, ceiling: ceilings.yearly });
    }
    if (sizes.archive.bytes > ceilings.archive) {
      report.sizeTriggered.push('archive');
      await this.compress(userId, now, 'size', report, signal);
    }
  }

  private async softTrim(userId: string, now: number, report: CleanupReport, signal?: AbortSignal): Promise<void> {
    const dueMs = this.config.cleanup.softTrimAfterDays * DAY_MS;
    const protectedIds = await this.store.protectedEntryIds(userId);

    for (const bucket of await this.activeBuckets(userId, 'daily')) {
      if (bucket.kind !== 'log' || bucket.state.phase !== 'active') continue;
      if (bucket.state.softTrimmedAt !== null || closedForMs(bucket.period, now) < dueMs) continue;
      signal?.throwIfAborted();

      const result = this.summarizer.softTrim(bucket, now, protectedIds);
      if (result.trimmed === 0 && !result.complete) continue;
      await this.store.replaceEntries(userId, bucket.id, result.entries, {
        softTrimmedAt: result.complete ? now : null,
      });
      report.softTrimmedEntries += result.trimmed;
      if (result.complete) report.softTrimmedBuckets++;
    }
  }

  /**
   * Time mode folds a week once it has ended, its oldest day is past the
   * weekly threshold and no day is still inside the protection window.
   * Size mode folds every closed day, window or not.
   */
  private async promoteDailies(
    userId: string,
    now: number,
    mode: PromotionMode,
    report: CleanupReport,
    signal?: AbortSignal
  ): Promise<void> {
    const windowMs = this.config.protection.windowDays * DAY_MS;
    const afterMs = this.config.cleanup.weeklyAfterDays * DAY_MS;
    const closed = (await this.activeBuckets(userId, 'daily')).filter((b) => closedForMs(b.period, now) >= 0);

    for (const [groupId, members] of groupBy(closed, 'weekly')) {
      if (mode === 'time') {
        const oldest = members[0];
        if (!oldest || closedForMs(groupPeriod('weekly', groupId), now) < 0) continue;
        if (closedForMs(oldest.period, now) < afterMs) continue;
        if (members.some((b) => closedForMs(b.period, now) < windowMs)) continue;
      }
      await this.promoteGroup(userId, members, 'daily', 'weekly', now, report, signal);
    }
  }

  private async promoteSummaries(
    userId: string,
    fromTier: 'weekly' | 'monthly',
    toTier: 'monthly' | 'yearly',
    now: number,
    mode: PromotionMode,
    report: CleanupReport,
    signal?: AbortSignal
  ): Promise<void> {
    const afterMs = (toTier === 'monthly' ? this.config.cleanup.monthlyAfterDays : this.config.cleanup.yearlyAfterDays) * DAY_MS;

    for (const [groupId, members] of groupBy(await this.activeBuckets(userId, fromTier), toTier)) {
      if (mode === 'time') {
        const oldest = members[0];
        if (!oldest || closedForMs(groupPeriod(toTier, groupId), now) < 0) continue;
        if (closedForMs(oldest.period, now) < afterMs) continue;
      }
      await this.promoteGroup(userId, members, fromTier, toTier, now, report, signal);
    }
  }

  private async promoteGroup(
    userId: string,
    members: Bucket[],
    fromTier: BucketTier,
    toTier: SummaryTier,
    now: number,
    report: CleanupReport,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    const existingIds = new Set([
      ...(await this.store.listBucketIds(userId, toTier)),
      ...(await this.store.listArchived(userId, toTier)).map((a) => a.id),
    ]);
    const result = await this.summarizer.summarizeUp(members, toTier, {
      now,
      protectedIds: await this.store.protectedEntryIds(userId),
      existingIds,
      signal,
    });

    if (result.status === 'deferred') {
      report.deferred++;
      return;
    }
    signal?.throwIfAborted();
    await this.store.promote(userId, result.sourceIds, fromTier, toTier, result.summary);
    report[toTier]++;
    report.archived += result.sourceIds.length;
    this.logger.debug('Promoted buckets', {
      userId,
      tier: toTier,
      bucketId: result.summary.id,
      sources: result.sourceIds,
      partial: result.partial,
    });
  }

  private async compress(
    userId: string,
    now: number,
    mode: PromotionMode,
    report: CleanupReport,
    signal?: AbortSignal
  ): Promise<void> {
    const afterMs = this.config.cleanup.compressAfterDays * DAY_MS;
    for (const ref of await this.store.listArchived(userId)) {
      if (ref.compressed) continue;
      if (mode === 'time' && closedForMs(periodFromId(ref.tier, ref.id), now) < afterMs) continue;
      signal?.throwIfAborted();
      if (await this.summarizer.compressArchive(userId, ref.tier, ref.id)) {
        report.compressed++;
      }
    }
  }
}
