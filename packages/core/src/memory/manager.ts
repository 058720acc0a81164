/**
 * MemoryManager — the facade the host talks to.
 *
 * Wires the tiered store, scorer, summarizer, index, scheduler and context
 * loader together. Every mutating operation runs under the user's lock, so
 * an append that arrives during a cleanup cycle waits and lands after it.
 */

import type {
  ConversationEntry,
  MemoryConfig,
  MemoryIndex,
  ProtectedFact,
  Speaker,
} from '@tiermind/shared';
import type { AIProvider } from '../ai/providers/base.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { uuidv7 } from '../utils/crypto.js';
import { toDateKey } from './calendar.js';
import { CleanupScheduler } from './cleanup-scheduler.js';
import { ContextLoader, formatContext } from './context-loader.js';
import { MemoryNotFoundError, MemoryValidationError, StaleBucketError } from './errors.js';
import { ImportanceScorer, countMarkerHits } from './importance-scorer.js';
import { LlmRankingOracle, LlmScoringOracle, LlmSummarizationOracle } from './llm-oracles.js';
import { UserLocks } from './locks.js';
import { MemoryIndexService } from './memory-index.js';
import type { RankingOracle, ScoringOracle, SummarizationOracle } from './oracles.js';
import { Summarizer } from './summarizer.js';
import { BUCKET_TIERS, TieredStore, type SnapshotInfo, type TieredStoreHooks } from './tiered-store.js';
import type {
  CleanupReport,
  CleanupRunStats,
  Clock,
  LoadedContext,
  MemoryStats,
  RecentMessage,
} from './types.js';

export interface MemoryOracles {
  scoring?: ScoringOracle;
  summarization?: SummarizationOracle;
  ranking?: RankingOracle;
}

export interface MemoryManagerDeps {
  dataDir: string;
  config: MemoryConfig;
  contextWindowTokens: number;
  /** Builds LLM oracles for every slot `oracles` leaves empty. */
  provider?: AIProvider;
  model?: string;
  oracles?: MemoryOracles;
  logger?: SecureLogger;
  clock?: Clock;
  storeHooks?: TieredStoreHooks;
}

export interface ImportResult {
  imported: number;
  days: number;
  skipped: number;
}

const V1_ENTRY_RE = /^### ([^\n]+?) - (\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})\n\n([\s\S]*?)(?=\n---|\n### [^\n]+ - \d{4}-\d{2}-\d{2} |$(?![\s\S]))/gm;

export class MemoryManager {
  private readonly config: MemoryConfig;
  private readonly logger: SecureLogger;
  private readonly clock: Clock;
  private readonly store: TieredStore;
  private readonly locks = new UserLocks();
  private readonly index: MemoryIndexService;
  private readonly scheduler: CleanupScheduler;
  private readonly loader: ContextLoader;
  private readonly shutdownController = new AbortController();

  constructor(deps: MemoryManagerDeps) {
    this.config = deps.config;
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? Date.now;

    const provider = deps.provider;
    const llm = { model: deps.model, logger: this.logger.child({ component: 'oracles' }) };
    const oracles: MemoryOracles = {
      scoring: deps.oracles?.scoring ?? (provider ? new LlmScoringOracle(provider, llm) : undefined),
      summarization:
        deps.oracles?.summarization ?? (provider ? new LlmSummarizationOracle(provider, llm) : undefined),
      ranking: deps.oracles?.ranking ?? (provider ? new LlmRankingOracle(provider, llm) : undefined),
    };

    this.store = new TieredStore(deps.dataDir, {
      logger: this.logger.child({ component: 'store' }),
      clock: this.clock,
      hooks: deps.storeHooks,
    });
    this.index = new MemoryIndexService({
      store: this.store,
      config: this.config,
      logger: this.logger.child({ component: 'index' }),
      clock: this.clock,
    });
    this.scheduler = new CleanupScheduler({
      store: this.store,
      scorer: new ImportanceScorer({
        config: this.config.scoring,
        oracle: oracles.scoring,
        logger: this.logger.child({ component: 'scorer' }),
      }),
      summarizer: new Summarizer({
        config: this.config.summarizer,
        protection: this.config.protection,
        store: this.store,
        oracle: oracles.summarization,
        logger: this.logger.child({ component: 'summarizer' }),
      }),
      index: this.index,
      locks: this.locks,
      config: this.config,
      logger: this.logger.child({ component: 'cleanup' }),
      clock: this.clock,
    });
    this.loader = new ContextLoader({
      store: this.store,
      index: this.index,
      config: this.config.context,
      contextWindowTokens: deps.contextWindowTokens,
      oracle: oracles.ranking,
      logger: this.logger.child({ component: 'context' }),
      clock: this.clock,
    });
  }

  // ── Users ────────────────────────────────────────────────────

  async createUser(userId: string, displayName?: string): Promise<MemoryIndex> {
    return this.locks.runExclusive(userId, async () => {
      await this.store.ensureUser(userId);
      const index = await this.index.rebuild(userId, { displayName });
      this.logger.info('Memory user ready', { userId });
      return index;
    });
  }

  async userExists(userId: string): Promise<boolean> {
    return this.store.userExists(userId);
  }

  async listUsers(): Promise<string[]> {
    return this.store.listUsers();
  }

  /** Wipe a user's memory. Returns the backup location, or null when there was nothing to back up. */
  async resetUser(userId: string): Promise<string | null> {
    return this.locks.runExclusive(userId, async () => {
      const backup = (await this.store.userExists(userId)) ? await this.store.backupUser(userId) : null;
      await this.store.removeUser(userId);
      this.logger.warn('Memory user reset', { userId, backup });
      return backup;
    });
  }

  // ── Turns ────────────────────────────────────────────────────

  async appendTurn(userId: string, speaker: Speaker, text: string, timestamp?: number): Promise<RecentMessage> {
    if (text.trim().length === 0) {
      throw new MemoryValidationError('Turn text must not be empty');
    }

    return this.locks.runExclusive(userId, async () => {
      await this.store.ensureUser(userId);
      const at = timestamp ?? this.clock();
      const entry: ConversationEntry = {
        id: uuidv7(at),
        speaker,
        timestamp: at,
        text,
        trimmed: false,
      };
      const bucket = await this.store.append(userId, entry);

      if (countMarkerHits(text, this.config.protection.autoProtectMarkers) > 0) {
        await this.saveFact(userId, {
          entryId: entry.id,
          bucketId: bucket.id,
          speaker,
          text,
          timestamp: at,
          reason: 'marker',
          protectedAt: this.clock(),
        });
        this.logger.info('Entry protected by marker', { userId, entryId: entry.id });
      }

      await this.index.refreshDaily(userId, bucket);
      return { ...entry, bucketId: bucket.id };
    });
  }

  /** Chronological tail of the active daily buckets, newest `max` entries. */
  async getRecentMessages(userId: string, max = 20): Promise<RecentMessage[]> {
    const ids = await this.store.listBucketIds(userId, 'daily');
    const out: RecentMessage[] = [];
    for (const id of [...ids].reverse()) {
      if (out.length >= max) break;
      const bucket = await this.store.getLogBucket(userId, id);
      if (!bucket) continue;
      out.unshift(...bucket.entries.map((e) => ({ ...e, bucketId: bucket.id })));
    }
    return out.slice(-max);
  }

  // ── Context ──────────────────────────────────────────────────

  async loadContext(userId: string, query: string): Promise<LoadedContext> {
    if (!(await this.store.userExists(userId))) {
      throw new MemoryNotFoundError(`User ${userId}`);
    }
    return this.loader.loadContext(userId, query);
  }

  formatContext(context: LoadedContext): string {
    return formatContext(context);
  }

  // ── Cleanup ──────────────────────────────────────────────────

  async forceCleanup(userId: string): Promise<CleanupReport> {
    if (!(await this.store.userExists(userId))) {
      throw new MemoryNotFoundError(`User ${userId}`);
    }
    return this.scheduler.runCycle(userId, { signal: this.shutdownController.signal });
  }

  /** Clean the given users, or every known user when none are named. */
  async runDailyCleanup(userIds?: string[]): Promise<CleanupRunStats> {
    if (userIds) {
      return this.scheduler.runAll(userIds, { signal: this.shutdownController.signal });
    }
    return this.scheduler.runDaily();
  }

  isCleanupRunning(): boolean {
    return this.scheduler.isRunning();
  }

  getCleanupHistory(): CleanupReport[] {
    return this.scheduler.getHistory();
  }

  // ── Protection ───────────────────────────────────────────────

  async protect(userId: string, entryId: string, note?: string): Promise<ProtectedFact> {
    return this.locks.runExclusive(userId, async () => {
      const prefs = await this.store.readPreferences(userId);
      const existing = prefs.facts.find((f) => f.entryId === entryId);
      if (existing) {
        const updated: ProtectedFact = { ...existing, note: note ?? existing.note };
        await this.saveFact(userId, updated);
        return updated;
      }

      const found = await this.findEntry(userId, entryId);
      if (!found) {
        throw new MemoryNotFoundError(`Entry ${entryId}`);
      }
      const fact: ProtectedFact = {
        entryId,
        bucketId: found.bucketId,
        speaker: found.entry.speaker,
        text: found.entry.text,
        timestamp: found.entry.timestamp,
        reason: 'manual',
        note,
        protectedAt: this.clock(),
      };
      await this.saveFact(userId, fact);
      this.logger.info('Entry protected', { userId, entryId });
      return fact;
    });
  }

  async unprotect(userId: string, entryId: string): Promise<void> {
    await this.locks.runExclusive(userId, async () => {
      const prefs = await this.store.readPreferences(userId);
      const facts = prefs.facts.filter((f) => f.entryId !== entryId);
      if (facts.length === prefs.facts.length) {
        throw new MemoryNotFoundError(`Protected entry ${entryId}`);
      }
      await this.writeFacts(userId, facts);
      this.logger.info('Entry unprotected', { userId, entryId });
    });
  }

  private async saveFact(userId: string, fact: ProtectedFact): Promise<void> {
    const prefs = await this.store.readPreferences(userId);
    await this.writeFacts(userId, [...prefs.facts.filter((f) => f.entryId !== fact.entryId), fact]);
  }

  private async writeFacts(userId: string, facts: ProtectedFact[]): Promise<void> {
    await this.store.writePreferences(userId, { userId, updatedAt: this.clock(), facts });
    const index = await this.store.readIndex(userId);
    if (index) {
      await this.store.writeIndex(userId, { ...index, protectedFacts: facts, updatedAt: this.clock() });
    }
  }

  private async findEntry(
    userId: string,
    entryId: string
  ): Promise<{ entry: ConversationEntry; bucketId: string } | null> {
    for (const tier of ['daily', 'archive'] as const) {
      for await (const bucket of await this.store.readTier(userId, tier)) {
        if (bucket.kind !== 'log') continue;
        const entry = bucket.entries.find((e) => e.id === entryId);
        if (entry) return { entry, bucketId: bucket.id };
      }
    }
    return null;
  }

  // ── Index ────────────────────────────────────────────────────

  async getIndex(userId: string): Promise<MemoryIndex> {
    if (!(await this.store.userExists(userId))) {
      throw new MemoryNotFoundError(`User ${userId}`);
    }
    return this.index.ensure(userId);
  }

  async listSnapshots(userId: string): Promise<SnapshotInfo[]> {
    return this.store.listSnapshots(userId);
  }

  async rollbackIndex(userId: string, generation: number): Promise<MemoryIndex> {
    return this.locks.runExclusive(userId, () => this.index.rollback(userId, generation));
  }

  async getStats(userId: string): Promise<MemoryStats> {
    const index = await this.getIndex(userId);
    const tiers = await this.store.tierSizes(userId);
    const archived = await this.store.listArchived(userId);
    return {
      userId,
      tiers,
      archivedBuckets: archived.length,
      compressedBuckets: archived.filter((a) => a.compressed).length,
      totalEntries: BUCKET_TIERS.reduce((sum, t) => sum + index.tiers[t].reduce((s, e) => s + e.entryCount, 0), 0),
      protectedFacts: index.protectedFacts.length,
      highlights: index.highlights.length,
      indexGeneration: index.generation,
      lastCleanupAt: index.stats.lastCleanupAt,
      cleanupCount: index.stats.cleanupCount,
    };
  }

  // ── Migration ────────────────────────────────────────────────

  /**
   * Import a single-file conversation log whose turns start with
   * `### User - YYYY-MM-DD HH:MM:SS` headers. Turns on days that were
   * already promoted are skipped.
   */
  async importV1Memory(userId: string, markdown: string): Promise<ImportResult> {
    return this.locks.runExclusive(userId, async () => {
      await this.store.ensureUser(userId);
      const result: ImportResult = { imported: 0, days: 0, skipped: 0 };
      const days = new Set<string>();

      for (const match of markdown.replace(/\r\n/g, '\n').matchAll(V1_ENTRY_RE)) {
        const [, role = '', date = '', time = '', body = ''] = match;
        const text = body.trim();
        const timestamp = Date.parse(`${date}T${time}Z`);
        if (!text || Number.isNaN(timestamp)) continue;

        try {
          await this.store.append(userId, {
            id: uuidv7(timestamp),
            speaker: role.trim().toLowerCase() === 'user' ? 'user' : 'assistant',
            timestamp,
            text,
            trimmed: false,
          });
        } catch (error) {
          if (!(error instanceof StaleBucketError)) throw error;
          result.skipped++;
          continue;
        }
        result.imported++;
        days.add(toDateKey(timestamp));
      }

      result.days = days.size;
      await this.index.rebuild(userId);
      this.logger.info('Imported single-file memory', { userId, ...result });
      return result;
    });
  }

  // ── Lifecycle ────────────────────────────────────────────────

  /** Abort in-flight cleanup cycles and wait for them to settle. */
  async shutdown(): Promise<void> {
    this.shutdownController.abort();
    await this.scheduler.stop();
    this.logger.info('Memory manager stopped');
  }
}
