/**
 * TieredStore — per-user on-disk hierarchy of memory buckets.
 *
 * Layout under `{dataDir}/users/{userId}/`:
 *
 *   memory_index.json
 *   daily/{YYYYMMDD}.json
 *   weekly/{YYYY-Www}.json      monthly/{YYYY-MM}.json      yearly/{YYYY}.json
 *   archive/{tier}/{bucketId}.json[.gz]
 *   protected/preferences.json
 *   snapshots/index-{generation}.json
 *   .promotion-journal.json
 *
 * Every document is written to a temp file and renamed into place, so a
 * reader never sees a half-written bucket. Promotions are journaled: the
 * journal is written first, then the successor, then the archive copies,
 * then the originals are unlinked. Recovery on open rolls a leftover
 * journal forward when the successor is durable and back otherwise.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { cp, mkdir, readdir, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { promisify } from 'node:util';
import { createGzip, gunzip } from 'node:zlib';
import {
  BucketSchema,
  ConversationEntrySchema,
  MemoryIndexSchema,
  PreferencesDocumentSchema,
  PromotionJournalSchema,
  SummaryBucketSchema,
  type Bucket,
  type BucketTier,
  type ConversationEntry,
  type LogBucket,
  type MemoryIndex,
  type Period,
  type PreferencesDocument,
  type PromotionJournal,
  type SummaryBucket,
  type SummaryTier,
  type Tier,
} from '@tiermind/shared';
import type { z } from 'zod';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { dailyId, dailyIdToDateKey, groupPeriod, periodContains, periodsOverlap, toDateKey } from './calendar.js';
import {
  MemoryNotFoundError,
  MemoryValidationError,
  ProtectionViolationError,
  StaleBucketError,
  StorageError,
} from './errors.js';
import type { Clock, TierStats } from './types.js';

const gunzipAsync = promisify(gunzip);

export const BUCKET_TIERS: readonly BucketTier[] = ['daily', 'weekly', 'monthly', 'yearly'];
export const SUMMARY_TIERS: readonly SummaryTier[] = ['weekly', 'monthly', 'yearly'];

/** Tier a bucket of the given tier is promoted into. */
export const NEXT_TIER: Record<BucketTier, SummaryTier | null> = {
  daily: 'weekly',
  weekly: 'monthly',
  monthly: 'yearly',
  yearly: null,
};

const USER_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;
const BUCKET_ID_RE = /^[A-Za-z0-9-]{1,40}$/;
const JOURNAL_FILE = '.promotion-journal.json';
const SNAPSHOT_RE = /^index-(\d+)\.json$/;

export type PromotionStep = 'journal-written' | 'successor-written' | 'sources-archived' | 'originals-removed';

export type RecoveryOutcome = 'clean' | 'rolled-forward' | 'rolled-back';

export interface TieredStoreHooks {
  /** Runs after each durable step of a promotion; a throw interrupts it there. */
  onPromotionStep?: (step: PromotionStep, journal: PromotionJournal) => void | Promise<void>;
}

export interface TieredStoreDeps {
  logger?: SecureLogger;
  clock?: Clock;
  hooks?: TieredStoreHooks;
}

export interface BucketRef {
  tier: BucketTier;
  id: string;
  location: 'active' | 'archived';
}

export interface ArchivedRef {
  tier: BucketTier;
  id: string;
  compressed: boolean;
  bytes: number;
}

export interface CoveringBucket {
  bucket: Bucket;
  location: 'active' | 'archived';
}

export interface SnapshotInfo {
  generation: number;
  updatedAt: number;
  bytes: number;
}

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Calendar period implied by a bucket id; partial summaries get their whole group. */
export function periodFromId(tier: BucketTier, id: string): Period {
  if (tier === 'daily') {
    const key = dailyIdToDateKey(id);
    return { start: key, end: key };
  }
  return groupPeriod(tier, id);
}

/**
 * Lazy, finite, restartable sequence over a tier. The id list is fixed when
 * the sequence is created; each iteration loads documents on demand and
 * skips buckets that were promoted or removed in the meantime.
 */
export class BucketSequence implements AsyncIterable<Bucket> {
  constructor(
    readonly refs: readonly BucketRef[],
    private readonly load: (ref: BucketRef) => Promise<Bucket | null>,
    private readonly range?: Period
  ) {}

  get size(): number {
    return this.refs.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Bucket> {
    for (const ref of this.refs) {
      const bucket = await this.load(ref);
      if (!bucket) continue;
      if (ref.location === 'active' && bucket.state.phase !== 'active') continue;
      if (this.range && !periodsOverlap(bucket.period, this.range)) continue;
      yield bucket;
    }
  }

  async toArray(): Promise<Bucket[]> {
    const out: Bucket[] = [];
    for await (const bucket of this) {
      out.push(bucket);
    }
    return out;
  }
}

export class TieredStore {
  private readonly logger: SecureLogger;
  private readonly clock: Clock;
  private readonly hooks: TieredStoreHooks;
  private readonly opened = new Set<string>();
  private readonly recovered = new Set<string>();

  constructor(
    readonly dataDir: string,
    deps: TieredStoreDeps = {}
  ) {
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? Date.now;
    this.hooks = deps.hooks ?? {};
  }

  // ── Paths ────────────────────────────────────────────────────

  userDir(userId: string): string {
    if (!USER_ID_RE.test(userId)) {
      throw new MemoryValidationError(`Invalid user id: ${userId}`);
    }
    return join(this.dataDir, 'users', userId);
  }

  private bucketPath(userId: string, tier: BucketTier, id: string): string {
    this.assertBucketId(id);
    return join(this.userDir(userId), tier, `${id}.json`);
  }

  private archivePath(userId: string, tier: BucketTier, id: string, compressed: boolean): string {
    this.assertBucketId(id);
    return join(this.userDir(userId), 'archive', tier, `${id}.json${compressed ? '.gz' : ''}`);
  }

  private indexPath(userId: string): string {
    return join(this.userDir(userId), 'memory_index.json');
  }

  private preferencesPath(userId: string): string {
    return join(this.userDir(userId), 'protected', 'preferences.json');
  }

  private snapshotsDir(userId: string): string {
    return join(this.userDir(userId), 'snapshots');
  }

  private journalPath(userId: string): string {
    return join(this.userDir(userId), JOURNAL_FILE);
  }

  private assertBucketId(id: string): void {
    if (!BUCKET_ID_RE.test(id)) {
      throw new MemoryValidationError(`Invalid bucket id: ${id}`);
    }
  }

  // ── Low-level IO ─────────────────────────────────────────────

  private async writeJsonAtomic(path: string, data: unknown): Promise<void> {
    const tmp = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      await rename(tmp, path);
    } catch (error) {
      throw new StorageError('write', path, error);
    }
  }

  private async readRaw(path: string): Promise<Buffer | null> {
    try {
      const raw = await readFile(path);
      return path.endsWith('.gz') ? await gunzipAsync(raw) : raw;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return null;
      throw new StorageError('read', path, error);
    }
  }

  private async readDocument<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T> | null> {
    const raw = await this.readRaw(path);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString('utf-8'));
    } catch (error) {
      throw new StorageError('parse', path, error);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError('validate', path, result.error);
    }
    return result.data;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return false;
      throw new StorageError('stat', path, error);
    }
  }

  private async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!isErrno(error, 'ENOENT')) {
        throw new StorageError('unlink', path, error);
      }
    }
  }

  private async listFiles(dir: string): Promise<string[]> {
    try {
      return await readdir(dir);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw new StorageError('list', dir, error);
    }
  }

  // ── Users ────────────────────────────────────────────────────

  /**
   * Validate the user id and, once per store instance, recover any
   * interrupted promotion.
   */
  async open(userId: string): Promise<void> {
    const dir = this.userDir(userId);
    if (this.opened.has(userId)) return;
    if (await this.exists(dir)) {
      const outcome = await this.recover(userId);
      if (outcome !== 'clean') this.recovered.add(userId);
    }
    this.opened.add(userId);
  }

  /**
   * True once after `open()` repaired an interrupted promotion for the user;
   * the stored index predates the repair and needs a rebuild.
   */
  consumeRecovery(userId: string): boolean {
    return this.recovered.delete(userId);
  }

  async ensureUser(userId: string): Promise<void> {
    const dir = this.userDir(userId);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new StorageError('mkdir', dir, error);
    }
    await this.open(userId);
  }

  async userExists(userId: string): Promise<boolean> {
    return this.exists(this.indexPath(userId));
  }

  async listUsers(): Promise<string[]> {
    const names = await this.listFiles(join(this.dataDir, 'users'));
    return names.filter((name) => USER_ID_RE.test(name)).sort();
  }

  /** Copy the user's directory to `{dataDir}/backups/{userId}-{timestamp}`. */
  async backupUser(userId: string): Promise<string> {
    const source = this.userDir(userId);
    const target = join(this.dataDir, 'backups', `${userId}-${this.clock()}`);
    try {
      await cp(source, target, { recursive: true });
    } catch (error) {
      throw new StorageError('backup', source, error);
    }
    return target;
  }

  async removeUser(userId: string): Promise<void> {
    const dir = this.userDir(userId);
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      throw new StorageError('remove', dir, error);
    }
    this.opened.delete(userId);
  }

  // ── Buckets ──────────────────────────────────────────────────

  /**
   * Append an entry to the daily bucket of its calendar day.
   */
  async append(userId: string, entry: ConversationEntry): Promise<LogBucket> {
    await this.open(userId);
    const valid = ConversationEntrySchema.parse(entry);
    const dateKey = toDateKey(valid.timestamp);
    const id = dailyId(dateKey);

    if (await this.archivedExists(userId, 'daily', id)) {
      throw new StaleBucketError(id, 'has already been promoted; appends to that day are rejected');
    }

    const now = this.clock();
    const bucket: LogBucket = (await this.getLogBucket(userId, id)) ?? {
      kind: 'log',
      tier: 'daily',
      id,
      period: { start: dateKey, end: dateKey },
      createdAt: now,
      updatedAt: now,
      state: { phase: 'active', softTrimmedAt: null },
      entries: [],
    };

    if (bucket.entries.some((e) => e.id === valid.id)) {
      throw new MemoryValidationError(`Entry ${valid.id} already exists in bucket ${id}`);
    }

    const at = bucket.entries.findIndex((e) => e.timestamp > valid.timestamp);
    if (at === -1) {
      bucket.entries.push(valid);
    } else {
      bucket.entries.splice(at, 0, valid);
    }
    bucket.updatedAt = now;

    await this.writeJsonAtomic(this.bucketPath(userId, 'daily', id), bucket);
    return bucket;
  }

  async getBucket(userId: string, tier: BucketTier, id: string): Promise<Bucket | null> {
    await this.open(userId);
    return this.readDocument(this.bucketPath(userId, tier, id), BucketSchema);
  }

  async getLogBucket(userId: string, id: string): Promise<LogBucket | null> {
    const bucket = await this.getBucket(userId, 'daily', id);
    return bucket?.kind === 'log' ? bucket : null;
  }

  async getSummaryBucket(userId: string, tier: SummaryTier, id: string): Promise<SummaryBucket | null> {
    const bucket = await this.getBucket(userId, tier, id);
    return bucket?.kind === 'summary' ? bucket : null;
  }

  /** Active bucket ids of a tier in ascending order. */
  async listBucketIds(userId: string, tier: BucketTier): Promise<string[]> {
    await this.open(userId);
    const names = await this.listFiles(join(this.userDir(userId), tier));
    return names
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .filter((id) => BUCKET_ID_RE.test(id))
      .sort();
  }

  async listArchived(userId: string, tier?: BucketTier): Promise<ArchivedRef[]> {
    await this.open(userId);
    const out: ArchivedRef[] = [];
    for (const t of tier ? [tier] : BUCKET_TIERS) {
      const dir = join(this.userDir(userId), 'archive', t);
      for (const name of await this.listFiles(dir)) {
        const compressed = name.endsWith('.json.gz');
        if (!compressed && !name.endsWith('.json')) continue;
        const id = name.slice(0, compressed ? -'.json.gz'.length : -'.json'.length);
        if (!BUCKET_ID_RE.test(id)) continue;
        const info = await stat(join(dir, name)).catch((error: unknown) => {
          throw new StorageError('stat', join(dir, name), error);
        });
        out.push({ tier: t, id, compressed, bytes: info.size });
      }
    }
    return out.sort((a, b) => a.tier.localeCompare(b.tier) || a.id.localeCompare(b.id));
  }

  async archivedExists(userId: string, tier: BucketTier, id: string): Promise<boolean> {
    return (
      (await this.exists(this.archivePath(userId, tier, id, false))) ||
      (await this.exists(this.archivePath(userId, tier, id, true)))
    );
  }

  /** Archived bucket, decompressed transparently. */
  async readArchived(userId: string, tier: BucketTier, id: string): Promise<Bucket | null> {
    await this.open(userId);
    return (
      (await this.readDocument(this.archivePath(userId, tier, id, false), BucketSchema)) ??
      (await this.readDocument(this.archivePath(userId, tier, id, true), BucketSchema))
    );
  }

  /** Exact bytes of an archived document, decompressed when gzipped. */
  async readArchivedRaw(userId: string, tier: BucketTier, id: string): Promise<Buffer | null> {
    await this.open(userId);
    return (
      (await this.readRaw(this.archivePath(userId, tier, id, false))) ??
      (await this.readRaw(this.archivePath(userId, tier, id, true)))
    );
  }

  /**
   * Lazy sequence over a tier. `archive` walks the archived buckets of every
   * source tier.
   */
  async readTier(userId: string, tier: Tier, range?: Period): Promise<BucketSequence> {
    await this.open(userId);
    let refs: BucketRef[];
    if (tier === 'archive') {
      refs = (await this.listArchived(userId)).map(({ tier: t, id }) => ({ tier: t, id, location: 'archived' }));
    } else {
      refs = (await this.listBucketIds(userId, tier)).map((id) => ({ tier, id, location: 'active' }));
    }
    if (range) {
      refs = refs.filter((ref) => periodsOverlap(periodFromId(ref.tier, ref.id), range));
    }

    return new BucketSequence(
      refs,
      (ref) =>
        ref.location === 'active'
          ? this.readDocument(this.bucketPath(userId, ref.tier, ref.id), BucketSchema)
          : this.readArchived(userId, ref.tier, ref.id),
      range
    );
  }

  /**
   * Bucket holding the given date: active daily, archived daily, then the
   * finest active summary covering it, then archived summaries.
   */
  async findBucketCovering(userId: string, dateKey: string): Promise<CoveringBucket | null> {
    await this.open(userId);
    const id = dailyId(dateKey);

    const active = await this.getBucket(userId, 'daily', id);
    if (active) return { bucket: active, location: 'active' };

    const archived = await this.readArchived(userId, 'daily', id);
    if (archived) return { bucket: archived, location: 'archived' };

    for (const tier of SUMMARY_TIERS) {
      for (const candidate of await this.listBucketIds(userId, tier)) {
        if (!periodContains(groupPeriod(tier, candidate), dateKey)) continue;
        const bucket = await this.getBucket(userId, tier, candidate);
        if (bucket && periodContains(bucket.period, dateKey)) {
          return { bucket, location: 'active' };
        }
      }
    }

    for (const ref of await this.listArchived(userId)) {
      if (ref.tier === 'daily' || !periodContains(groupPeriod(ref.tier, ref.id), dateKey)) continue;
      const bucket = await this.readArchived(userId, ref.tier, ref.id);
      if (bucket && periodContains(bucket.period, dateKey)) {
        return { bucket, location: 'archived' };
      }
    }

    return null;
  }

  /**
   * Soft-trim write-back. The entry set must stay the same and protected
   * entries must keep their text.
   */
  async replaceEntries(
    userId: string,
    bucketId: string,
    entries: ConversationEntry[],
    patch: { softTrimmedAt?: number | null } = {}
  ): Promise<LogBucket> {
    await this.open(userId);
    const bucket = await this.getLogBucket(userId, bucketId);
    if (!bucket) {
      if (await this.archivedExists(userId, 'daily', bucketId)) {
        throw new StaleBucketError(bucketId);
      }
      throw new MemoryNotFoundError(`Bucket daily/${bucketId}`);
    }
    if (bucket.state.phase !== 'active') {
      throw new StaleBucketError(bucketId);
    }

    const next = new Map(entries.map((e) => [e.id, ConversationEntrySchema.parse(e)]));
    if (next.size !== bucket.entries.length || bucket.entries.some((e) => !next.has(e.id))) {
      throw new MemoryValidationError(`Entry set of bucket ${bucketId} cannot change on write-back`);
    }

    const protectedIds = await this.protectedEntryIds(userId);
    const violations = bucket.entries
      .filter((e) => protectedIds.has(e.id) && next.get(e.id)?.text !== e.text)
      .map((e) => e.id);
    if (violations.length > 0) {
      throw new ProtectionViolationError(violations, `would be altered in bucket ${bucketId}`);
    }

    bucket.entries = [...next.values()].sort((a, b) => a.timestamp - b.timestamp);
    if (patch.softTrimmedAt !== undefined) {
      bucket.state = { phase: 'active', softTrimmedAt: patch.softTrimmedAt };
    }
    bucket.updatedAt = this.clock();
    await this.writeJsonAtomic(this.bucketPath(userId, 'daily', bucketId), bucket);
    return bucket;
  }

  // ── Promotion ────────────────────────────────────────────────

  /**
   * Replace the source buckets of `fromTier` with one summary in `toTier`,
   * relocating the sources to `archive/{fromTier}/`.
   */
  async promote(
    userId: string,
    sourceIds: string[],
    fromTier: BucketTier,
    toTier: SummaryTier,
    payload: SummaryBucket
  ): Promise<SummaryBucket> {
    await this.open(userId);

    if (NEXT_TIER[fromTier] !== toTier) {
      throw new MemoryValidationError(`Cannot promote ${fromTier} buckets into ${toTier}`);
    }
    const uniqueIds = [...new Set(sourceIds)];
    if (uniqueIds.length === 0) {
      throw new MemoryValidationError('Promotion needs at least one source bucket');
    }
    const summary = SummaryBucketSchema.parse(payload);
    if (summary.tier !== toTier || summary.sourceTier !== fromTier) {
      throw new MemoryValidationError(`Summary ${summary.id} does not describe a ${fromTier} to ${toTier} promotion`);
    }
    if (
      summary.sourceBucketIds.length !== uniqueIds.length ||
      !uniqueIds.every((id) => summary.sourceBucketIds.includes(id))
    ) {
      throw new MemoryValidationError(`Summary ${summary.id} must reference exactly its source buckets`);
    }

    const sources: Bucket[] = [];
    for (const id of uniqueIds) {
      const bucket = await this.getBucket(userId, fromTier, id);
      if (!bucket) {
        if (await this.archivedExists(userId, fromTier, id)) {
          throw new StaleBucketError(id);
        }
        throw new MemoryNotFoundError(`Bucket ${fromTier}/${id}`);
      }
      if (bucket.state.phase !== 'active') {
        throw new StaleBucketError(id);
      }
      sources.push(bucket);
    }

    if (await this.exists(this.bucketPath(userId, toTier, summary.id))) {
      throw new MemoryValidationError(`Summary ${toTier}/${summary.id} already exists`);
    }

    const protectedIds = await this.protectedEntryIds(userId);
    const pinnedIds = new Set(summary.pinned.map((p) => p.entryId));
    const missing = sources
      .flatMap((b) => (b.kind === 'log' ? b.entries.map((e) => e.id) : b.pinned.map((p) => p.entryId)))
      .filter((entryId) => protectedIds.has(entryId) && !pinnedIds.has(entryId));
    if (missing.length > 0) {
      throw new ProtectionViolationError(missing, `are missing from the pinned set of ${summary.id}`);
    }

    const now = this.clock();
    const journal: PromotionJournal = {
      startedAt: now,
      fromTier,
      toTier,
      successorId: summary.id,
      sourceIds: uniqueIds,
    };

    try {
      await this.writeJsonAtomic(this.journalPath(userId), journal);
      await this.hooks.onPromotionStep?.('journal-written', journal);

      await this.writeJsonAtomic(this.bucketPath(userId, toTier, summary.id), summary);
      await this.hooks.onPromotionStep?.('successor-written', journal);

      for (const source of sources) {
        await this.writeJsonAtomic(
          this.archivePath(userId, fromTier, source.id, false),
          this.markPromoted(source, summary.id, toTier, now)
        );
      }
      await this.hooks.onPromotionStep?.('sources-archived', journal);

      for (const source of sources) {
        await this.remove(this.bucketPath(userId, fromTier, source.id));
      }
      await this.hooks.onPromotionStep?.('originals-removed', journal);

      await this.remove(this.journalPath(userId));
    } catch (error) {
      // Leave the journal for recovery on the next open
      this.opened.delete(userId);
      this.logger.error('Promotion interrupted', {
        userId,
        fromTier,
        toTier,
        successorId: summary.id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.logger.info('Promoted buckets', {
      userId,
      fromTier,
      toTier,
      successorId: summary.id,
      sources: uniqueIds.length,
    });
    return summary;
  }

  private markPromoted(bucket: Bucket, successorId: string, successorTier: SummaryTier, at: number): Bucket {
    return {
      ...bucket,
      updatedAt: at,
      state: { phase: 'promoted', promotedAt: at, successorId, successorTier },
    };
  }

  /**
   * Finish or undo an interrupted promotion. Runs automatically the first
   * time a user is opened by this store instance.
   */
  async recover(userId: string): Promise<RecoveryOutcome> {
    const journalPath = this.journalPath(userId);
    const journal = await this.readDocument(journalPath, PromotionJournalSchema);
    await this.removeTempFiles(userId);
    if (!journal) return 'clean';

    const { fromTier, toTier, successorId, sourceIds } = journal;
    const successorDurable = await this.exists(this.bucketPath(userId, toTier, successorId));

    if (successorDurable) {
      const now = this.clock();
      for (const id of sourceIds) {
        const original = await this.readDocument(this.bucketPath(userId, fromTier, id), BucketSchema);
        if (!original) continue;
        if (!(await this.exists(this.archivePath(userId, fromTier, id, false)))) {
          await this.writeJsonAtomic(
            this.archivePath(userId, fromTier, id, false),
            this.markPromoted(original, successorId, toTier, now)
          );
        }
        await this.remove(this.bucketPath(userId, fromTier, id));
      }
      await this.remove(journalPath);
      this.logger.warn('Rolled interrupted promotion forward', { userId, fromTier, toTier, successorId });
      return 'rolled-forward';
    }

    for (const id of sourceIds) {
      if (await this.exists(this.bucketPath(userId, fromTier, id))) {
        await this.remove(this.archivePath(userId, fromTier, id, false));
      } else {
        this.logger.error('Source bucket missing during promotion rollback', { userId, tier: fromTier, bucketId: id });
      }
    }
    await this.remove(journalPath);
    this.logger.warn('Rolled interrupted promotion back', { userId, fromTier, toTier, successorId });
    return 'rolled-back';
  }

  private async removeTempFiles(userId: string): Promise<void> {
    const root = this.userDir(userId);
    const dirs = [
      root,
      ...BUCKET_TIERS.map((t) => join(root, t)),
      ...BUCKET_TIERS.map((t) => join(root, 'archive', t)),
      join(root, 'protected'),
      join(root, 'snapshots'),
    ];
    for (const dir of dirs) {
      for (const name of await this.listFiles(dir)) {
        if (name.endsWith('.tmp')) {
          await this.remove(join(dir, name));
        }
      }
    }
  }

  // ── Archive compression ──────────────────────────────────────

  /**
   * Gzip an archived bucket in place. Returns false when it is already
   * compressed.
   */
  async compressArchived(userId: string, tier: BucketTier, id: string): Promise<boolean> {
    await this.open(userId);
    const source = this.archivePath(userId, tier, id, false);
    const target = this.archivePath(userId, tier, id, true);

    if (!(await this.exists(source))) {
      if (await this.exists(target)) return false;
      throw new MemoryNotFoundError(`Archived bucket ${tier}/${id}`);
    }

    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await pipeline(createReadStream(source), createGzip(), createWriteStream(tmp));
      await rename(tmp, target);
    } catch (error) {
      await this.remove(tmp);
      throw new StorageError('compress', source, error);
    }
    await this.remove(source);
    return true;
  }

  // ── Sizes ────────────────────────────────────────────────────

  async tierSizes(userId: string): Promise<Record<Tier, TierStats>> {
    await this.open(userId);
    const sizes: Record<Tier, TierStats> = {
      daily: { buckets: 0, bytes: 0 },
      weekly: { buckets: 0, bytes: 0 },
      monthly: { buckets: 0, bytes: 0 },
      yearly: { buckets: 0, bytes: 0 },
      archive: { buckets: 0, bytes: 0 },
    };

    for (const tier of BUCKET_TIERS) {
      for (const id of await this.listBucketIds(userId, tier)) {
        const path = this.bucketPath(userId, tier, id);
        try {
          const info = await stat(path);
          sizes[tier].buckets++;
          sizes[tier].bytes += info.size;
        } catch (error) {
          // Promoted between listing and stat
          if (!isErrno(error, 'ENOENT')) throw new StorageError('stat', path, error);
        }
      }
    }
    for (const ref of await this.listArchived(userId)) {
      sizes.archive.buckets++;
      sizes.archive.bytes += ref.bytes;
    }
    return sizes;
  }

  async bucketBytes(userId: string, tier: BucketTier, id: string): Promise<number> {
    const path = this.bucketPath(userId, tier, id);
    try {
      return (await stat(path)).size;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return 0;
      throw new StorageError('stat', path, error);
    }
  }

  // ── Index & snapshots ────────────────────────────────────────

  async readIndex(userId: string): Promise<MemoryIndex | null> {
    await this.open(userId);
    return this.readDocument(this.indexPath(userId), MemoryIndexSchema);
  }

  async writeIndex(userId: string, index: MemoryIndex): Promise<void> {
    await this.writeJsonAtomic(this.indexPath(userId), MemoryIndexSchema.parse(index));
  }

  /**
   * Keep a copy of the given index generation, pruning to `retention`
   * newest snapshots.
   */
  async snapshotIndex(userId: string, index: MemoryIndex, retention: number): Promise<void> {
    const dir = this.snapshotsDir(userId);
    await this.writeJsonAtomic(join(dir, `index-${index.generation}.json`), index);

    const snapshots = await this.listSnapshots(userId);
    for (const old of snapshots.slice(retention)) {
      await this.remove(join(dir, `index-${old.generation}.json`));
    }
  }

  /** Snapshots, newest generation first. */
  async listSnapshots(userId: string): Promise<SnapshotInfo[]> {
    await this.open(userId);
    const dir = this.snapshotsDir(userId);
    const out: SnapshotInfo[] = [];
    for (const name of await this.listFiles(dir)) {
      const match = SNAPSHOT_RE.exec(name);
      if (!match) continue;
      const snapshot = await this.readDocument(join(dir, name), MemoryIndexSchema);
      if (!snapshot) continue;
      const info = await stat(join(dir, name)).catch((error: unknown) => {
        throw new StorageError('stat', join(dir, name), error);
      });
      out.push({ generation: Number(match[1]), updatedAt: snapshot.updatedAt, bytes: info.size });
    }
    return out.sort((a, b) => b.generation - a.generation);
  }

  async readSnapshot(userId: string, generation: number): Promise<MemoryIndex | null> {
    await this.open(userId);
    return this.readDocument(join(this.snapshotsDir(userId), `index-${generation}.json`), MemoryIndexSchema);
  }

  // ── Protected preferences ────────────────────────────────────

  async readPreferences(userId: string): Promise<PreferencesDocument> {
    await this.open(userId);
    return (
      (await this.readDocument(this.preferencesPath(userId), PreferencesDocumentSchema)) ?? {
        userId,
        updatedAt: 0,
        facts: [],
      }
    );
  }

  async writePreferences(userId: string, doc: PreferencesDocument): Promise<void> {
    await this.writeJsonAtomic(this.preferencesPath(userId), PreferencesDocumentSchema.parse(doc));
  }

  async protectedEntryIds(userId: string): Promise<Set<string>> {
    const prefs = await this.readPreferences(userId);
    return new Set(prefs.facts.map((f) => f.entryId));
  }
}
