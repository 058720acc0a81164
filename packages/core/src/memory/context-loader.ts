/**
 * ContextLoader — assembles the token-bounded memory context for a request.
 *
 * The index overview, the protected facts and the most recent daily
 * buckets are always included. Extra tiers come either from direct date
 * lookup (when the query names a day) or from the ranking oracle, and are
 * added newest first while they fit the budget.
 */

import type { Bucket, IndexBucketEntry, MemoryConfig } from '@tiermind/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { DAY_MS, isValidDateKey, toDateKey } from './calendar.js';
import { OracleMalformedResponseError } from './errors.js';
import type { MemoryIndexService } from './memory-index.js';
import { withTimeout, type RankingCandidate, type RankingOracle } from './oracles.js';
import { renderBucket, renderIndex, renderProtectedFacts } from './render.js';
import type { TieredStore } from './tiered-store.js';
import { countTokens } from './token-counter.js';
import { topicsOf } from './topics.js';
import type { Clock, ContextBucket, LoadedContext, OmittedBucket } from './types.js';

export const EXTENDED_HISTORY_UNAVAILABLE =
  'Extended history is unavailable right now; answering from recent memory only.';

export interface ContextLoaderDeps {
  store: TieredStore;
  index: MemoryIndexService;
  config: MemoryConfig['context'];
  contextWindowTokens: number;
  oracle?: RankingOracle;
  logger?: SecureLogger;
  clock?: Clock;
}

interface Selection {
  bucketId: string;
  tier: IndexBucketEntry['tier'];
  justification: string;
}

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];
const MONTH_ALT = MONTHS.join('|');

const ISO_RE = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
const DOTTED_RE = /\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/g;
const MONTH_DAY_RE = new RegExp(`\\b(${MONTH_ALT})\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s+(\\d{4}))?\\b`, 'gi');
const DAY_MONTH_RE = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?(${MONTH_ALT})(?:,?\\s+(\\d{4}))?\\b`, 'gi');
const DAYS_AGO_RE = /\b(\d{1,3})\s+days?\s+ago\b/gi;
const DAY_BEFORE_YESTERDAY_RE = /\bday before yesterday\b/gi;
const YESTERDAY_RE = /\byesterday\b/gi;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function dateKeyOf(year: number, month: number, day: number): string | null {
  const key = `${String(year).padStart(4, '0')}-${pad(month)}-${pad(day)}`;
  return isValidDateKey(key) ? key : null;
}

/** A month/day without a year means its most recent occurrence. */
function recentOccurrence(month: number, day: number, year: string | undefined, today: string): string | null {
  if (year) return dateKeyOf(Number(year), month, day);
  const current = Number(today.slice(0, 4));
  const key = dateKeyOf(current, month, day);
  if (key && key <= today) return key;
  return dateKeyOf(current - 1, month, day);
}

/**
 * Calendar days a query refers to, as `YYYY-MM-DD` keys in order of
 * appearance. Relative forms resolve against `now` in UTC.
 */
export function parseDateReferences(query: string, now: number): string[] {
  const today = toDateKey(now);
  const found: Array<{ at: number; key: string }> = [];
  const add = (at: number, key: string | null) => {
    if (key) found.push({ at, key });
  };

  for (const m of query.matchAll(ISO_RE)) {
    add(m.index ?? 0, dateKeyOf(Number(m[1]), Number(m[2]), Number(m[3])));
  }
  for (const m of query.matchAll(DOTTED_RE)) {
    add(m.index ?? 0, dateKeyOf(Number(m[3]), Number(m[2]), Number(m[1])));
  }
  for (const m of query.matchAll(MONTH_DAY_RE)) {
    add(m.index ?? 0, recentOccurrence(MONTHS.indexOf((m[1] ?? '').toLowerCase()) + 1, Number(m[2]), m[3], today));
  }
  for (const m of query.matchAll(DAY_MONTH_RE)) {
    add(m.index ?? 0, recentOccurrence(MONTHS.indexOf((m[2] ?? '').toLowerCase()) + 1, Number(m[1]), m[3], today));
  }
  for (const m of query.matchAll(DAYS_AGO_RE)) {
    add(m.index ?? 0, toDateKey(now - Number(m[1]) * DAY_MS));
  }
  const relative = query.replace(DAY_BEFORE_YESTERDAY_RE, (match, offset: number) => {
    add(offset, toDateKey(now - 2 * DAY_MS));
    return ' '.repeat(match.length);
  });
  for (const m of relative.matchAll(YESTERDAY_RE)) {
    add(m.index ?? 0, toDateKey(now - DAY_MS));
  }

  return [...new Set(found.sort((a, b) => a.at - b.at).map((f) => f.key))];
}

function toContextBucket(bucket: Bucket, source: ContextBucket['source'], justification?: string): ContextBucket {
  const text = renderBucket(bucket);
  return {
    bucketId: bucket.id,
    tier: bucket.tier,
    period: bucket.period,
    source,
    text,
    tokens: countTokens(text),
    justification,
  };
}

export class ContextLoader {
  private readonly store: TieredStore;
  private readonly indexService: MemoryIndexService;
  private readonly config: MemoryConfig['context'];
  private readonly budgetTokens: number;
  private readonly oracle: RankingOracle | undefined;
  private readonly logger: SecureLogger;
  private readonly clock: Clock;

  constructor(deps: ContextLoaderDeps) {
    this.store = deps.store;
    this.indexService = deps.index;
    this.config = deps.config;
    this.budgetTokens = Math.floor(deps.contextWindowTokens * deps.config.budgetFraction);
    this.oracle = deps.oracle;
    this.logger = deps.logger ?? createNoopLogger();
    this.clock = deps.clock ?? Date.now;
  }

  async loadContext(userId: string, query: string): Promise<LoadedContext> {
    const now = this.clock();
    const index = await this.indexService.ensure(userId);
    const prefs = await this.store.readPreferences(userId);

    const context: LoadedContext = {
      userId,
      query,
      index,
      protectedEntries: prefs.facts,
      standardTiers: [],
      extraTiers: [],
      totalTokens: countTokens(renderIndex(index)) + countTokens(renderProtectedFacts(prefs.facts)),
      budgetTokens: this.budgetTokens,
      degraded: false,
      notes: [],
      omitted: [],
      dateReferences: parseDateReferences(query, now),
    };

    const dailyIds = await this.store.listBucketIds(userId, 'daily');
    const recentIds = this.config.recentDays > 0 ? dailyIds.slice(-this.config.recentDays) : [];
    for (const id of recentIds) {
      const bucket = await this.store.getBucket(userId, 'daily', id);
      if (!bucket) continue;
      const item = toContextBucket(bucket, 'active');
      context.standardTiers.push(item);
      context.totalTokens += item.tokens;
    }
    const included = new Set(context.standardTiers.map((b) => `${b.tier}/${b.bucketId}`));

    if (context.dateReferences.length > 0) {
      await this.addDateLookups(userId, context, included);
    } else if (query.trim().length > this.config.minQueryLength) {
      const selections = await this.select(userId, query, index, included, context);
      await this.addSelections(userId, selections, context);
    }

    this.logger.debug('Loaded memory context', {
      userId,
      standard: context.standardTiers.length,
      extra: context.extraTiers.length,
      omitted: context.omitted.length,
      totalTokens: context.totalTokens,
      degraded: context.degraded,
    });
    return context;
  }

  /**
   * Adds items newest first until the next one would exceed the budget.
   * Loading stops there; that item and every older one are omitted.
   */
  private addWithinBudget(context: LoadedContext, items: ContextBucket[]): void {
    const ordered = [...items].sort((a, b) => b.period.end.localeCompare(a.period.end));
    for (const [position, item] of ordered.entries()) {
      if (context.totalTokens + item.tokens > this.budgetTokens) {
        const dropped = ordered.slice(position);
        for (const skipped of dropped) {
          context.omitted.push({ bucketId: skipped.bucketId, tier: skipped.tier, tokens: skipped.tokens, reason: 'budget' });
        }
        this.logger.info('Context loading stopped at the token budget', {
          userId: context.userId,
          omitted: dropped.map((skipped) => `${skipped.tier}/${skipped.bucketId}`),
          totalTokens: context.totalTokens,
          budget: this.budgetTokens,
        });
        return;
      }
      context.extraTiers.push(item);
      context.totalTokens += item.tokens;
    }
  }

  private async addDateLookups(userId: string, context: LoadedContext, included: Set<string>): Promise<void> {
    const items: ContextBucket[] = [];
    for (const key of context.dateReferences) {
      const covering = await this.store.findBucketCovering(userId, key);
      if (!covering) {
        context.notes.push(`No stored conversation covers ${key}.`);
        continue;
      }
      const ref = `${covering.bucket.tier}/${covering.bucket.id}`;
      if (included.has(ref)) continue;
      included.add(ref);
      items.push(toContextBucket(covering.bucket, covering.location, `date reference ${key}`));
    }
    this.addWithinBudget(context, items);
  }

  private candidatesOf(index: LoadedContext['index'], included: Set<string>): IndexBucketEntry[] {
    const limits = this.config.maxCandidates;
    return (['daily', 'weekly', 'monthly', 'yearly'] as const).flatMap((tier) =>
      index.tiers[tier]
        .filter((e) => !included.has(`${tier}/${e.id}`))
        .sort((a, b) => b.period.end.localeCompare(a.period.end))
        .slice(0, limits[tier])
    );
  }

  private async select(
    userId: string,
    query: string,
    index: LoadedContext['index'],
    included: Set<string>,
    context: LoadedContext
  ): Promise<Selection[]> {
    const candidates = this.candidatesOf(index, included);
    if (candidates.length === 0) return [];

    const oracle = this.oracle;
    if (!oracle) return this.rankLocally(query, candidates);

    const input = {
      query,
      candidates: candidates.map(
        (c): RankingCandidate => ({
          bucketId: c.id,
          tier: c.tier,
          period: c.period,
          themes: c.themes,
          entryCount: c.entryCount,
        })
      ),
    };
    try {
      const output = await withTimeout('ranking', this.config.rankingTimeoutMs, (signal) => oracle.rank(input, signal));
      const byId = new Map(candidates.map((c) => [c.id, c]));
      const selections: Selection[] = [];
      for (const pick of output.selected) {
        const candidate = byId.get(pick.bucketId);
        if (!candidate) {
          this.logger.debug('Ranking oracle picked an unknown bucket', { userId, bucketId: pick.bucketId });
          continue;
        }
        byId.delete(pick.bucketId);
        selections.push({ bucketId: candidate.id, tier: candidate.tier, justification: pick.justification });
      }
      return selections;
    } catch (error) {
      if (error instanceof OracleMalformedResponseError) {
        this.logger.warn('Ranking oracle reply unusable, ranking locally', { userId, error: error.message });
        return this.rankLocally(query, candidates);
      }
      context.degraded = true;
      context.notes.push(EXTENDED_HISTORY_UNAVAILABLE);
      this.logger.warn('Ranking oracle unavailable, using recent memory only', {
        userId,
        error: toErrorMessage(error),
      });
      return [];
    }
  }

  /** Theme overlap with the query's topics; ties go to the newer bucket. */
  rankLocally(query: string, candidates: readonly IndexBucketEntry[]): Selection[] {
    const wanted = new Set(topicsOf(query));
    return candidates
      .map((c) => ({ c, hits: c.themes.filter((t) => wanted.has(t.toLowerCase())) }))
      .filter((r) => r.hits.length > 0)
      .sort((a, b) => b.hits.length - a.hits.length || b.c.period.end.localeCompare(a.c.period.end))
      .map((r) => ({ bucketId: r.c.id, tier: r.c.tier, justification: `matches: ${r.hits.join(', ')}` }));
  }

  private async addSelections(userId: string, selections: Selection[], context: LoadedContext): Promise<void> {
    const items: ContextBucket[] = [];
    for (const pick of selections) {
      const bucket = await this.store.getBucket(userId, pick.tier, pick.bucketId);
      if (!bucket) {
        const missing: OmittedBucket = { bucketId: pick.bucketId, tier: pick.tier, tokens: 0, reason: 'unavailable' };
        context.omitted.push(missing);
        this.logger.info('Selected bucket is no longer active', { userId, bucketId: pick.bucketId, tier: pick.tier });
        continue;
      }
      items.push(toContextBucket(bucket, 'active', pick.justification));
    }
    this.addWithinBudget(context, items);
  }
}

/** Prompt block for a loaded context. */
export function formatContext(context: LoadedContext): string {
  const parts = [renderIndex(context.index)];
  const facts = renderProtectedFacts(context.protectedEntries);
  if (facts) parts.push(facts);
  if (context.standardTiers.length > 0) {
    parts.push(['## Recent conversations', ...context.standardTiers.map((b) => b.text)].join('\n\n'));
  }
  if (context.extraTiers.length > 0) {
    parts.push(['## Earlier history', ...context.extraTiers.map((b) => b.text)].join('\n\n'));
  }
  for (const note of context.notes) {
    parts.push(`Note: ${note}`);
  }
  return parts.join('\n\n');
}
