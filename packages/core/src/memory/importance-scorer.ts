/**
 * Importance Scorer
 *
 * Produces a 0–10 score from four signals: topic frequency (0–3), recency
 * (0–2), explicit markers (0–2) and relevance (0–3). Rules compute every
 * signal deterministically; an optional scoring oracle may refine them.
 *
 * Oracle values are accepted only inside a two-point band anchored on the
 * rule value for the same dimension, which bounds the spread between two
 * runs to one point per dimension. Malformed, out-of-range or failed oracle
 * calls fall back to frequency and recency from the rules with explicit and
 * relevance at zero.
 */

import type { ConversationEntry, ImportanceScore, MemoryConfig } from '@tiermind/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { DAY_MS, ageInDays } from './calendar.js';
import { withTimeout, type ScoringOracle, type ScoringOracleOutput } from './oracles.js';
import { countTopics, topicsOf } from './topics.js';
import type { RetentionStrategy } from './types.js';

const PREFERENCE_PATTERNS = [
  /\bi prefer\b/,
  /\bi (?:really )?like\b/,
  /\bi love\b/,
  /\bi hate\b/,
  /\bi don'?t like\b/,
  /\bi dislike\b/,
  /\bmy favou?rite\b/,
  /\ballergic\b/,
  /\bnot interested in\b/,
];

const PROJECT_PATTERNS = [
  /\bproject\b/,
  /\bgoals?\b/,
  /\bplan(?:ning)? to\b/,
  /\bi want to\b/,
  /\bi'?m working on\b/,
  /\bdeadline\b/,
  /\bmilestone\b/,
];

const FIRST_PERSON = /\b(?:i|my|me|mine)\b/;

const MAX = { frequency: 3, recency: 2, explicit: 2, relevance: 3 } as const;

type Dimension = keyof typeof MAX;

const DIMENSIONS: readonly Dimension[] = ['frequency', 'recency', 'explicit', 'relevance'];

export interface ScoringHistory {
  now: number;
  /** Document frequency of each topic over the rolling topic window. */
  topicCounts: ReadonlyMap<string, number>;
}

export interface RuleSignals {
  topicFrequencyCount: number;
  ageInDays: number;
  explicitMarkerHits: number;
  temporary: boolean;
}

export type RulePoints = Record<Dimension, number>;

export interface ImportanceScorerDeps {
  config: MemoryConfig['scoring'];
  oracle?: ScoringOracle;
  logger?: SecureLogger;
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function markerPatterns(markers: readonly string[]): RegExp[] {
  return markers.map((m) => new RegExp(`\\b${escapeRegExp(normalize(m))}`));
}

/** Number of distinct markers present in the text. */
export function countMarkerHits(text: string, markers: readonly string[]): number {
  const normalized = normalize(text);
  return markerPatterns(markers).filter((re) => re.test(normalized)).length;
}

export function frequencyPoints(count: number): number {
  if (count >= 10) return 3;
  if (count >= 4) return 2;
  if (count >= 2) return 1;
  return 0;
}

export function recencyPoints(days: number): number {
  if (days <= 7) return 2;
  if (days <= 30) return 1;
  return 0;
}

export function explicitPoints(hits: number): number {
  if (hits >= 2) return 2;
  return hits === 1 ? 1 : 0;
}

export function relevancePoints(text: string): number {
  const normalized = normalize(text);
  if (PREFERENCE_PATTERNS.some((re) => re.test(normalized))) return 3;
  if (PROJECT_PATTERNS.some((re) => re.test(normalized))) return 2;
  if (FIRST_PERSON.test(normalized)) return 1;
  return 0;
}

export function retentionStrategy(total: number): RetentionStrategy {
  if (total >= 8) return 'pin-to-index';
  if (total >= 5) return 'keep-in-summaries';
  if (total >= 2) return 'archive-after-week';
  return 'trim-after-day';
}

/**
 * Topic document frequencies over the entries that fall inside the rolling
 * window ending at `now`.
 */
export function buildScoringHistory(
  entries: Iterable<ConversationEntry>,
  now: number,
  topicWindowDays: number
): ScoringHistory {
  const since = now - topicWindowDays * DAY_MS;
  const texts: string[] = [];
  for (const entry of entries) {
    if (entry.timestamp >= since && entry.timestamp <= now) {
      texts.push(entry.text);
    }
  }
  return { now, topicCounts: countTopics(texts) };
}

function band(rule: number, max: number): { lower: number; upper: number } {
  const lower = Math.min(rule, max - 1);
  return { lower, upper: lower + 1 };
}

function total(points: RulePoints): number {
  return points.frequency + points.recency + points.explicit + points.relevance;
}

export class ImportanceScorer {
  private readonly config: MemoryConfig['scoring'];
  private readonly oracle: ScoringOracle | undefined;
  private readonly logger: SecureLogger;
  private readonly explicitMarkers: string[];
  private readonly temporaryPatterns: RegExp[];

  constructor(deps: ImportanceScorerDeps) {
    this.config = deps.config;
    this.oracle = deps.oracle;
    this.logger = deps.logger ?? createNoopLogger();
    this.explicitMarkers = deps.config.explicitMarkers;
    this.temporaryPatterns = markerPatterns(deps.config.temporaryMarkers);
  }

  isTemporary(text: string): boolean {
    const normalized = normalize(text);
    return this.temporaryPatterns.some((re) => re.test(normalized));
  }

  signals(entry: ConversationEntry, history: ScoringHistory): RuleSignals {
    const topicFrequencyCount = topicsOf(entry.text).reduce(
      (max, topic) => Math.max(max, history.topicCounts.get(topic) ?? 0),
      0
    );
    return {
      topicFrequencyCount,
      ageInDays: ageInDays(entry.timestamp, history.now),
      explicitMarkerHits: countMarkerHits(entry.text, this.explicitMarkers),
      temporary: this.isTemporary(entry.text),
    };
  }

  rulePoints(entry: ConversationEntry, signals: RuleSignals): RulePoints {
    return {
      frequency: frequencyPoints(signals.topicFrequencyCount),
      recency: recencyPoints(signals.ageInDays),
      explicit: explicitPoints(signals.explicitMarkerHits),
      relevance: relevancePoints(entry.text),
    };
  }

  async score(entry: ConversationEntry, history: ScoringHistory, signal?: AbortSignal): Promise<ImportanceScore> {
    const signals = this.signals(entry, history);

    if (signals.temporary) {
      return this.build({ frequency: 0, recency: 0, explicit: 0, relevance: 0 }, 'rules', 'temporary fact', history.now);
    }

    const rules = this.rulePoints(entry, signals);
    if (!this.oracle) {
      return this.build(rules, 'rules', 'rule-based score', history.now);
    }

    const oracle = this.oracle;
    let output: ScoringOracleOutput;
    try {
      output = await withTimeout(
        'scoring',
        this.config.oracleTimeoutMs,
        (s) =>
          oracle.score(
            {
              snippet: entry.text,
              topicFrequencyCount: signals.topicFrequencyCount,
              ageInDays: signals.ageInDays,
              explicitMarkerHits: signals.explicitMarkerHits,
            },
            s
          ),
        signal
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn('Scoring oracle failed, using rule fallback', {
        entryId: entry.id,
        error: toErrorMessage(error),
      });
      return this.fallback(rules, `oracle failed: ${toErrorMessage(error)}`, history.now);
    }

    const proposed: RulePoints = {
      frequency: output.frequencyPoints,
      recency: output.recencyPoints,
      explicit: output.explicitPoints,
      relevance: output.relevancePoints,
    };
    const outOfRange = DIMENSIONS.filter(
      (d) => !Number.isInteger(proposed[d]) || proposed[d] < 0 || proposed[d] > MAX[d]
    );
    if (outOfRange.length > 0) {
      this.logger.warn('Scoring oracle returned out-of-range values, using rule fallback', {
        entryId: entry.id,
        dimensions: outOfRange,
      });
      return this.fallback(rules, `oracle out of range: ${outOfRange.join(', ')}`, history.now);
    }

    const clamped = { ...proposed };
    for (const d of DIMENSIONS) {
      const { lower, upper } = band(rules[d], MAX[d]);
      clamped[d] = Math.min(upper, Math.max(lower, proposed[d]));
    }
    return this.build(clamped, 'oracle', output.reasoning, history.now);
  }

  /**
   * Score every entry that has no score yet. Returns the updated list and
   * the number of entries scored.
   */
  async scoreEntries(
    entries: readonly ConversationEntry[],
    history: ScoringHistory,
    signal?: AbortSignal
  ): Promise<{ entries: ConversationEntry[]; scored: number }> {
    const out: ConversationEntry[] = [];
    let scored = 0;
    for (const entry of entries) {
      if (entry.importance) {
        out.push(entry);
        continue;
      }
      signal?.throwIfAborted();
      out.push({ ...entry, importance: await this.score(entry, history, signal) });
      scored++;
    }
    return { entries: out, scored };
  }

  private fallback(rules: RulePoints, reasoning: string, now: number): ImportanceScore {
    return this.build({ frequency: rules.frequency, recency: rules.recency, explicit: 0, relevance: 0 }, 'rules', reasoning, now);
  }

  private build(points: RulePoints, source: ImportanceScore['source'], reasoning: string, now: number): ImportanceScore {
    return {
      ...points,
      total: total(points),
      source,
      reasoning: reasoning.slice(0, 2000),
      scoredAt: now,
    };
  }
}
