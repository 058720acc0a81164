import { describe, it, expect, vi } from 'vitest';
import { MemoryConfigSchema } from '@tiermind/shared';
import {
  ImportanceScorer,
  buildScoringHistory,
  countMarkerHits,
  retentionStrategy,
  type ScoringHistory,
} from './importance-scorer.js';
import { DAY_MS } from './calendar.js';
import { OracleMalformedResponseError } from './errors.js';
import type { ScoringOracle, ScoringOracleOutput } from './oracles.js';
import { makeEntry } from './test-fixtures.js';

const NOW = Date.parse('2026-01-20T12:00:00Z');
const config = MemoryConfigSchema.parse({}).scoring;

function daysAgo(days: number): string {
  return new Date(NOW - days * DAY_MS).toISOString();
}

function oracleReturning(output: ScoringOracleOutput) {
  const score = vi.fn(async () => output);
  const oracle: ScoringOracle = { score };
  return { oracle, score };
}

const emptyHistory: ScoringHistory = { now: NOW, topicCounts: new Map() };
const projectEntry = makeEntry('p1', daysAgo(10), "I'm working on the garden project");

describe('ImportanceScorer', () => {
  describe('rules', () => {
    it('combines frequency, recency, explicit and relevance points', async () => {
      const scorer = new ImportanceScorer({ config });
      const entry = makeEntry('e1', daysAgo(1), 'I prefer window seats, remember this');
      const history: ScoringHistory = { now: NOW, topicCounts: new Map([['seats', 4]]) };

      const score = await scorer.score(entry, history);

      expect(score).toEqual({
        frequency: 2,
        recency: 2,
        explicit: 1,
        relevance: 3,
        total: 8,
        source: 'rules',
        reasoning: 'rule-based score',
        scoredAt: NOW,
      });
      expect(retentionStrategy(score.total)).toBe('pin-to-index');
    });

    it('scores temporary facts zero without asking the oracle', async () => {
      const { oracle, score } = oracleReturning({
        frequencyPoints: 3,
        recencyPoints: 2,
        explicitPoints: 2,
        relevancePoints: 3,
        reasoning: '',
      });
      const scorer = new ImportanceScorer({ config, oracle });

      const result = await scorer.score(makeEntry('w', daysAgo(0), "What's the weather in Lisbon?"), emptyHistory);

      expect(result.total).toBe(0);
      expect(result.reasoning).toBe('temporary fact');
      expect(score).not.toHaveBeenCalled();
    });

    it('counts distinct explicit markers, including curly apostrophes', () => {
      expect(countMarkerHits("Decision: this is important, don't forget", config.explicitMarkers)).toBe(3);
      expect(countMarkerHits('don’t forget the keys', config.explicitMarkers)).toBe(1);
      expect(countMarkerHits('nothing to see', config.explicitMarkers)).toBe(0);
    });
  });

  describe('oracle', () => {
    it('clamps oracle values into the band around the rule value', async () => {
      const { oracle } = oracleReturning({
        frequencyPoints: 3,
        recencyPoints: 0,
        explicitPoints: 2,
        relevancePoints: 3,
        reasoning: 'ongoing project',
      });
      const scorer = new ImportanceScorer({ config, oracle });

      const result = await scorer.score(projectEntry, emptyHistory);

      expect(result).toMatchObject({
        frequency: 1,
        recency: 1,
        explicit: 1,
        relevance: 3,
        total: 6,
        source: 'oracle',
        reasoning: 'ongoing project',
      });
    });

    it('keeps two disagreeing oracle runs within one point per dimension', async () => {
      const high = new ImportanceScorer({
        config,
        oracle: oracleReturning({ frequencyPoints: 3, recencyPoints: 2, explicitPoints: 2, relevancePoints: 3, reasoning: '' }).oracle,
      });
      const low = new ImportanceScorer({
        config,
        oracle: oracleReturning({ frequencyPoints: 0, recencyPoints: 0, explicitPoints: 0, relevancePoints: 0, reasoning: '' }).oracle,
      });

      const a = await high.score(projectEntry, emptyHistory);
      const b = await low.score(projectEntry, emptyHistory);

      for (const d of ['frequency', 'recency', 'explicit', 'relevance'] as const) {
        expect(Math.abs(a[d] - b[d])).toBeLessThanOrEqual(1);
      }
    });

    it('falls back to frequency and recency when the oracle is out of range', async () => {
      const { oracle } = oracleReturning({
        frequencyPoints: 7,
        recencyPoints: 1,
        explicitPoints: 0,
        relevancePoints: 2,
        reasoning: '',
      });
      const result = await new ImportanceScorer({ config, oracle }).score(projectEntry, emptyHistory);

      expect(result).toMatchObject({
        frequency: 0,
        recency: 1,
        explicit: 0,
        relevance: 0,
        total: 1,
        source: 'rules',
        reasoning: 'oracle out of range: frequency',
      });
    });

    it('falls back when the oracle reply is malformed', async () => {
      const oracle: ScoringOracle = {
        score: vi.fn(async () => {
          throw new OracleMalformedResponseError('scoring', 'no JSON object in reply');
        }),
      };
      const result = await new ImportanceScorer({ config, oracle }).score(projectEntry, emptyHistory);

      expect(result.source).toBe('rules');
      expect(result.total).toBe(1);
      expect(result.reasoning).toBe(
        'oracle failed: scoring oracle returned a malformed response: no JSON object in reply'
      );
    });

    it('falls back when the oracle times out', async () => {
      const oracle: ScoringOracle = { score: () => new Promise<ScoringOracleOutput>(() => undefined) };
      const scorer = new ImportanceScorer({ config: { ...config, oracleTimeoutMs: 10 }, oracle });

      const result = await scorer.score(projectEntry, emptyHistory);
      expect(result.reasoning).toBe('oracle failed: scoring oracle timed out after 10ms');
    });

    it('propagates an abort from the caller', async () => {
      const { oracle } = oracleReturning({
        frequencyPoints: 0,
        recencyPoints: 0,
        explicitPoints: 0,
        relevancePoints: 0,
        reasoning: '',
      });
      const controller = new AbortController();
      controller.abort(new Error('shutting down'));

      await expect(
        new ImportanceScorer({ config, oracle }).score(projectEntry, emptyHistory, controller.signal)
      ).rejects.toThrow('shutting down');
    });
  });

  it('scores only entries without a score', async () => {
    const scorer = new ImportanceScorer({ config });
    const first = await scorer.score(projectEntry, emptyHistory);
    const already = { ...projectEntry, importance: first };
    const fresh = makeEntry('n', daysAgo(0), 'hello there');

    const result = await scorer.scoreEntries([already, fresh], emptyHistory);

    expect(result.scored).toBe(1);
    expect(result.entries[0]).toBe(already);
    expect(result.entries[1]?.importance?.source).toBe('rules');
  });
});

describe('buildScoringHistory', () => {
  it('counts topics only inside the rolling window', () => {
    const history = buildScoringHistory(
      [
        makeEntry('a', daysAgo(1), 'garden tomatoes'),
        makeEntry('b', daysAgo(5), 'garden fence'),
        makeEntry('c', daysAgo(40), 'garden shed'),
      ],
      NOW,
      30
    );

    expect(history.topicCounts.get('garden')).toBe(2);
    expect(history.topicCounts.get('fence')).toBe(1);
    expect(history.topicCounts.get('shed')).toBeUndefined();
  });
});

describe('retentionStrategy', () => {
  it('maps totals to strategies at the boundaries', () => {
    expect(retentionStrategy(10)).toBe('pin-to-index');
    expect(retentionStrategy(8)).toBe('pin-to-index');
    expect(retentionStrategy(7)).toBe('keep-in-summaries');
    expect(retentionStrategy(5)).toBe('keep-in-summaries');
    expect(retentionStrategy(4)).toBe('archive-after-week');
    expect(retentionStrategy(2)).toBe('archive-after-week');
    expect(retentionStrategy(1)).toBe('trim-after-day');
    expect(retentionStrategy(0)).toBe('trim-after-day');
  });
});
