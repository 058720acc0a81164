import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryConfigSchema, type ConversationEntry, type LogBucket } from '@tiermind/shared';
import { Summarizer, allocateSummaryId, describeEntry } from './summarizer.js';
import { TieredStore } from './tiered-store.js';
import { MemoryValidationError, OracleTimeoutError, StaleBucketError } from './errors.js';
import type { SummarizationOracle, SummarizationOracleOutput } from './oracles.js';
import { makeEntry, makeLogBucket, makePinned, makeScore, makeSummary, makeTempDir } from './test-fixtures.js';

const NOW = Date.parse('2026-01-20T12:00:00Z');
const memory = MemoryConfigSchema.parse({});

function scored(id: string, at: string, text: string, total: number): ConversationEntry {
  return makeEntry(id, at, text, 'user', { importance: makeScore(total) });
}

describe('Summarizer', () => {
  let dir: { path: string; cleanup: () => void };
  let store: TieredStore;

  beforeEach(() => {
    dir = makeTempDir('summarizer-');
    store = new TieredStore(dir.path, { clock: () => NOW });
  });

  afterEach(() => {
    dir.cleanup();
  });

  function summarizer(oracle?: SummarizationOracle): Summarizer {
    return new Summarizer({ config: memory.summarizer, protection: memory.protection, store, oracle });
  }

  describe('softTrim', () => {
    const texts = [
      'Chatted about lunch options at length',
      'Asked for a synonym of happy',
      'Said the meeting room was cold',
      'Random small talk about socks',
      'Reviewed the quarterly budget draft',
      'Booked flights to Lisbon for March',
      'Allergic to penicillin',
      'Joked about the office plant',
      'Asked what time it was in Tokyo',
      'Outlined the migration plan',
    ];
    const scores = [0, 1, 1, 0, 2, 5, 8, 0, 1, 3];

    function tenEntryBucket(): LogBucket {
      return makeLogBucket(
        '2026-01-05',
        texts.map((text, i) => scored(`e${i}`, `2026-01-05T${String(8 + i).padStart(2, '0')}:00:00Z`, text, scores[i] ?? 0))
      );
    }

    it('collapses low-scoring entries outside the window and spares protected ones', () => {
      const result = summarizer().softTrim(tenEntryBucket(), NOW, new Set(['e2']));

      expect(result.trimmed).toBe(5);
      expect(result.complete).toBe(true);
      expect(result.entries.filter((e) => e.trimmed).map((e) => e.id)).toEqual(['e0', 'e1', 'e3', 'e7', 'e8']);
      expect(result.entries[0]).toMatchObject({
        text: 'User: Chatted about lunch options at length',
        trimmed: true,
        originalLength: 37,
      });
      expect(result.entries[2]?.text).toBe('Said the meeting room was cold');
      expect(result.entries[5]?.text).toBe('Booked flights to Lisbon for March');
    });

    it('collapses eight low-value entries and keeps two high-value ones verbatim', () => {
      const low = [0, 1, 0, 1, 0, 1, 0, 1].map((total, i) =>
        scored(`low${i}`, `2026-01-05T${String(8 + i).padStart(2, '0')}:00:00Z`, `Filler remark number ${i}`, total)
      );
      const high = [
        scored('keep1', '2026-01-05T17:00:00Z', 'Signed the lease for the new studio', 6),
        scored('keep2', '2026-01-05T18:00:00Z', 'My daughter starts school on March 2', 9),
      ];

      const result = summarizer().softTrim(makeLogBucket('2026-01-05', [...low, ...high]), NOW, new Set());

      expect(result.trimmed).toBe(8);
      expect(result.complete).toBe(true);
      expect(result.entries.filter((e) => e.trimmed).map((e) => e.id)).toEqual(low.map((e) => e.id));
      expect(result.entries.slice(8)).toEqual(high);
    });

    it('is idempotent', () => {
      const s = summarizer();
      const first = s.softTrim(tenEntryBucket(), NOW, new Set());
      const second = s.softTrim({ ...tenEntryBucket(), entries: first.entries }, NOW, new Set());

      expect(second.trimmed).toBe(0);
      expect(second.entries).toEqual(first.entries);
    });

    it('holds back entries inside the protection window', () => {
      const now = Date.parse('2026-01-07T00:00:00Z');
      const bucket = makeLogBucket('2026-01-05', [scored('w', '2026-01-05T10:00:00Z', 'weather chat', 0)]);

      const result = summarizer().softTrim(bucket, now, new Set());
      expect(result.trimmed).toBe(0);
      expect(result.complete).toBe(false);
    });

    it('leaves unscored entries alone', () => {
      const bucket = makeLogBucket('2026-01-05', [makeEntry('u', '2026-01-05T10:00:00Z', 'not scored yet')]);
      expect(summarizer().softTrim(bucket, NOW, new Set()).trimmed).toBe(0);
    });
  });

  describe('describeEntry', () => {
    it('truncates long text to the configured width', () => {
      const line = describeEntry(makeEntry('x', '2026-01-05T10:00:00Z', 'a'.repeat(200), 'assistant'), 120);
      expect(line).toBe(`Assistant: ${'a'.repeat(119)}…`);
    });
  });

  describe('summarizeUp', () => {
    function gardenWeek(): LogBucket[] {
      return [
        makeLogBucket('2026-01-05', [
          scored('e1', '2026-01-05T09:00:00Z', 'Decided to plant tomatoes in the garden', 6),
          scored('e2', '2026-01-05T10:00:00Z', 'ok thanks', 0),
        ]),
        makeLogBucket('2026-01-06', [scored('e3', '2026-01-06T09:00:00Z', 'Garden soil needs compost before planting', 3)]),
        makeLogBucket('2026-01-07', [scored('e4', '2026-01-07T09:00:00Z', 'I prefer organic compost for the garden', 8)]),
      ];
    }

    const ctx = { now: NOW, protectedIds: new Set(['e4']), existingIds: new Set<string>() };

    it('builds a local digest when no oracle is configured', async () => {
      const result = await summarizer().summarizeUp(gardenWeek(), 'weekly', ctx);

      expect(result.status).toBe('summarized');
      if (result.status !== 'summarized') return;
      const { summary } = result;

      expect(summary.id).toBe('2026-W02');
      expect(summary.period).toEqual({ start: '2026-01-05', end: '2026-01-07' });
      expect(summary.sourceBucketIds).toEqual(['20260105', '20260106', '20260107']);
      expect(summary.themes).toEqual(['garden', 'compost', 'decided', 'organic', 'plant']);
      expect(summary.highlights.map((h) => h.entryId)).toEqual(['e1', 'e4']);
      expect(summary.pinned.map((p) => [p.entryId, p.reason])).toEqual([['e4', 'protected']]);
      expect(summary.decisions).toEqual(['Decided to plant tomatoes in the garden']);
      expect(summary.recurringActivities).toEqual(['garden (3 days)', 'compost (2 days)']);
      expect(summary.entryCount).toBe(4);
      expect(summary.narrative).toBe(
        '4 entries across 3 daily buckets (2026-01-05 to 2026-01-07). Main themes: garden, compost, decided, organic, plant.'
      );
      expect(result.partial).toBe(false);
    });

    it('falls back to neutral themes when the material has fewer than two topics', async () => {
      const chatter = [
        makeLogBucket('2026-01-05', [
          scored('c1', '2026-01-05T09:00:00Z', 'ok thanks', 0),
          scored('c2', '2026-01-05T10:00:00Z', 'Chatted about the weather outside', 1),
        ]),
      ];
      const single = [makeLogBucket('2026-01-05', [scored('g1', '2026-01-05T09:00:00Z', 'More garden', 3)])];

      const quiet = await summarizer().summarizeUp(chatter, 'weekly', ctx);
      const sparse = await summarizer().summarizeUp(single, 'weekly', ctx);

      if (quiet.status !== 'summarized' || sparse.status !== 'summarized') throw new Error('expected summaries');
      expect(quiet.summary.themes).toEqual(['small talk', 'routine check-ins']);
      expect(sparse.summary.themes).toEqual(['garden', 'small talk']);
    });

    it('keeps every fact scored five or more as a highlight', async () => {
      const buckets = gardenWeek();
      const result = await summarizer().summarizeUp(buckets, 'weekly', ctx);
      if (result.status !== 'summarized') throw new Error('expected a summary');

      const highScoring = buckets.flatMap((b) => b.entries).filter((e) => (e.importance?.total ?? 0) >= 5);
      const highlighted = new Set(result.summary.highlights.map((h) => h.entryId));
      expect(highScoring.every((e) => highlighted.has(e.id))).toBe(true);
    });

    it('excludes low-scoring entries from the oracle input', async () => {
      const summarize = vi.fn<SummarizationOracle['summarize']>(
        async (): Promise<SummarizationOracleOutput> => ({
          themes: ['Gardening', 'gardening', ' '],
          decisions: ['Plant tomatoes'],
          recurringActivities: [],
          crossReferences: [],
          narrative: 'A week of garden planning. ',
        })
      );
      const result = await summarizer({ summarize }).summarizeUp(gardenWeek(), 'weekly', ctx);

      const input = summarize.mock.calls[0]?.[0];
      expect(input?.sources[0]?.lines.map((l) => l.text)).toEqual(['Decided to plant tomatoes in the garden']);
      if (result.status !== 'summarized') throw new Error('expected a summary');
      expect(result.summary.themes).toEqual(['Gardening', 'garden']);
      expect(result.summary.narrative).toBe('A week of garden planning.');
    });

    it('retries once with the oldest half before giving up', async () => {
      const summarize = vi
        .fn<SummarizationOracle['summarize']>()
        .mockRejectedValueOnce(new OracleTimeoutError('summarization', 60000))
        .mockResolvedValueOnce({
          themes: ['garden', 'compost'],
          decisions: [],
          recurringActivities: [],
          crossReferences: [],
          narrative: 'First half.',
        });

      const result = await summarizer({ summarize }).summarizeUp(gardenWeek(), 'weekly', ctx);

      expect(summarize).toHaveBeenCalledTimes(2);
      expect(summarize.mock.calls[1]?.[0].sources.map((s) => s.bucketId)).toEqual(['20260105', '20260106']);
      if (result.status !== 'summarized') throw new Error('expected a summary');
      expect(result.partial).toBe(true);
      expect(result.sourceIds).toEqual(['20260105', '20260106']);
      expect(result.summary.period).toEqual({ start: '2026-01-05', end: '2026-01-06' });
    });

    it('defers the group when the retry fails too', async () => {
      const summarize = vi
        .fn<SummarizationOracle['summarize']>()
        .mockRejectedValueOnce(new Error('first failure'))
        .mockRejectedValueOnce(new Error('second failure'));

      const result = await summarizer({ summarize }).summarizeUp(gardenWeek(), 'weekly', ctx);
      expect(result).toEqual({ status: 'deferred', reason: 'second failure' });
    });

    it('pins entries still inside the protection window', async () => {
      const now = Date.parse('2026-01-09T00:00:00Z');
      const bucket = makeLogBucket('2026-01-08', [scored('recent', '2026-01-08T10:00:00Z', 'Painted the fence', 2)]);

      const result = await summarizer().summarizeUp([bucket], 'weekly', { ...ctx, now });
      if (result.status !== 'summarized') throw new Error('expected a summary');
      expect(result.summary.pinned).toEqual([
        {
          entryId: 'recent',
          bucketId: '20260108',
          timestamp: Date.parse('2026-01-08T10:00:00Z'),
          speaker: 'user',
          text: 'Painted the fence',
          reason: 'window',
          score: 2,
        },
      ]);
    });

    it('carries highlights and protected pins of summary sources upward', async () => {
      const protectedEntry = makeEntry('p', '2026-01-05T09:00:00Z', 'My daughter is called Mia');
      const staleWindowEntry = makeEntry('w', '2026-01-06T09:00:00Z', 'Dentist on Friday');
      const weekly = makeSummary({
        id: '2026-W02',
        tier: 'weekly',
        sourceTier: 'daily',
        sourceBucketIds: ['20260105'],
        period: { start: '2026-01-05', end: '2026-01-11' },
        pinned: [makePinned(protectedEntry, '20260105'), makePinned(staleWindowEntry, '20260106', 'window')],
        themes: ['family'],
      });
      weekly.highlights = [
        { entryId: 'h', bucketId: '20260105', timestamp: 1, speaker: 'user', text: 'Promoted to lead', score: 9 },
      ];

      const result = await summarizer().summarizeUp([weekly], 'monthly', {
        now: Date.parse('2026-03-01T00:00:00Z'),
        protectedIds: new Set(['p']),
        existingIds: new Set(),
      });
      if (result.status !== 'summarized') throw new Error('expected a summary');

      expect(result.summary.id).toBe('2026-01');
      expect(result.summary.highlights.map((h) => h.text)).toEqual(['Promoted to lead']);
      expect(result.summary.pinned.map((p) => p.entryId)).toEqual(['p']);
    });

    it('rejects already-promoted input', async () => {
      const [first] = gardenWeek();
      if (!first) throw new Error('fixture');
      const promoted: LogBucket = {
        ...first,
        state: { phase: 'promoted', promotedAt: NOW, successorId: '2026-W02', successorTier: 'weekly' },
      };
      await expect(summarizer().summarizeUp([promoted], 'weekly', ctx)).rejects.toThrow(StaleBucketError);
    });

    it('rejects buckets from different calendar groups', async () => {
      const buckets = [
        makeLogBucket('2026-01-05', [scored('a', '2026-01-05T09:00:00Z', 'one', 3)]),
        makeLogBucket('2026-01-12', [scored('b', '2026-01-12T09:00:00Z', 'two', 3)]),
      ];
      await expect(summarizer().summarizeUp(buckets, 'weekly', ctx)).rejects.toThrow(MemoryValidationError);
    });
  });

  it('allocates part suffixes for repeated groups', () => {
    expect(allocateSummaryId('2026-W02', new Set())).toBe('2026-W02');
    expect(allocateSummaryId('2026-W02', new Set(['2026-W02']))).toBe('2026-W02-p2');
    expect(allocateSummaryId('2026-W02', new Set(['2026-W02', '2026-W02-p2']))).toBe('2026-W02-p3');
  });

  describe('compressArchive', () => {
    it('compresses once and reports repeats', async () => {
      await store.ensureUser('alice');
      await store.append('alice', makeEntry('e1', '2026-01-05T09:00:00Z', 'hello'));
      await store.promote(
        'alice',
        ['20260105'],
        'daily',
        'weekly',
        makeSummary({
          id: '2026-W02',
          tier: 'weekly',
          sourceTier: 'daily',
          sourceBucketIds: ['20260105'],
          period: { start: '2026-01-05', end: '2026-01-05' },
        })
      );

      const s = summarizer();
      expect(await s.compressArchive('alice', 'daily', '20260105')).toBe(true);
      expect(await s.compressArchive('alice', 'daily', '20260105')).toBe(false);
    });
  });
});
