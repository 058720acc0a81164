import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryConfigSchema } from '@tiermind/shared';
import { MemoryManager } from './manager.js';
import { MemoryNotFoundError, MemoryValidationError } from './errors.js';
import type { ScoringOracle } from './oracles.js';
import { makeTempDir } from './test-fixtures.js';

const NOW = Date.parse('2026-01-20T12:00:00Z');
const USER = 'alice';
const config = MemoryConfigSchema.parse({});

describe('MemoryManager', () => {
  let dir: { path: string; cleanup: () => void };
  let manager: MemoryManager;

  beforeEach(async () => {
    dir = makeTempDir('manager-');
    manager = new MemoryManager({ dataDir: dir.path, config, contextWindowTokens: 128000, clock: () => NOW });
    await manager.createUser(USER, 'Alice');
  });

  afterEach(async () => {
    await manager.shutdown();
    dir.cleanup();
  });

  it('appends turns to the daily bucket of their day and lists them in the index', async () => {
    const turn = await manager.appendTurn(USER, 'user', 'Planted tulips today', Date.parse('2026-01-19T10:00:00Z'));

    expect(turn.bucketId).toBe('20260119');
    expect(turn.trimmed).toBe(false);
    const index = await manager.getIndex(USER);
    expect(index.displayName).toBe('Alice');
    expect(index.generation).toBe(0);
    expect(index.tiers.daily.map((e) => [e.id, e.entryCount])).toEqual([['20260119', 1]]);
  });

  it('rejects empty turns', async () => {
    await expect(manager.appendTurn(USER, 'user', '   ')).rejects.toThrow(MemoryValidationError);
  });

  it('protects turns carrying a strong marker', async () => {
    const turn = await manager.appendTurn(USER, 'user', 'Please remember this: my locker code is 1234');

    const index = await manager.getIndex(USER);
    expect(index.protectedFacts).toEqual([
      {
        entryId: turn.id,
        bucketId: '20260120',
        speaker: 'user',
        text: 'Please remember this: my locker code is 1234',
        timestamp: NOW,
        reason: 'marker',
        protectedAt: NOW,
      },
    ]);
  });

  it('returns the chronological tail across days', async () => {
    await manager.appendTurn(USER, 'user', 'first', Date.parse('2026-01-18T09:00:00Z'));
    await manager.appendTurn(USER, 'assistant', 'second', Date.parse('2026-01-19T09:00:00Z'));
    await manager.appendTurn(USER, 'user', 'third', Date.parse('2026-01-20T09:00:00Z'));

    const recent = await manager.getRecentMessages(USER, 2);

    expect(recent.map((m) => [m.bucketId, m.text])).toEqual([
      ['20260119', 'second'],
      ['20260120', 'third'],
    ]);
  });

  it('protects and unprotects entries by id', async () => {
    const turn = await manager.appendTurn(USER, 'user', 'My sister lives in Porto');

    const fact = await manager.protect(USER, turn.id, 'family');
    expect(fact).toMatchObject({ entryId: turn.id, reason: 'manual', note: 'family', text: 'My sister lives in Porto' });
    expect((await manager.getStats(USER)).protectedFacts).toBe(1);

    await manager.unprotect(USER, turn.id);
    expect((await manager.getIndex(USER)).protectedFacts).toEqual([]);
    await expect(manager.unprotect(USER, turn.id)).rejects.toThrow(MemoryNotFoundError);
    await expect(manager.protect(USER, 'missing')).rejects.toThrow(MemoryNotFoundError);
  });

  it('holds an append until the running cleanup cycle finishes', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let scoringStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      scoringStarted = resolve;
    });
    const score = vi.fn<ScoringOracle['score']>(async () => {
      scoringStarted();
      await gate;
      return { frequencyPoints: 1, recencyPoints: 1, explicitPoints: 0, relevancePoints: 1, reasoning: 'ok' };
    });
    const gated = new MemoryManager({
      dataDir: dir.path,
      config,
      contextWindowTokens: 128000,
      clock: () => NOW,
      oracles: { scoring: { score } },
    });
    await gated.appendTurn(USER, 'user', 'Started the pottery course', Date.parse('2026-01-19T10:00:00Z'));

    const cleanup = gated.forceCleanup(USER);
    await started;
    const append = gated.appendTurn(USER, 'user', 'Second pottery lesson');
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect((await gated.getRecentMessages(USER)).map((m) => m.text)).toEqual(['Started the pottery course']);

    release();
    const report = await cleanup;
    const late = await append;

    expect(report.scored).toBe(1);
    expect(late.importance).toBeUndefined();
    expect((await gated.getRecentMessages(USER)).map((m) => m.text)).toEqual([
      'Started the pottery course',
      'Second pottery lesson',
    ]);
    await gated.shutdown();
  });

  it('reports per-tier statistics', async () => {
    await manager.appendTurn(USER, 'user', 'one', Date.parse('2026-01-19T10:00:00Z'));
    await manager.appendTurn(USER, 'user', 'two', Date.parse('2026-01-20T10:00:00Z'));

    const stats = await manager.getStats(USER);

    expect(stats.tiers.daily.buckets).toBe(2);
    expect(stats.totalEntries).toBe(2);
    expect(stats.archivedBuckets).toBe(0);
    expect(stats.cleanupCount).toBe(0);
  });

  it('imports a single-file conversation log', async () => {
    const markdown = [
      '### User - 2026-01-05 12:30:49',
      '',
      'Hello there',
      '',
      '---',
      '',
      '### Assistant - 2026-01-05 12:31:02',
      '',
      'Hi! How can I help?',
      '',
      '---',
      '',
      '### User - 2026-01-06 08:00:00',
      '',
      'Plan the garden',
      '',
    ].join('\n');

    const result = await manager.importV1Memory(USER, markdown);

    expect(result).toEqual({ imported: 3, days: 2, skipped: 0 });
    expect((await manager.getRecentMessages(USER, 10)).map((m) => [m.speaker, m.text])).toEqual([
      ['user', 'Hello there'],
      ['assistant', 'Hi! How can I help?'],
      ['user', 'Plan the garden'],
    ]);
  });

  it('backs up a user before resetting it', async () => {
    await manager.appendTurn(USER, 'user', 'something');

    const backup = await manager.resetUser(USER);

    expect(backup).toBe(`${dir.path}/backups/${USER}-${NOW}`);
    expect(await manager.userExists(USER)).toBe(false);
    await expect(manager.getIndex(USER)).rejects.toThrow(MemoryNotFoundError);
  });

  it('aborts cleanup requested after shutdown', async () => {
    await manager.appendTurn(USER, 'user', 'late entry', Date.parse('2026-01-19T10:00:00Z'));
    await manager.shutdown();

    const report = await manager.forceCleanup(USER);

    expect(report.aborted).toBe(true);
    expect(report.scored).toBe(0);
  });
});
