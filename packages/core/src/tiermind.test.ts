import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { Tiermind, createTiermind } from './tiermind.js';
import { createNoopLogger } from './logging/logger.js';
import { makeTempDir } from './memory/test-fixtures.js';
import type { CleanupRunStats } from './memory/types.js';

const EMPTY_STATS: CleanupRunStats = {
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

describe('Tiermind', () => {
  let dir: { path: string; cleanup: () => void };
  let configPath: string;
  let instance: Tiermind | null = null;

  beforeEach(() => {
    dir = makeTempDir('runtime-');
    configPath = join(dir.path, 'tiermind.yaml');
    writeFileSync(
      configPath,
      ['core:', `  dataDir: ${dir.path}`, 'memory:', '  cleanup:', '    intervalMs: 60000', ''].join('\n')
    );
  });

  afterEach(async () => {
    vi.useRealTimers();
    await instance?.shutdown();
    instance = null;
    dir.cleanup();
  });

  const create = (logger = createNoopLogger()) =>
    createTiermind({ config: { configPath }, env: {}, logger, provider: null });

  it('refuses access before initialization', () => {
    const tiermind = new Tiermind();
    expect(() => tiermind.getConfig()).toThrow('Tiermind is not initialized. Call initialize() first.');
    expect(() => tiermind.getMemoryManager()).toThrow('Tiermind is not initialized. Call initialize() first.');
  });

  it('builds the memory manager on the configured data dir', async () => {
    instance = await create();
    await instance.getMemoryManager().createUser('alice');

    expect(instance.getConfig().core.dataDir).toBe(dir.path);
    expect(instance.getGateway()).toBeNull();
    await expect(instance.getMemoryManager().listUsers()).resolves.toEqual(['alice']);
  });

  it('rejects a second initialization', async () => {
    instance = await create();
    await expect(instance.initialize()).rejects.toThrow('Tiermind is already initialized');
  });

  it('warns when no API key is available', async () => {
    const warn = vi.fn();
    instance = await createTiermind({ config: { configPath }, env: {}, logger: { ...createNoopLogger(), warn } });

    expect(warn).toHaveBeenCalledWith('Model API key not set; memory oracles use rule-based fallbacks', {
      apiKeyEnv: 'ANTHROPIC_API_KEY',
    });
  });

  it('runs the cleanup sweep on every interval', async () => {
    vi.useFakeTimers();
    instance = await create();
    const sweep = vi.spyOn(instance.getMemoryManager(), 'runDailyCleanup').mockResolvedValue(EMPTY_STATS);

    vi.advanceTimersByTime(59_999);
    expect(sweep).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(sweep).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(60_000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });

  it('stops the sweep on shutdown', async () => {
    vi.useFakeTimers();
    instance = await create();
    const sweep = vi.spyOn(instance.getMemoryManager(), 'runDailyCleanup').mockResolvedValue(EMPTY_STATS);

    const first = instance.shutdown();
    expect(instance.shutdown()).toBe(first);
    await first;
    vi.advanceTimersByTime(120_000);

    expect(sweep).not.toHaveBeenCalled();
  });

  it('logs a failed sweep and keeps going', async () => {
    const error = vi.fn();
    instance = await create({ ...createNoopLogger(), error });
    vi.spyOn(instance.getMemoryManager(), 'runDailyCleanup').mockRejectedValue(new Error('disk full'));

    await expect(instance.runScheduledCleanup()).resolves.toBeNull();
    expect(error).toHaveBeenCalledWith('Scheduled cleanup failed', { error: 'disk full' });
  });

  it('sweeps every stored user', async () => {
    instance = await create();
    await instance.getMemoryManager().createUser('alice');
    await instance.getMemoryManager().createUser('bob');

    const stats = await instance.runScheduledCleanup();

    expect(stats?.processedUsers).toBe(2);
    expect(stats?.errors).toEqual([]);
  });
});
