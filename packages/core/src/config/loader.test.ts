import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir, homedir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig, getSecret, requireSecret, expandPath } from './loader.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tiermind-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(dir, 'tiermind.yaml');
    writeFileSync(path, stringifyYaml(content));
    return path;
  }

  it('should fill every section with schema defaults', () => {
    const config = loadConfig({ configPath: writeConfig({}), skipEnv: true });

    expect(config.version).toBe('1.0');
    expect(config.core.environment).toBe('development');
    expect(config.core.dataDir).toBe(join(homedir(), '.tiermind/data'));
    expect(config.gateway.port).toBe(18790);
    expect(config.model.contextWindowTokens).toBe(128000);
    expect(config.memory.protection.windowDays).toBe(7);
    expect(config.memory.cleanup.ceilingsBytes.daily).toBe(20 * 1024 * 1024);
    expect(config.memory.context.maxCandidates.weekly).toBe(12);
  });

  it('should read values from the YAML file', () => {
    const path = writeConfig({
      core: { dataDir: join(dir, 'data') },
      memory: { cleanup: { weeklyAfterDays: 14 } },
    });
    const config = loadConfig({ configPath: path, skipEnv: true });

    expect(config.core.dataDir).toBe(join(dir, 'data'));
    expect(config.memory.cleanup.weeklyAfterDays).toBe(14);
    expect(config.memory.cleanup.monthlyAfterDays).toBe(30);
  });

  it('should let environment variables override the file', () => {
    const path = writeConfig({ gateway: { port: 20000 }, logging: { level: 'debug' } });
    const config = loadConfig({
      configPath: path,
      env: { TIERMIND_PORT: '21000', TIERMIND_LOG_LEVEL: 'warn', TIERMIND_MODEL: 'test-model' },
    });

    expect(config.gateway.port).toBe(21000);
    expect(config.logging.level).toBe('warn');
    expect(config.model.model).toBe('test-model');
  });

  it('should ignore a non-numeric port variable', () => {
    const config = loadConfig({ configPath: writeConfig({}), env: { TIERMIND_PORT: 'abc' } });
    expect(config.gateway.port).toBe(18790);
  });

  it('should let programmatic overrides win over everything', () => {
    const config = loadConfig({
      configPath: writeConfig({ memory: { context: { recentDays: 5 } } }),
      env: { TIERMIND_HOST: '0.0.0.0' },
      overrides: { gateway: { host: '127.0.0.2' }, memory: { context: { recentDays: 1 } } },
    });

    expect(config.gateway.host).toBe('127.0.0.2');
    expect(config.memory.context.recentDays).toBe(1);
    expect(config.memory.context.budgetFraction).toBe(0.5);
  });

  it('should replace arrays instead of merging them', () => {
    const config = loadConfig({
      configPath: writeConfig({ memory: { scoring: { explicitMarkers: ['a', 'b'] } } }),
      skipEnv: true,
      overrides: { memory: { scoring: { explicitMarkers: ['c'] } } },
    });
    expect(config.memory.scoring.explicitMarkers).toEqual(['c']);
  });

  it('should throw when the explicit file does not exist', () => {
    expect(() => loadConfig({ configPath: join(dir, 'missing.yaml') })).toThrow(
      `Config file not found: ${join(dir, 'missing.yaml')}`
    );
  });

  it('should reject out-of-range values', () => {
    const path = writeConfig({ gateway: { port: 80 } });
    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/Invalid configuration/);
  });

  it('should reject data directories with path traversal', () => {
    const path = writeConfig({ core: { dataDir: '../escape' } });
    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/Invalid configuration/);
  });
});

describe('expandPath', () => {
  it('should expand a leading tilde', () => {
    expect(expandPath('~/memory')).toBe(join(homedir(), 'memory'));
  });
});

describe('secrets', () => {
  const env = { TEST_MODEL_KEY: 'test-secret' };

  it('getSecret should read from the given environment', () => {
    expect(getSecret('TEST_MODEL_KEY', env)).toBe('test-secret');
    expect(getSecret('MISSING_KEY', env)).toBeUndefined();
  });

  it('requireSecret should throw when unset', () => {
    expect(requireSecret('TEST_MODEL_KEY', env)).toBe('test-secret');
    expect(() => requireSecret('MISSING_KEY', env)).toThrow('Required secret not set: MISSING_KEY');
  });
});
