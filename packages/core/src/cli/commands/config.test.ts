import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { configCommand } from './config.js';
import { createStreams } from '../test-streams.js';

describe('config command', () => {
  const originalEnv = process.env;
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    process.env = Object.fromEntries(
      Object.entries(originalEnv).filter(([key]) => !key.startsWith('TIERMIND_') && key !== 'ANTHROPIC_API_KEY')
    );
    dir = mkdtempSync(join(tmpdir(), 'tiermind-config-'));
    configPath = join(dir, 'tiermind.yaml');
    writeFileSync(
      configPath,
      ['core:', `  dataDir: ${dir}`, 'gateway:', '  port: 19000', 'memory:', '  cleanup:', '    concurrency: 4', ''].join('\n')
    );
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print help with --help', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['--help'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout()).toContain('--check-secrets');
  });

  it('should print the resolved configuration', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['--config', configPath], stdout, stderr });

    expect(code).toBe(0);
    const lines = getStdout().split('\n');
    expect(lines[0]).toBe('Configuration valid.');
    expect(lines).toContain(`  Data dir:      ${dir}`);
    expect(lines).toContain('  Gateway:       127.0.0.1:19000');
    expect(lines).toContain(
      '    Ceilings:           daily 20.0 MB, weekly 20.0 MB, monthly 20.0 MB, yearly 50.0 MB, archive 100.0 MB'
    );
    expect(lines).toContain('    Cleanup:            every 86400s, 4 users at a time');
    expect(lines).toContain('    Context:            3 recent days, 50% of window');
  });

  it('should apply environment overrides over the file', async () => {
    process.env.TIERMIND_PORT = '19500';
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['-c', configPath, '--json'], stdout, stderr });

    expect(code).toBe(0);
    const parsed: unknown = JSON.parse(getStdout());
    expect(parsed).toMatchObject({
      gateway: { port: 19500 },
      memory: { cleanup: { concurrency: 4, snapshotRetention: 10 } },
    });
  });

  it('should fail for non-existent config path', async () => {
    const { stdout, stderr, getStderr } = createStreams();
    const code = await configCommand.run({ argv: ['--config', join(dir, 'missing.yaml')], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toBe(`Configuration error:\nConfig file not found: ${join(dir, 'missing.yaml')}\n`);
  });

  it('should report a missing API key with --check-secrets', async () => {
    const { stdout, stderr, getStderr } = createStreams();
    const code = await configCommand.run({ argv: ['-c', configPath, '--check-secrets'], stdout, stderr });
    expect(code).toBe(1);
    expect(getStderr()).toBe('Required secret not set: ANTHROPIC_API_KEY\n');
  });

  it('should confirm a set API key with --check-secrets', async () => {
    process.env.ANTHROPIC_API_KEY = 'test-key';
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['-c', configPath, '--check-secrets'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout().endsWith('Model API key is set.\n')).toBe(true);
  });
});

describe('config validate subcommand', () => {
  const originalEnv = process.env;
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    process.env = { ...originalEnv, ANTHROPIC_API_KEY: 'test-key' };
    dir = mkdtempSync(join(tmpdir(), 'tiermind-validate-'));
    configPath = join(dir, 'tiermind.yaml');
    writeFileSync(configPath, `core:\n  dataDir: ${dir}\n`);
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print help with validate --help', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['validate', '--help'], stdout, stderr });
    expect(code).toBe(0);
    expect(getStdout()).toContain('pre-startup');
  });

  it('should pass with a valid file and key', async () => {
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['validate', '-c', configPath, '--json'], stdout, stderr });

    expect(code).toBe(0);
    expect(JSON.parse(getStdout())).toEqual({
      valid: true,
      checks: [
        { name: 'config_structure', passed: true },
        { name: 'model_api_key', passed: true },
      ],
    });
  });

  it('should fail an invalid file and skip the key check', async () => {
    writeFileSync(configPath, 'gateway:\n  port: 80\n');
    const { stdout, stderr, getStdout } = createStreams();
    const code = await configCommand.run({ argv: ['validate', '-c', configPath], stdout, stderr });

    expect(code).toBe(1);
    const lines = getStdout().split('\n');
    expect(lines).toContain('  ✗  config structure');
    expect(lines).toContain('  ✗  model api key');
    expect(lines).toContain('       Skipped: config failed to load');
    expect(lines).toContain('Result: FAIL, fix the issues above before starting');
  });
});
