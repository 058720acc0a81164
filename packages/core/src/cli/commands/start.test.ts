import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// ─── Hoisted Mocks ────────────────────────────────────────────

const { mockCreateTiermind, mockInstance } = vi.hoisted(() => {
  const mockInstance = {
    getConfig: vi.fn().mockReturnValue({
      gateway: { host: '127.0.0.1', port: 18790 },
      core: { dataDir: '/var/lib/tiermind' },
    }),
    shutdown: vi.fn().mockResolvedValue(undefined),
  };
  return {
    mockCreateTiermind: vi.fn().mockResolvedValue(mockInstance),
    mockInstance,
  };
});

vi.mock('../../tiermind.js', () => ({
  createTiermind: mockCreateTiermind,
}));

vi.mock('../../version.js', () => ({
  VERSION: '1.2.3',
}));

// ─── Tests ────────────────────────────────────────────────────

import { startCommand } from './start.js';
import { createStreams } from '../test-streams.js';

function run(argv: string[]) {
  const streams = createStreams();
  const result = startCommand.run({ argv, stdout: streams.stdout, stderr: streams.stderr });
  return { ...streams, result };
}

describe('startCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockCreateTiermind.mockResolvedValue(mockInstance);
    mockInstance.shutdown.mockResolvedValue(undefined);
  });

  afterEach(() => {
    process.removeAllListeners('SIGINT');
    process.removeAllListeners('SIGTERM');
  });

  it('prints help and returns 0', async () => {
    const { result, getStdout } = run(['--help']);
    expect(await result).toBe(0);
    expect(getStdout()).toContain('  -d, --data-dir <path>    Memory data directory\n');
    expect(mockCreateTiermind).not.toHaveBeenCalled();
  });

  it('prints the version', async () => {
    const { result, getStdout } = run(['-v']);
    expect(await result).toBe(0);
    expect(getStdout()).toBe('tiermind v1.2.3\n');
  });

  it('rejects an invalid log level', async () => {
    const { result, getStderr } = run(['--log-level', 'loud']);
    expect(await result).toBe(1);
    expect(getStderr()).toBe('Invalid log level: loud\n');
  });

  it('rejects a non-numeric port', async () => {
    const { result, getStderr } = run(['-p', 'http']);
    expect(await result).toBe(1);
    expect(getStderr()).toBe('Invalid port: http\n');
  });

  it('reports a startup failure', async () => {
    mockCreateTiermind.mockRejectedValue(new Error('Config file not found: /etc/tiermind.yaml'));
    const { result, getStderr } = run(['-c', '/etc/tiermind.yaml']);

    expect(await result).toBe(1);
    expect(getStderr()).toBe('Failed to start Tiermind: Config file not found: /etc/tiermind.yaml\n');
  });

  it('passes flag overrides through to the runtime', async () => {
    mockCreateTiermind.mockRejectedValue(new Error('stop'));
    const { result } = run(['-p', '4000', '-H', '0.0.0.0', '-d', '/srv/memory', '-l', 'debug', '-c', 'x.yaml']);
    await result;

    expect(mockCreateTiermind).toHaveBeenCalledWith({
      config: {
        configPath: 'x.yaml',
        overrides: {
          gateway: { port: 4000, host: '0.0.0.0' },
          core: { dataDir: '/srv/memory' },
          logging: { level: 'debug' },
        },
      },
      enableGateway: true,
    });
  });

  it('passes no overrides without flags', async () => {
    mockCreateTiermind.mockRejectedValue(new Error('stop'));
    await run([]).result;

    expect(mockCreateTiermind).toHaveBeenCalledWith({
      config: { configPath: undefined, overrides: undefined },
      enableGateway: true,
    });
  });

  it('prints the banner and shuts down on SIGTERM', async () => {
    const { result, getStdout } = run([]);
    await vi.waitFor(() => {
      expect(getStdout()).toContain('Gateway:    http://127.0.0.1:18790\n');
    });

    process.emit('SIGTERM', 'SIGTERM');

    expect(await result).toBe(0);
    expect(mockInstance.shutdown).toHaveBeenCalledTimes(1);
    expect(getStdout()).toContain('Data dir:   /var/lib/tiermind\n');
    expect(getStdout().endsWith('\nReceived SIGTERM, shutting down...\nShutdown complete.\n')).toBe(true);
  });

  it('returns 1 when shutdown fails', async () => {
    mockInstance.shutdown.mockRejectedValue(new Error('stuck'));
    const { result, getStdout, getStderr } = run([]);
    await vi.waitFor(() => {
      expect(getStdout()).toContain('Tiermind v1.2.3');
    });

    process.emit('SIGINT', 'SIGINT');

    expect(await result).toBe(1);
    expect(getStderr()).toBe('Error during shutdown: Error: stuck\n');
  });
});
