/**
 * Start Command — Starts the Tiermind gateway and the daily cleanup sweep.
 */

import type { PartialConfig } from '@tiermind/shared';
import { createTiermind, type Tiermind } from '../../tiermind.js';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag } from '../utils.js';
import { VERSION } from '../../version.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
type CliLogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is CliLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function printBanner(stream: NodeJS.WritableStream, host: string, port: number, dataDir: string): void {
  stream.write(`
  Tiermind v${VERSION}
  Tiered conversation memory

  Gateway:    http://${host}:${String(port)}
  Health:     http://${host}:${String(port)}/health
  Memory API: http://${host}:${String(port)}/api/v1/memory/
  Data dir:   ${dataDir}
\n`);
}

function printHelp(stream: NodeJS.WritableStream): void {
  stream.write(`
Usage: tiermind [start] [options]

Start the memory gateway and the daily cleanup sweep.

Options:
  -p, --port <number>      Gateway port (default: 18790)
  -H, --host <string>      Gateway host (default: 127.0.0.1)
  -c, --config <path>      Config file path (YAML)
  -d, --data-dir <path>    Memory data directory
  -l, --log-level <level>  Log level: trace|debug|info|warn|error
  -v, --version            Show version
  -h, --help               Show this help

Environment Variables:
  ANTHROPIC_API_KEY        Model API key (rule-based fallbacks when unset)
  TIERMIND_DATA_DIR        Memory data directory
  TIERMIND_HOST            Gateway host
  TIERMIND_PORT            Gateway port
  TIERMIND_LOG_LEVEL       Log level
\n`);
}

export const startCommand: Command = {
  name: 'start',
  description: 'Start the gateway server (default)',
  usage: 'tiermind [start] [options]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      printHelp(ctx.stdout);
      return 0;
    }
    argv = helpResult.rest;

    const versionResult = extractBoolFlag(argv, 'version', 'v');
    if (versionResult.value) {
      ctx.stdout.write(`tiermind v${VERSION}\n`);
      return 0;
    }
    argv = versionResult.rest;

    const portResult = extractFlag(argv, 'port', 'p');
    argv = portResult.rest;
    const hostResult = extractFlag(argv, 'host', 'H');
    argv = hostResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const dataDirResult = extractFlag(argv, 'data-dir', 'd');
    argv = dataDirResult.rest;
    const logLevelResult = extractFlag(argv, 'log-level', 'l');
    argv = logLevelResult.rest;

    const port = portResult.value !== undefined ? Number(portResult.value) : undefined;
    if (port !== undefined && !Number.isInteger(port)) {
      ctx.stderr.write(`Invalid port: ${portResult.value ?? ''}\n`);
      return 1;
    }
    const logLevel = logLevelResult.value;
    if (logLevel !== undefined && !isLogLevel(logLevel)) {
      ctx.stderr.write(`Invalid log level: ${logLevel}\n`);
      return 1;
    }

    const overrides: PartialConfig = {};
    if (port !== undefined || hostResult.value) {
      overrides.gateway = {
        ...(port !== undefined ? { port } : {}),
        ...(hostResult.value ? { host: hostResult.value } : {}),
      };
    }
    if (dataDirResult.value) {
      overrides.core = { dataDir: dataDirResult.value };
    }
    if (logLevel) {
      overrides.logging = { level: logLevel };
    }

    let instance: Tiermind;
    try {
      instance = await createTiermind({
        config: {
          configPath: configResult.value,
          overrides: Object.keys(overrides).length > 0 ? overrides : undefined,
        },
        enableGateway: true,
      });

      const config = instance.getConfig();
      printBanner(ctx.stdout, config.gateway.host, config.gateway.port, config.core.dataDir);
    } catch (error) {
      ctx.stderr.write(`Failed to start Tiermind: ${error instanceof Error ? error.message : String(error)}\n`);
      return 1;
    }

    // Block until shutdown signal
    return new Promise<number>((resolve) => {
      const shutdown = async (signal: string) => {
        ctx.stdout.write(`\nReceived ${signal}, shutting down...\n`);
        try {
          await instance.shutdown();
          ctx.stdout.write('Shutdown complete.\n');
          resolve(0);
        } catch (err) {
          ctx.stderr.write(`Error during shutdown: ${String(err)}\n`);
          resolve(1);
        }
      };

      process.once('SIGINT', () => void shutdown('SIGINT'));
      process.once('SIGTERM', () => void shutdown('SIGTERM'));
    });
  },
};
