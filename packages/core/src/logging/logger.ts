/**
 * Logger for Tiermind
 *
 * Thin wrapper over pino. Every context object passes through
 * sanitizeForLogging before it is written, and secret-bearing keys are
 * redacted again by pino itself. Memory components receive a child logger
 * bound to their component name (and the user id while a cycle runs).
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { sanitizeForLogging } from '../utils/crypto.js';
import type { LoggingConfig } from '@tiermind/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LogContext {
  userId?: string;
  component?: string;
  bucketId?: string;
  tier?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'tiermind',
      }),
    },
    redact: {
      paths: [
        'password',
        'secret',
        'token',
        'apiKey',
        'api_key',
        'authorization',
        '*.password',
        '*.secret',
        '*.token',
        '*.apiKey',
        '*.api_key',
        'headers.authorization',
      ],
      censor: '[REDACTED]',
    },
  };
}

/**
 * Build the transport for the configured outputs.
 *
 * JSON stdout needs no transport: pino writes it to fd 1 synchronously.
 * Pretty stdout goes through pino-pretty and files through pino/file.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout' && output.format === 'pretty') {
      targets.push({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
        level: config.level,
      });
    } else if (output.type === 'file') {
      targets.push({
        target: 'pino/file',
        options: { destination: output.path, mkdir: true },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) return undefined;
  if (targets.length === 1) return targets[0];
  return { targets };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

class SecureLoggerImpl implements SecureLogger {
  constructor(
    private readonly pino: PinoLogger,
    private readonly defaultContext: LogContext = {}
  ) {}

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    const sanitized = sanitizeForLogging({ ...this.defaultContext, ...context });
    return typeof sanitized === 'object' && sanitized !== null ? { ...sanitized } : {};
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.sanitizeContext(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new SecureLoggerImpl(this.pino, { ...this.defaultContext, ...context });
  }
}

/**
 * Create a logger from the logging config. An explicit destination stream
 * bypasses the configured outputs (used to capture JSON lines in tests).
 */
export function createLogger(config: LoggingConfig, destination?: DestinationStream): SecureLogger {
  const options = createPinoOptions(config);
  if (destination) {
    return new SecureLoggerImpl(pino(options, destination));
  }

  const transport = createTransport(config);
  const pinoLogger = transport ? pino(options, pino.transport(transport)) : pino(options);
  return new SecureLoggerImpl(pinoLogger);
}

let globalLogger: SecureLogger | null = null;

export function initializeLogger(config: LoggingConfig): SecureLogger {
  globalLogger = createLogger(config);
  return globalLogger;
}

/**
 * Get the process-wide logger. Throws if initializeLogger() has not run.
 */
export function getLogger(): SecureLogger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

export function isLoggerInitialized(): boolean {
  return globalLogger !== null;
}

/**
 * Logger that discards everything. Default for components constructed
 * without one, and for tests.
 */
export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
