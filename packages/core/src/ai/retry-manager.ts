/**
 * Retry Manager with Exponential Backoff
 *
 * Jittered exponential backoff for transient provider failures. Only
 * recoverable errors are retried (rate limits, 502/503/529, timeouts,
 * connection resets); auth errors and token limits fail immediately.
 */

import { AIProviderError } from './errors.js';
import type { SecureLogger } from '../logging/logger.js';

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export interface RetryManagerDeps {
  logger?: SecureLogger;
  /** Replaceable in tests so backoff does not wait on real timers. */
  sleep?: (ms: number) => Promise<void>;
}

const RETRYABLE_MESSAGE_FRAGMENTS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'fetch failed',
  '502',
  '503',
  'timeout',
];

export class RetryManager {
  private readonly config: RetryConfig;
  private readonly logger: SecureLogger | null;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config?: Partial<RetryConfig>, deps: RetryManagerDeps = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = deps.logger ?? null;
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async execute<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();
      try {
        return await operation();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (signal?.aborted || attempt >= this.config.maxRetries || !this.shouldRetry(err)) {
          throw err;
        }

        const delay = this.calculateDelay(attempt, err);
        this.logger?.warn('Retrying model request', {
          attempt: attempt + 1,
          delayMs: delay,
          error: err.message,
        });
        await this.sleep(delay);
      }
    }
  }

  shouldRetry(error: Error): boolean {
    if (error instanceof AIProviderError) {
      return error.recoverable;
    }
    const message = error.message.toLowerCase();
    return RETRYABLE_MESSAGE_FRAGMENTS.some((fragment) => message.includes(fragment));
  }

  /**
   * Half the clamped exponential delay plus up to the other half as jitter.
   * A provider-supplied retryAfter (seconds) takes precedence.
   */
  calculateDelay(attempt: number, error?: Error): number {
    if (error instanceof AIProviderError && error.retryAfter !== undefined) {
      return Math.min(error.retryAfter * 1000, this.config.maxDelayMs);
    }

    const clamped = Math.min(this.config.baseDelayMs * Math.pow(2, attempt), this.config.maxDelayMs);
    return Math.floor(clamped / 2 + (Math.random() * clamped) / 2);
  }
}
