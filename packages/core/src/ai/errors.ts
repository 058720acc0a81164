/**
 * Model Provider Error Types
 *
 * Structured errors for the model client layer. `recoverable` drives the
 * RetryManager; the memory oracles turn anything that escapes the retries
 * into an oracle failure and fall back.
 */

export interface AIProviderErrorOptions {
  provider: string;
  code: string;
  recoverable: boolean;
  retryAfter?: number;
  statusCode?: number;
  cause?: unknown;
}

export class AIProviderError extends Error {
  readonly provider: string;
  readonly code: string;
  readonly recoverable: boolean;
  readonly retryAfter?: number;
  readonly statusCode?: number;

  constructor(message: string, options: AIProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'AIProviderError';
    this.provider = options.provider;
    this.code = options.code;
    this.recoverable = options.recoverable;
    this.retryAfter = options.retryAfter;
    this.statusCode = options.statusCode;
  }
}

export class RateLimitError extends AIProviderError {
  constructor(provider: string, retryAfter?: number, cause?: unknown) {
    super(`Rate limited by ${provider}`, {
      provider,
      code: 'RATE_LIMIT',
      recoverable: true,
      retryAfter,
      statusCode: 429,
      cause,
    });
    this.name = 'RateLimitError';
  }
}

export class TokenLimitError extends AIProviderError {
  constructor(provider: string, cause?: unknown) {
    super(`Token limit exceeded for ${provider}`, {
      provider,
      code: 'TOKEN_LIMIT',
      recoverable: false,
      cause,
    });
    this.name = 'TokenLimitError';
  }
}

export class InvalidResponseError extends AIProviderError {
  constructor(provider: string, detail: string, cause?: unknown) {
    super(`Invalid response from ${provider}: ${detail}`, {
      provider,
      code: 'INVALID_RESPONSE',
      recoverable: false,
      cause,
    });
    this.name = 'InvalidResponseError';
  }
}

export class ProviderUnavailableError extends AIProviderError {
  constructor(provider: string, statusCode?: number, cause?: unknown) {
    super(`Provider ${provider} is unavailable`, {
      provider,
      code: 'PROVIDER_UNAVAILABLE',
      recoverable: true,
      statusCode,
      cause,
    });
    this.name = 'ProviderUnavailableError';
  }
}

export class ProviderTimeoutError extends AIProviderError {
  constructor(provider: string, cause?: unknown) {
    super(`Request to ${provider} timed out`, {
      provider,
      code: 'PROVIDER_TIMEOUT',
      recoverable: true,
      cause,
    });
    this.name = 'ProviderTimeoutError';
  }
}

export class AuthenticationError extends AIProviderError {
  constructor(provider: string, cause?: unknown) {
    super(`Authentication failed for ${provider}`, {
      provider,
      code: 'AUTH_FAILED',
      recoverable: false,
      statusCode: 401,
      cause,
    });
    this.name = 'AuthenticationError';
  }
}
