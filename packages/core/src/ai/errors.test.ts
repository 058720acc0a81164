import { describe, it, expect } from 'vitest';
import {
  AIProviderError,
  RateLimitError,
  TokenLimitError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  AuthenticationError,
} from './errors.js';

describe('AIProviderError', () => {
  it('carries structured metadata and the cause', () => {
    const cause = new Error('original');
    const err = new AIProviderError('Something failed', {
      provider: 'anthropic',
      code: 'SOME_ERROR',
      recoverable: true,
      retryAfter: 30,
      statusCode: 503,
      cause,
    });
    expect(err).toMatchObject({
      message: 'Something failed',
      provider: 'anthropic',
      code: 'SOME_ERROR',
      recoverable: true,
      retryAfter: 30,
      statusCode: 503,
      name: 'AIProviderError',
    });
    expect(err.cause).toBe(cause);
  });
});

describe('subclasses', () => {
  it('marks transient failures recoverable', () => {
    expect(new RateLimitError('anthropic', 5).recoverable).toBe(true);
    expect(new ProviderUnavailableError('anthropic', 529).recoverable).toBe(true);
    expect(new ProviderTimeoutError('anthropic').code).toBe('PROVIDER_TIMEOUT');
  });

  it('marks auth and token-limit failures permanent', () => {
    expect(new AuthenticationError('anthropic').recoverable).toBe(false);
    expect(new TokenLimitError('anthropic').recoverable).toBe(false);
  });

  it('formats messages with the provider name', () => {
    expect(new RateLimitError('anthropic').message).toBe('Rate limited by anthropic');
    expect(new ProviderUnavailableError('anthropic').message).toBe('Provider anthropic is unavailable');
  });
});
