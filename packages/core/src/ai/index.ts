/**
 * AI Module - Public Exports
 */

export { type AIProvider, BaseProvider, type ChatOptions, type ProviderConfig } from './providers/base.js';
export { AnthropicProvider } from './providers/anthropic.js';
export { createProvider } from './factory.js';
export { RetryManager, type RetryConfig, type RetryManagerDeps } from './retry-manager.js';
export {
  AIProviderError,
  RateLimitError,
  TokenLimitError,
  InvalidResponseError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  AuthenticationError,
} from './errors.js';
