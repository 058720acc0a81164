/**
 * Abstract AI Provider Base
 *
 * Shared constructor, retry wrapping and request defaults for provider
 * implementations. The memory oracles only ever see the AIProvider
 * interface.
 */

import type { AIRequest, AIResponse, AIProviderName, ModelConfig } from '@tiermind/shared';
import { RetryManager, type RetryConfig, type RetryManagerDeps } from '../retry-manager.js';
import type { SecureLogger } from '../../logging/logger.js';

export interface ProviderConfig {
  model: ModelConfig;
  apiKey?: string;
  retryConfig?: Partial<RetryConfig>;
}

export interface ChatOptions {
  /** Cancels the request in flight and any retry still pending. */
  signal?: AbortSignal;
}

export interface AIProvider {
  readonly name: AIProviderName;

  /** Non-streaming chat completion. */
  chat(request: AIRequest, options?: ChatOptions): Promise<AIResponse>;
}

export abstract class BaseProvider implements AIProvider {
  abstract readonly name: AIProviderName;

  protected readonly modelConfig: ModelConfig;
  protected readonly retryManager: RetryManager;
  protected readonly logger: SecureLogger | null;
  protected readonly apiKey: string | undefined;

  constructor(config: ProviderConfig, logger?: SecureLogger, retryDeps: RetryManagerDeps = {}) {
    this.modelConfig = config.model;
    this.apiKey = config.apiKey;
    this.logger = logger ?? null;
    this.retryManager = new RetryManager(
      {
        maxRetries: config.model.maxRetries,
        baseDelayMs: config.model.retryDelayMs,
        ...config.retryConfig,
      },
      { logger: logger?.child({ component: 'RetryManager' }), ...retryDeps }
    );
  }

  async chat(request: AIRequest, options: ChatOptions = {}): Promise<AIResponse> {
    return this.retryManager.execute(() => this.doChat(request, options), options.signal);
  }

  /**
   * Provider-specific call, invoked inside the retry loop.
   */
  protected abstract doChat(request: AIRequest, options: ChatOptions): Promise<AIResponse>;

  protected resolveModel(request: AIRequest): string {
    return request.model ?? this.modelConfig.model;
  }

  protected resolveMaxTokens(request: AIRequest): number {
    return request.maxTokens ?? this.modelConfig.maxTokens;
  }

  protected resolveTemperature(request: AIRequest): number {
    return request.temperature ?? this.modelConfig.temperature;
  }
}
