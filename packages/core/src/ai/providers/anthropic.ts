/**
 * Anthropic Claude Provider
 *
 * Messages API through @anthropic-ai/sdk. The SDK's own retries are
 * disabled so that RetryManager is the single retry policy. `baseUrl`
 * points the client at a compatible proxy when set.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AIRequest, AIResponse, AIMessage, AIProviderName } from '@tiermind/shared';
import { BaseProvider, type ChatOptions, type ProviderConfig } from './base.js';
import type { RetryManagerDeps } from '../retry-manager.js';
import {
  RateLimitError,
  TokenLimitError,
  AuthenticationError,
  ProviderUnavailableError,
  ProviderTimeoutError,
  InvalidResponseError,
} from '../errors.js';
import type { SecureLogger } from '../../logging/logger.js';

export class AnthropicProvider extends BaseProvider {
  readonly name: AIProviderName = 'anthropic';
  private readonly client: Anthropic;

  constructor(config: ProviderConfig, logger?: SecureLogger, retryDeps?: RetryManagerDeps) {
    super(config, logger, retryDeps);
    this.client = new Anthropic({
      apiKey: this.apiKey,
      timeout: this.modelConfig.requestTimeoutMs,
      maxRetries: 0,
      ...(this.modelConfig.baseUrl ? { baseURL: this.modelConfig.baseUrl } : {}),
    });
  }

  protected async doChat(request: AIRequest, options: ChatOptions): Promise<AIResponse> {
    const { system, messages } = this.mapMessages(request.messages);
    const model = this.resolveModel(request);

    try {
      const response = await this.client.messages.create(
        {
          model,
          max_tokens: this.resolveMaxTokens(request),
          temperature: this.resolveTemperature(request),
          messages,
          ...(system ? { system } : {}),
          ...(request.stopSequences?.length ? { stop_sequences: request.stopSequences } : {}),
        },
        { signal: options.signal }
      );
      return this.mapResponse(response, model);
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw this.mapError(error);
    }
  }

  // ─── Mapping Helpers ─────────────────────────────────────────

  private mapMessages(messages: AIMessage[]): {
    system: string | undefined;
    messages: Anthropic.MessageParam[];
  } {
    const systemParts: string[] = [];
    const mapped: Anthropic.MessageParam[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemParts.push(msg.content);
      } else {
        mapped.push({ role: msg.role, content: msg.content });
      }
    }

    return { system: systemParts.length ? systemParts.join('\n\n') : undefined, messages: mapped };
  }

  private mapResponse(response: Anthropic.Message, model: string): AIResponse {
    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      id: response.id,
      content,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: this.mapStopReason(response.stop_reason),
      model,
      provider: 'anthropic',
    };
  }

  private mapStopReason(reason: string | null): AIResponse['stopReason'] {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return 'end_turn';
    }
  }

  private mapError(error: unknown): Error {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new ProviderTimeoutError('anthropic', error);
    }
    if (error instanceof Anthropic.APIError) {
      if (error.status === 429) {
        const retryAfter = error.headers?.['retry-after'];
        return new RateLimitError('anthropic', retryAfter ? parseInt(retryAfter, 10) : undefined, error);
      }
      if (error.status === 401) {
        return new AuthenticationError('anthropic', error);
      }
      if (error.status === 400 && error.message.includes('token')) {
        return new TokenLimitError('anthropic', error);
      }
      if (error.status === 502 || error.status === 503 || error.status === 529) {
        return new ProviderUnavailableError('anthropic', error.status, error);
      }
      return new InvalidResponseError('anthropic', error.message, error);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
