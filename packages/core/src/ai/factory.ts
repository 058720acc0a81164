import type { ModelConfig } from '@tiermind/shared';
import { requireSecret } from '../config/loader.js';
import type { SecureLogger } from '../logging/logger.js';
import type { AIProvider } from './providers/base.js';
import { AnthropicProvider } from './providers/anthropic.js';

/**
 * Build the configured provider. The API key is read from the environment
 * variable named by `apiKeyEnv` and fails fast when unset.
 */
export function createProvider(
  model: ModelConfig,
  logger?: SecureLogger,
  env: NodeJS.ProcessEnv = process.env
): AIProvider {
  const apiKey = requireSecret(model.apiKeyEnv, env);
  switch (model.provider) {
    case 'anthropic':
      return new AnthropicProvider({ model, apiKey }, logger?.child({ component: 'AnthropicProvider' }));
  }
}
