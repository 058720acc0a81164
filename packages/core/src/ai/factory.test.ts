import { describe, it, expect } from 'vitest';
import { ModelConfigSchema } from '@tiermind/shared';
import { createProvider } from './factory.js';
import { AnthropicProvider } from './providers/anthropic.js';

describe('createProvider', () => {
  it('builds an Anthropic provider from the configured key variable', () => {
    const model = ModelConfigSchema.parse({ apiKeyEnv: 'TEST_ANTHROPIC_KEY' });
    const provider = createProvider(model, undefined, { TEST_ANTHROPIC_KEY: 'test-secret' });
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe('anthropic');
  });

  it('fails fast when the key variable is unset', () => {
    const model = ModelConfigSchema.parse({ apiKeyEnv: 'TEST_ANTHROPIC_KEY' });
    expect(() => createProvider(model, undefined, {})).toThrow(
      'Required secret not set: TEST_ANTHROPIC_KEY'
    );
  });
});
