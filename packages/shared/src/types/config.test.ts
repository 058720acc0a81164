import { describe, it, expect } from 'vitest';
import { ConfigSchema, PartialConfigSchema } from './config.js';

describe('ConfigSchema', () => {
  it('should produce a complete config from an empty object', () => {
    const config = ConfigSchema.parse({});
    expect(config.core.name).toBe('Tiermind');
    expect(config.logging.output).toEqual([{ type: 'stdout', format: 'pretty' }]);
    expect(config.model.provider).toBe('anthropic');
    expect(config.memory.cleanup).toMatchObject({
      softTrimAfterDays: 1,
      weeklyAfterDays: 7,
      monthlyAfterDays: 30,
      compressAfterDays: 90,
      yearlyAfterDays: 365,
      concurrency: 2,
    });
    expect(config.memory.context.maxCandidates).toEqual({
      daily: 30,
      weekly: 12,
      monthly: 6,
      yearly: 10,
    });
  });

  it('should keep the default explicit markers', () => {
    const config = ConfigSchema.parse({});
    expect(config.memory.scoring.explicitMarkers).toContain('keep in mind');
    expect(config.memory.protection.autoProtectMarkers).toEqual([
      'remember this',
      'never forget',
      "don't forget",
    ]);
  });

  it('should reject a budget fraction of zero', () => {
    const result = ConfigSchema.safeParse({ memory: { context: { budgetFraction: 0 } } });
    expect(result.success).toBe(false);
  });

  it('should reject an API key reference that is not an env var name', () => {
    const result = ConfigSchema.safeParse({ model: { apiKeyEnv: 'sk-test' } });
    expect(result.success).toBe(false);
  });
});

describe('PartialConfigSchema', () => {
  it('should accept deeply partial input without applying defaults to absent sections', () => {
    const result = PartialConfigSchema.parse({ memory: { cleanup: { concurrency: 4 } } });
    expect(result.core).toBeUndefined();
    expect(result.memory?.cleanup?.concurrency).toBe(4);
  });
});
