/**
 * Configuration Types for Tiermind
 *
 * - Secret values are never stored in config, only references (env vars)
 * - All paths are validated to prevent path traversal
 * - Thresholds and limits have maximum bounds
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

// Environment variable reference (for secrets)
const EnvVarRefSchema = z.string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Must be a valid environment variable name');

// Core configuration
export const CoreConfigSchema = z.object({
  name: z.string().default('Tiermind'),
  environment: z.enum(['development', 'staging', 'production']).default('development'),
  dataDir: SafePathSchema.default('~/.tiermind/data'),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: z.enum(['json', 'pretty']).default('pretty'),
    }),
  ])).default([{ type: 'stdout', format: 'pretty' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Gateway/API configuration
export const GatewayConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1024).max(65535).default(18790),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// Model/AI configuration
export const ModelConfigSchema = z.object({
  provider: z.enum(['anthropic']).default('anthropic'),
  model: z.string().default('claude-sonnet-4-20250514'),
  apiKeyEnv: EnvVarRefSchema.default('ANTHROPIC_API_KEY'),
  baseUrl: z.string().url().optional(),

  // Request limits
  maxTokens: z.number().int().positive().max(200000).default(2048),
  temperature: z.number().min(0).max(2).default(0.3),

  // Size of the model's context window; the memory budget is a fraction of it
  contextWindowTokens: z.number().int().positive().max(2_000_000).default(128000),

  // Timeout
  requestTimeoutMs: z.number().int().positive().max(300000).default(60000),

  // Retry configuration
  maxRetries: z.number().int().min(0).max(10).default(2),
  retryDelayMs: z.number().int().positive().default(1000),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;

// ─── Memory ─────────────────────────────────────────────────

const ProtectionConfigSchema = z.object({
  windowDays: z.number().int().min(0).max(90).default(7),
  autoProtectMarkers: z.array(z.string().min(1)).default([
    'remember this',
    'never forget',
    "don't forget",
  ]),
}).default({});

const ScoringConfigSchema = z.object({
  explicitMarkers: z.array(z.string().min(1)).default([
    'remember this',
    'important',
    'decision',
    "don't forget",
    'never forget',
    'note that',
    'keep in mind',
    'goal',
    'plan',
  ]),
  temporaryMarkers: z.array(z.string().min(1)).default([
    'weather',
    'forecast',
    'tv tonight',
    'tv program',
    "what's on tv",
    'news today',
    'right now',
  ]),
  oracleTimeoutMs: z.number().int().positive().max(120000).default(15000),
  topicWindowDays: z.number().int().positive().max(365).default(30),
}).default({});

const SummarizerConfigSchema = z.object({
  minScoreForHighlight: z.number().int().min(0).max(10).default(5),
  maxTrimScore: z.number().int().min(0).max(10).default(1),
  trimmedLineChars: z.number().int().min(20).max(500).default(120),
  oracleTimeoutMs: z.number().int().positive().max(300000).default(60000),
}).default({});

const TierCeilingsSchema = z.object({
  daily: z.number().int().positive().default(20 * 1024 * 1024),
  weekly: z.number().int().positive().default(20 * 1024 * 1024),
  monthly: z.number().int().positive().default(20 * 1024 * 1024),
  yearly: z.number().int().positive().default(50 * 1024 * 1024),
  archive: z.number().int().positive().default(100 * 1024 * 1024),
}).default({});

const CleanupConfigSchema = z.object({
  softTrimAfterDays: z.number().int().min(0).max(30).default(1),
  weeklyAfterDays: z.number().int().min(1).max(60).default(7),
  monthlyAfterDays: z.number().int().min(1).max(120).default(30),
  compressAfterDays: z.number().int().min(1).max(3650).default(90),
  yearlyAfterDays: z.number().int().min(1).max(3650).default(365),
  ceilingsBytes: TierCeilingsSchema,
  intervalMs: z.number().int().positive().max(7 * 86400000).default(86400000),
  concurrency: z.number().int().positive().max(32).default(2),
  snapshotRetention: z.number().int().min(1).max(100).default(10),
}).default({});

const ContextConfigSchema = z.object({
  recentDays: z.number().int().min(0).max(31).default(3),
  budgetFraction: z.number().gt(0).max(1).default(0.5),
  rankingTimeoutMs: z.number().int().positive().max(60000).default(3000),
  minQueryLength: z.number().int().min(0).max(200).default(10),
  maxCandidates: z.object({
    daily: z.number().int().min(0).max(365).default(30),
    weekly: z.number().int().min(0).max(104).default(12),
    monthly: z.number().int().min(0).max(60).default(6),
    yearly: z.number().int().min(0).max(50).default(10),
  }).default({}),
}).default({});

export const MemoryConfigSchema = z.object({
  protection: ProtectionConfigSchema,
  scoring: ScoringConfigSchema,
  summarizer: SummarizerConfigSchema,
  cleanup: CleanupConfigSchema,
  context: ContextConfigSchema,
});

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

// Complete configuration schema
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  core: CoreConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging. Every field carries a default, so the schema
// input type is already deeply optional.
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.input<typeof ConfigSchema>;
