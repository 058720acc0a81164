/**
 * AI Types for Tiermind
 *
 * Shared type definitions and Zod schemas for the model client layer that
 * backs the scoring, summarization and ranking oracles.
 */

import { z } from 'zod';

// ─── Token Usage ──────────────────────────────────────────────

export const TokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
});

export type TokenUsage = z.infer<typeof TokenUsageSchema>;

// ─── Messages ─────────────────────────────────────────────────

export const AIMessageRoleSchema = z.enum(['system', 'user', 'assistant']);
export type AIMessageRole = z.infer<typeof AIMessageRoleSchema>;

export const AIMessageSchema = z.object({
  role: AIMessageRoleSchema,
  content: z.string(),
});

export type AIMessage = z.infer<typeof AIMessageSchema>;

// ─── Request ──────────────────────────────────────────────────

export const AIRequestSchema = z.object({
  messages: z.array(AIMessageSchema).min(1),
  maxTokens: z.number().int().positive().max(200000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  stopSequences: z.array(z.string()).optional(),
  model: z.string().optional(),
});

export type AIRequest = z.input<typeof AIRequestSchema>;

// ─── Response ─────────────────────────────────────────────────

export const StopReasonSchema = z.enum(['end_turn', 'max_tokens', 'stop_sequence', 'error']);

export type StopReason = z.infer<typeof StopReasonSchema>;

export const AIResponseSchema = z.object({
  id: z.string(),
  content: z.string(),
  usage: TokenUsageSchema,
  stopReason: StopReasonSchema,
  model: z.string(),
  provider: z.string(),
});

export type AIResponse = z.infer<typeof AIResponseSchema>;

export const AIProviderNameSchema = z.enum(['anthropic']);
export type AIProviderName = z.infer<typeof AIProviderNameSchema>;
