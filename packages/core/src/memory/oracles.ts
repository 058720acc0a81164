/**
 * Oracle contracts — the three narrow seams through which the memory
 * pipeline consults a language model.
 *
 * The output schemas check structure only. Value ranges are the caller's
 * concern: the scorer clamps and falls back, the summarizer caps theme
 * counts, the context loader ignores unknown bucket ids.
 */

import { z } from 'zod';
import type { Period, SummaryTier, BucketTier, Speaker } from '@tiermind/shared';
import { OracleTimeoutError } from './errors.js';

// ─── Scoring ──────────────────────────────────────────────────

export interface ScoringOracleInput {
  snippet: string;
  topicFrequencyCount: number;
  ageInDays: number;
  explicitMarkerHits: number;
}

export const ScoringOracleOutputSchema = z.object({
  frequencyPoints: z.number(),
  recencyPoints: z.number(),
  explicitPoints: z.number(),
  relevancePoints: z.number(),
  reasoning: z.string().default(''),
});
export type ScoringOracleOutput = z.infer<typeof ScoringOracleOutputSchema>;

export interface ScoringOracle {
  score(input: ScoringOracleInput, signal?: AbortSignal): Promise<ScoringOracleOutput>;
}

// ─── Summarization ────────────────────────────────────────────

export interface SummarizationLine {
  speaker: Speaker;
  timestamp: number;
  text: string;
}

export interface SummarizationSource {
  bucketId: string;
  tier: BucketTier;
  period: Period;
  /** Log buckets contribute entries; summaries contribute their digest. */
  lines: SummarizationLine[];
  themes: string[];
  narrative: string;
}

export interface SummarizationInput {
  targetTier: SummaryTier;
  period: Period;
  sources: SummarizationSource[];
}

export const SummarizationOracleOutputSchema = z.object({
  themes: z.array(z.string()),
  decisions: z.array(z.string()).default([]),
  recurringActivities: z.array(z.string()).default([]),
  crossReferences: z.array(z.string()).default([]),
  narrative: z.string(),
});
export type SummarizationOracleOutput = z.infer<typeof SummarizationOracleOutputSchema>;

export interface SummarizationOracle {
  summarize(input: SummarizationInput, signal?: AbortSignal): Promise<SummarizationOracleOutput>;
}

// ─── Ranking ──────────────────────────────────────────────────

export interface RankingCandidate {
  bucketId: string;
  tier: BucketTier;
  period: Period;
  themes: string[];
  entryCount: number;
}

export interface RankingInput {
  query: string;
  candidates: RankingCandidate[];
}

export const RankingOracleOutputSchema = z.object({
  selected: z.array(
    z.object({
      bucketId: z.string(),
      justification: z.string().default(''),
    })
  ),
});
export type RankingOracleOutput = z.infer<typeof RankingOracleOutputSchema>;

export interface RankingOracle {
  rank(input: RankingInput, signal?: AbortSignal): Promise<RankingOracleOutput>;
}

// ─── Timeout ──────────────────────────────────────────────────

/**
 * Run an oracle call with a deadline. The callback receives a signal that
 * fires on timeout or when `parent` aborts; the returned promise rejects
 * with `OracleTimeoutError` or the parent's abort reason respectively.
 */
export async function withTimeout<T>(
  oracle: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(() => controller.abort(new OracleTimeoutError(oracle, timeoutMs)), timeoutMs);

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
