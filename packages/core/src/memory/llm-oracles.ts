/**
 * LLM-backed oracles over an AIProvider.
 *
 * Each oracle sends a system prompt plus a rendered user prompt, extracts
 * the JSON object from the reply and validates it against the oracle's
 * output schema. Provider timeouts surface as OracleTimeoutError, unusable
 * replies as OracleMalformedResponseError; other provider errors pass
 * through unchanged.
 */

import type { z } from 'zod';
import type { AIProvider } from '../ai/providers/base.js';
import { ProviderTimeoutError } from '../ai/errors.js';
import type { SecureLogger } from '../logging/logger.js';
import { OracleMalformedResponseError, OracleTimeoutError } from './errors.js';
import {
  RankingOracleOutputSchema,
  ScoringOracleOutputSchema,
  SummarizationOracleOutputSchema,
  type RankingInput,
  type RankingOracle,
  type RankingOracleOutput,
  type ScoringOracle,
  type ScoringOracleInput,
  type ScoringOracleOutput,
  type SummarizationInput,
  type SummarizationOracle,
  type SummarizationOracleOutput,
} from './oracles.js';
import {
  RANKING_SYSTEM_PROMPT,
  SCORING_SYSTEM_PROMPT,
  SUMMARIZATION_SYSTEM_PROMPT,
  buildRankingPrompt,
  buildScoringPrompt,
  buildSummarizationPrompt,
  extractJsonObject,
} from './prompts.js';

export interface LlmOracleOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Reported on OracleTimeoutError when the provider itself times out. */
  timeoutMs?: number;
  logger?: SecureLogger;
}

abstract class LlmOracle {
  protected abstract readonly oracleName: string;

  constructor(
    protected readonly provider: AIProvider,
    protected readonly options: LlmOracleOptions = {}
  ) {}

  protected async ask<S extends z.ZodTypeAny>(
    system: string,
    prompt: string,
    schema: S,
    defaults: { maxTokens: number; temperature: number },
    signal?: AbortSignal
  ): Promise<z.output<S>> {
    signal?.throwIfAborted();

    let content: string;
    try {
      const response = await this.provider.chat(
        {
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: prompt },
          ],
          model: this.options.model,
          maxTokens: this.options.maxTokens ?? defaults.maxTokens,
          temperature: this.options.temperature ?? defaults.temperature,
        },
        { signal }
      );
      content = response.content;
    } catch (error) {
      if (error instanceof ProviderTimeoutError) {
        throw new OracleTimeoutError(this.oracleName, this.options.timeoutMs ?? 0, error);
      }
      throw error;
    }
    signal?.throwIfAborted();

    const raw = extractJsonObject(content);
    if (raw === undefined) {
      this.options.logger?.debug('Oracle reply carried no JSON object', { oracle: this.oracleName });
      throw new OracleMalformedResponseError(this.oracleName, 'no JSON object in reply');
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'schema mismatch';
      throw new OracleMalformedResponseError(this.oracleName, detail, parsed.error);
    }
    return parsed.data;
  }
}

export class LlmScoringOracle extends LlmOracle implements ScoringOracle {
  protected readonly oracleName = 'scoring';

  async score(input: ScoringOracleInput, signal?: AbortSignal): Promise<ScoringOracleOutput> {
    return this.ask(
      SCORING_SYSTEM_PROMPT,
      buildScoringPrompt(input),
      ScoringOracleOutputSchema,
      { maxTokens: 300, temperature: 0 },
      signal
    );
  }
}

export class LlmSummarizationOracle extends LlmOracle implements SummarizationOracle {
  protected readonly oracleName = 'summarization';

  async summarize(input: SummarizationInput, signal?: AbortSignal): Promise<SummarizationOracleOutput> {
    return this.ask(
      SUMMARIZATION_SYSTEM_PROMPT,
      buildSummarizationPrompt(input),
      SummarizationOracleOutputSchema,
      { maxTokens: 2000, temperature: 0.2 },
      signal
    );
  }
}

export class LlmRankingOracle extends LlmOracle implements RankingOracle {
  protected readonly oracleName = 'ranking';

  async rank(input: RankingInput, signal?: AbortSignal): Promise<RankingOracleOutput> {
    return this.ask(
      RANKING_SYSTEM_PROMPT,
      buildRankingPrompt(input),
      RankingOracleOutputSchema,
      { maxTokens: 800, temperature: 0 },
      signal
    );
  }
}
