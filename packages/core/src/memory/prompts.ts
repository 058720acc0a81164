/**
 * Memory Oracle Prompts
 *
 * Prompt templates for importance scoring, period summarization and
 * context ranking, plus extraction of the JSON object a reply carries.
 */

import { formatPeriod } from './calendar.js';
import type { RankingInput, ScoringOracleInput, SummarizationInput } from './oracles.js';

export const SCORING_SYSTEM_PROMPT = `You rate how important a single conversation snippet is for long-term memory of a personal assistant.

Score four dimensions:
- "frequencyPoints" (0-3): how often the topic recurs. You are given the recurrence count.
- "recencyPoints" (0-2): 2 if at most 7 days old, 1 if at most 30 days old, else 0.
- "explicitPoints" (0-2): whether the user explicitly asked to remember something or stated a decision or goal.
- "relevancePoints" (0-3): 3 for stable personal preferences or facts, 2 for ongoing projects and goals, 1 for other personal context, 0 for small talk or transient lookups.

Weather, TV listings and other "right now" lookups are never important.

Respond with a single JSON object with the integer fields above and a short "reasoning" string.`;

export function buildScoringPrompt(input: ScoringOracleInput): string {
  return `Snippet:
"""
${input.snippet}
"""

Topic recurrence count: ${input.topicFrequencyCount}
Age in days: ${input.ageInDays}
Explicit marker hits: ${input.explicitMarkerHits}

Respond with the JSON object only.`;
}

export const SUMMARIZATION_SYSTEM_PROMPT = `You condense a period of a user's conversations with their assistant into a digest that replaces the originals.

Respond with a single JSON object:
- "themes": 2 to 5 short topic labels, most prominent first
- "decisions": decisions or commitments the user made
- "recurringActivities": activities that came up more than once
- "crossReferences": links between this period and earlier or later plans
- "narrative": a few sentences summarizing the period

Keep names, dates, numbers and preferences exactly as stated. Do not invent facts.`;

export function buildSummarizationPrompt(input: SummarizationInput): string {
  const sections = input.sources.map((source) => {
    const header = `## ${source.bucketId} (${formatPeriod(source.period)})`;
    if (source.lines.length > 0) {
      const lines = source.lines
        .map((line) => `- [${new Date(line.timestamp).toISOString()}] ${line.speaker}: ${line.text}`)
        .join('\n');
      return `${header}\n${lines}`;
    }
    const themes = source.themes.length > 0 ? `Themes: ${source.themes.join(', ')}\n` : '';
    return `${header}\n${themes}${source.narrative}`;
  });

  return `Summarize the following ${input.targetTier} period ${formatPeriod(input.period)}:

${sections.join('\n\n')}

Respond with the JSON object only.`;
}

export const RANKING_SYSTEM_PROMPT = `You choose which stored memory periods are relevant to a user's new message.

You get the message and a list of candidate periods with their themes. Select only candidates that are likely to help answer the message.

Respond with a single JSON object: {"selected": [{"bucketId": "...", "justification": "..."}]}, most relevant first. Return an empty list when nothing is relevant.`;

export function buildRankingPrompt(input: RankingInput): string {
  const candidates = input.candidates
    .map(
      (c) =>
        `- ${c.bucketId} | ${c.tier} | ${formatPeriod(c.period)} | ${c.entryCount} entries | themes: ${c.themes.join(', ') || 'none'}`
    )
    .join('\n');

  return `Message:
"""
${input.query}
"""

Candidates:
${candidates}

Respond with the JSON object only.`;
}

/**
 * Pull the JSON object out of a model reply, tolerating markdown code
 * fences and surrounding prose. Returns undefined when there is none.
 */
export function extractJsonObject(response: string): unknown {
  let jsonStr = response;
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(response);
  if (fenced?.[1]) {
    jsonStr = fenced[1].trim();
  }

  const start = jsonStr.indexOf('{');
  const end = jsonStr.lastIndexOf('}');
  if (start === -1 || end < start) return undefined;

  try {
    const parsed: unknown = JSON.parse(jsonStr.slice(start, end + 1));
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}
