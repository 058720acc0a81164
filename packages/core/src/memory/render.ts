/**
 * Plain-text rendering of buckets for prompts and token accounting.
 */

import type { Bucket, LogBucket, MemoryIndex, ProtectedFact, SummaryBucket } from '@tiermind/shared';
import { formatPeriod } from './calendar.js';

const TIER_LABEL = {
  daily: 'Day',
  weekly: 'Week',
  monthly: 'Month',
  yearly: 'Year',
} as const;

function clock(ts: number): string {
  return new Date(ts).toISOString().slice(11, 16);
}

function speakerLabel(speaker: 'user' | 'assistant'): string {
  return speaker === 'user' ? 'User' : 'Assistant';
}

function renderLog(bucket: LogBucket): string {
  const lines = bucket.entries.map((e) =>
    e.trimmed ? `[${clock(e.timestamp)}] ${e.text}` : `[${clock(e.timestamp)}] ${speakerLabel(e.speaker)}: ${e.text}`
  );
  return [`### ${TIER_LABEL.daily} ${bucket.period.start}`, ...lines].join('\n');
}

function section(title: string, items: readonly string[]): string[] {
  return items.length > 0 ? [`${title}:`, ...items.map((i) => `- ${i}`)] : [];
}

function renderSummary(bucket: SummaryBucket): string {
  const out = [`### ${TIER_LABEL[bucket.tier]} ${bucket.id} (${formatPeriod(bucket.period)})`];
  if (bucket.themes.length > 0) out.push(`Themes: ${bucket.themes.join(', ')}`);
  if (bucket.narrative) out.push(bucket.narrative);
  out.push(
    ...section(
      'Highlights',
      bucket.highlights.map((h) => `${h.timestamp > 0 ? `${new Date(h.timestamp).toISOString().slice(0, 10)} ` : ''}${h.text}`)
    ),
    ...section('Decisions', bucket.decisions),
    ...section('Recurring', bucket.recurringActivities),
    ...section('Related', bucket.crossReferences),
    ...section('Kept verbatim', bucket.pinned.map((p) => `${speakerLabel(p.speaker)}: ${p.text}`))
  );
  return out.join('\n');
}

export function renderBucket(bucket: Bucket): string {
  return bucket.kind === 'log' ? renderLog(bucket) : renderSummary(bucket);
}

export function renderProtectedFacts(facts: readonly ProtectedFact[]): string {
  if (facts.length === 0) return '';
  return ['### Always remember', ...facts.map((f) => `- ${f.text}${f.note ? ` (${f.note})` : ''}`)].join('\n');
}

export function renderIndex(index: MemoryIndex): string {
  const out = [
    '### Memory overview',
    `Stored: ${index.tiers.daily.length} days, ${index.tiers.weekly.length} weeks, ` +
      `${index.tiers.monthly.length} months, ${index.tiers.yearly.length} years; ${index.archive.buckets} archived`,
  ];
  if (index.stats.topTopics.length > 0) {
    out.push(`Frequent topics: ${index.stats.topTopics.map((t) => t.topic).join(', ')}`);
  }
  out.push(
    ...section(
      'Highlights',
      index.highlights.map((h) => `${new Date(h.timestamp).toISOString().slice(0, 10)} ${h.text}`)
    )
  );
  return out.join('\n');
}
