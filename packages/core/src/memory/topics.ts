/**
 * Topic extraction
 *
 * Cheap keyword topics used for frequency scoring, daily bucket themes,
 * index statistics and the local fallback ranking. Words shorter than four
 * letters, words longer than forty (pasted URLs, hashes, encoded blobs) and
 * stopwords are ignored.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

const MIN_TOPIC_LENGTH = 4;
const MAX_TOPIC_LENGTH = 40;

let stopwords: ReadonlySet<string> | null = null;

function loadStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'data', 'stopwords.json'), 'utf-8'));
    const words = Array.isArray(raw) ? raw.filter((w): w is string => typeof w === 'string') : [];
    stopwords = new Set(words);
  }
  return stopwords;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}

/** Distinct topic words of a text, in order of first appearance. */
export function topicsOf(text: string): string[] {
  const stop = loadStopwords();
  const seen = new Set<string>();
  for (const raw of tokenize(text)) {
    const word = raw.replace(/^'+|'+$/g, '');
    if (word.length >= MIN_TOPIC_LENGTH && word.length <= MAX_TOPIC_LENGTH && !stop.has(word) && !/^\d+$/.test(word)) {
      seen.add(word);
    }
  }
  return [...seen];
}

/**
 * Count in how many of the given texts each topic appears.
 */
export function countTopics(texts: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const topic of topicsOf(text)) {
      counts.set(topic, (counts.get(topic) ?? 0) + 1);
    }
  }
  return counts;
}

/** Most frequent topics, ties broken alphabetically. */
export function topTopics(counts: ReadonlyMap<string, number>, limit: number): Array<{ topic: string; count: number }> {
  return [...counts.entries()]
    .map(([topic, count]) => ({ topic, count }))
    .sort((a, b) => b.count - a.count || a.topic.localeCompare(b.topic))
    .slice(0, limit);
}
