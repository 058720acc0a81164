import { describe, it, expect } from 'vitest';
import { topicsOf, countTopics, topTopics, tokenize } from './topics.js';

describe('topics', () => {
  it('tokenizes on letters and digits', () => {
    expect(tokenize("Hiking in the Alps, isn't it?")).toEqual(['hiking', 'in', 'the', 'alps', "isn't", 'it']);
  });

  it('drops stopwords, short words and numbers', () => {
    expect(topicsOf('I would really like to plan the hiking trip for 2026 with Anna')).toEqual([
      'plan',
      'hiking',
      'trip',
      'anna',
    ]);
  });

  it('returns each topic once', () => {
    expect(topicsOf('garden garden GARDEN')).toEqual(['garden']);
  });

  it('ignores words longer than forty characters', () => {
    expect(topicsOf(`garden ${'x'.repeat(41)} ${'y'.repeat(40)}`)).toEqual(['garden', 'y'.repeat(40)]);
  });

  it('counts document frequency across texts', () => {
    const counts = countTopics(['garden tomatoes', 'garden watering', 'tomatoes tomatoes']);
    expect(counts.get('garden')).toBe(2);
    expect(counts.get('tomatoes')).toBe(2);
    expect(counts.get('watering')).toBe(1);
  });

  it('orders top topics by count then name', () => {
    const counts = new Map([
      ['zebra', 2],
      ['apple', 2],
      ['mango', 5],
      ['kiwi', 1],
    ]);
    expect(topTopics(counts, 3)).toEqual([
      { topic: 'mango', count: 5 },
      { topic: 'apple', count: 2 },
      { topic: 'zebra', count: 2 },
    ]);
  });
});
