/**
 * Calendar helpers for bucket periods.
 *
 * All calendar arithmetic is done in UTC: a day bucket covers
 * [00:00Z, 24:00Z) of its date. Periods are inclusive YYYY-MM-DD ranges.
 */

import type { Period, SummaryTier } from '@tiermind/shared';
import { MemoryValidationError } from './errors.js';

export const DAY_MS = 86_400_000;

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const PART_SUFFIX_RE = /-p\d+$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function toDateKey(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

export function isValidDateKey(key: string): boolean {
  const match = DATE_KEY_RE.exec(key);
  if (!match) return false;
  const ts = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return toDateKey(ts) === key;
}

/** UTC midnight of the given date. */
export function parseDateKey(key: string): number {
  const match = DATE_KEY_RE.exec(key);
  if (!match || !isValidDateKey(key)) {
    throw new MemoryValidationError(`Invalid calendar date: ${key}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function addDays(key: string, days: number): string {
  return toDateKey(parseDateKey(key) + days * DAY_MS);
}

export function dailyId(key: string): string {
  return key.replaceAll('-', '');
}

export function dailyIdToDateKey(id: string): string {
  return `${id.slice(0, 4)}-${id.slice(4, 6)}-${id.slice(6, 8)}`;
}

export function isoWeekOf(key: string): { year: number; week: number } {
  const day = parseDateKey(key);
  const weekday = (new Date(day).getUTCDay() + 6) % 7; // Monday = 0
  const thursday = day + (3 - weekday) * DAY_MS;
  const year = new Date(thursday).getUTCFullYear();
  const week = 1 + Math.floor((thursday - Date.UTC(year, 0, 1)) / DAY_MS / 7);
  return { year, week };
}

export function weeklyId(key: string): string {
  const { year, week } = isoWeekOf(key);
  return `${year}-W${pad2(week)}`;
}

export function monthlyId(key: string): string {
  return key.slice(0, 7);
}

export function yearlyId(key: string): string {
  return key.slice(0, 4);
}

/** Strip the `-p{n}` suffix of a partial-period summary. */
export function baseGroupId(id: string): string {
  return id.replace(PART_SUFFIX_RE, '');
}

/** Calendar group a source period folds into for the given target tier. */
export function groupIdFor(toTier: SummaryTier, source: Period): string {
  switch (toTier) {
    case 'weekly':
      return weeklyId(source.start);
    case 'monthly':
      return monthlyId(source.start);
    case 'yearly':
      return yearlyId(source.start);
  }
}

/** Full calendar period of a weekly, monthly or yearly group id. */
export function groupPeriod(toTier: SummaryTier, groupId: string): Period {
  const id = baseGroupId(groupId);
  switch (toTier) {
    case 'weekly': {
      const match = /^(\d{4})-W(\d{2})$/.exec(id);
      if (!match) throw new MemoryValidationError(`Invalid week id: ${groupId}`);
      const year = Number(match[1]);
      const jan4 = Date.UTC(year, 0, 4);
      const week1Monday = jan4 - ((new Date(jan4).getUTCDay() + 6) % 7) * DAY_MS;
      const start = toDateKey(week1Monday + (Number(match[2]) - 1) * 7 * DAY_MS);
      return { start, end: addDays(start, 6) };
    }
    case 'monthly': {
      const start = `${id}-01`;
      const [year, month] = [Number(id.slice(0, 4)), Number(id.slice(5, 7))];
      return { start, end: toDateKey(Date.UTC(year, month, 1) - DAY_MS) };
    }
    case 'yearly':
      return { start: `${id}-01-01`, end: `${id}-12-31` };
  }
}

export function periodEndExclusive(period: Period): number {
  return parseDateKey(period.end) + DAY_MS;
}

/** Milliseconds since the period closed; negative while it is still open. */
export function closedForMs(period: Period, now: number): number {
  return now - periodEndExclusive(period);
}

export function periodsOverlap(a: Period, b: Period): boolean {
  return a.start <= b.end && b.start <= a.end;
}

export function periodContains(period: Period, key: string): boolean {
  return period.start <= key && key <= period.end;
}

export function ageInDays(timestamp: number, now: number): number {
  return Math.max(0, Math.floor((now - timestamp) / DAY_MS));
}

export function formatPeriod(period: Period): string {
  return period.start === period.end ? period.start : `${period.start} to ${period.end}`;
}
