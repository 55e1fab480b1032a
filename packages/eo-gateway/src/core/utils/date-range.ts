/**
 * UTC calendar-day helpers for acquisition date ranges
 */

import type { DateRange } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Every UTC day of the range, both ends included
 */
export function* eachUtcDay(range: DateRange): Generator<Date> {
  const last = startOfDay(range.end);
  for (let time = startOfDay(range.start); time <= last; time += DAY_MS) {
    yield new Date(time);
  }
}

/**
 * Every (year, month) touched by the range; month is 1-based
 */
export function* eachUtcMonth(range: DateRange): Generator<{ readonly year: number; readonly month: number }> {
  let year = range.start.getUTCFullYear();
  let month = range.start.getUTCMonth() + 1;
  const endYear = range.end.getUTCFullYear();
  const endMonth = range.end.getUTCMonth() + 1;

  while (year < endYear || (year === endYear && month <= endMonth)) {
    yield { year, month };
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
}

/**
 * True when the date falls on one of the range's days
 */
export function isWithinRange(date: Date, range: DateRange): boolean {
  const day = startOfDay(date);
  return day >= startOfDay(range.start) && day <= startOfDay(range.end);
}

/**
 * Compact UTC day, 20210714
 */
export function compactDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${date.getUTCFullYear()}${month}${day}`;
}

/**
 * Parse 2021-07-14 or 20210714 as a UTC day; null for anything else
 */
export function parseUtcDay(text: string): Date | null {
  const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(text.trim());
  if (!match) return null;
  const [year, month, day] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}
