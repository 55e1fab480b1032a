/**
 * UTC day helpers
 */

import { describe, it, expect } from 'vitest';
import {
  compactDate,
  eachUtcDay,
  eachUtcMonth,
  isWithinRange,
  parseUtcDay,
} from '../../../core/utils/date-range.js';

const range = (start: string, end: string) => ({ start: new Date(start), end: new Date(end) });

describe('eachUtcDay', () => {
  it('should include both ends and ignore the time of day', () => {
    const days = [...eachUtcDay(range('2021-07-30T18:00:00Z', '2021-08-01T01:00:00Z'))].map(compactDate);
    expect(days).toEqual(['20210730', '20210731', '20210801']);
  });
});

describe('eachUtcMonth', () => {
  it('should roll over the year', () => {
    expect([...eachUtcMonth(range('2021-11-15T00:00:00Z', '2022-01-02T00:00:00Z'))]).toEqual([
      { year: 2021, month: 11 },
      { year: 2021, month: 12 },
      { year: 2022, month: 1 },
    ]);
  });
});

describe('isWithinRange', () => {
  it('should compare calendar days', () => {
    const window = range('2021-07-14T12:00:00Z', '2021-07-15T00:00:00Z');
    expect(isWithinRange(new Date('2021-07-14T01:00:00Z'), window)).toBe(true);
    expect(isWithinRange(new Date('2021-07-15T23:59:59Z'), window)).toBe(true);
    expect(isWithinRange(new Date('2021-07-16T00:00:00Z'), window)).toBe(false);
  });
});

describe('parseUtcDay', () => {
  it('should accept dashed and compact forms', () => {
    expect(parseUtcDay('2021-07-14')?.toISOString()).toBe('2021-07-14T00:00:00.000Z');
    expect(parseUtcDay('20210714')?.toISOString()).toBe('2021-07-14T00:00:00.000Z');
  });

  it('should reject impossible days', () => {
    expect(parseUtcDay('2021-02-30')).toBeNull();
    expect(parseUtcDay('14/07/2021')).toBeNull();
  });
});
