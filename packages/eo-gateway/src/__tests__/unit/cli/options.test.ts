import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { DEM_DATA_KINDS, dateRangeFrom, parseDay, parsePositiveInt } from '../../../cli/lib/options.js';

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('30')).toBe(30);
  });

  it.each(['0', '-1', '1.5', 'abc'])('should reject %s', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseDay', () => {
  it('should accept both day formats', () => {
    expect(parseDay('2021-07-01').toISOString()).toBe('2021-07-01T00:00:00.000Z');
    expect(parseDay('20210701').toISOString()).toBe('2021-07-01T00:00:00.000Z');
  });

  it('should reject impossible days', () => {
    expect(() => parseDay('2021-02-30')).toThrow('Expected a date as YYYY-MM-DD or YYYYMMDD.');
  });
});

describe('dateRangeFrom', () => {
  const start = new Date('2021-07-01T00:00:00Z');
  const end = new Date('2021-07-31T00:00:00Z');

  it('should build a range from both bounds', () => {
    expect(dateRangeFrom(start, end)).toEqual({ start, end });
    expect(dateRangeFrom(start, start)).toEqual({ start, end: start });
  });

  it('should return undefined without bounds', () => {
    expect(dateRangeFrom(undefined, undefined)).toBeUndefined();
  });

  it('should explain incomplete or reversed ranges', () => {
    expect(dateRangeFrom(start, undefined)).toBe('--start and --end must be given together');
    expect(dateRangeFrom(end, start)).toBe('--start must not be after --end');
  });
});

describe('DEM_DATA_KINDS', () => {
  it('should hold only DEM kinds', () => {
    expect([...DEM_DATA_KINDS].sort()).toEqual(['DemCOP1s', 'DemCOP3s', 'DemSRTM1s', 'DemSRTM3s']);
  });
});
