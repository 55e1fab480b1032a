/**
 * Option parsers shared by the commands
 *
 * Parsers throw commander's InvalidArgumentError so bad flag values are
 * reported by commander itself, before any command runs.
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError } from 'commander';
import { DATA_KINDS, isDemDataKind, type DateRange, type DemDataKind } from '../../core/types.js';
import { parseUtcDay } from '../../core/utils/date-range.js';

export const DEM_DATA_KINDS: readonly DemDataKind[] = DATA_KINDS.filter(isDemDataKind);

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * 2021-07-01 or 20210701, as midnight UTC
 */
export function parseDay(value: string): Date {
  const day = parseUtcDay(value);
  if (!day) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD or YYYYMMDD.');
  }
  return day;
}

/**
 * Date range of a pair of --start / --end flags
 *
 * @returns undefined when neither flag is set, an error message when the pair
 *   is incomplete or reversed
 */
export function dateRangeFrom(start: Date | undefined, end: Date | undefined): DateRange | undefined | string {
  if (start === undefined && end === undefined) return undefined;
  if (start === undefined || end === undefined) {
    return '--start and --end must be given together';
  }
  if (start.getTime() > end.getTime()) {
    return '--start must not be after --end';
  }
  return { start, end };
}
