/**
 * @fileoverview Bar interval enumeration and utilities.
 *
 * Values are the protocol codes the chart server expects in `create_series`
 * (plain minutes for sub-hour bars, `H`/`D`/`W`/`M` suffixes above that).
 *
 * @module @chartfeed/contracts/intervals
 */

import { InvalidQueryError } from './errors.js';

/**
 * Supported bar intervals, ordered from smallest to largest duration.
 *
 * @invariant String values must match the protocol's resolution codes
 */
export enum Interval {
  M1 = '1',
  M3 = '3',
  M5 = '5',
  M15 = '15',
  M30 = '30',
  M45 = '45',
  H1 = '1H',
  H2 = '2H',
  H3 = '3H',
  H4 = '4H',
  D1 = '1D',
  W1 = '1W',
  MN1 = '1M',
}

/**
 * Seconds covered by one bar. Monthly bars are counted as 30 days.
 *
 * @internal
 */
const INTERVAL_SECONDS: Record<Interval, number> = {
  [Interval.M1]: 60,
  [Interval.M3]: 180,
  [Interval.M5]: 300,
  [Interval.M15]: 900,
  [Interval.M30]: 1800,
  [Interval.M45]: 2700,
  [Interval.H1]: 3600,
  [Interval.H2]: 7200,
  [Interval.H3]: 10800,
  [Interval.H4]: 14400,
  [Interval.D1]: 86400,
  [Interval.W1]: 604800,
  [Interval.MN1]: 2592000,
};

/**
 * Approximate history depth the server keeps per intraday interval, in
 * calendar days. Daily and above are treated as unbounded.
 *
 * @internal
 */
const INTERVAL_MAX_HISTORY_DAYS: Partial<Record<Interval, number>> = {
  [Interval.M1]: 180,
  [Interval.M3]: 365,
  [Interval.M5]: 365,
  [Interval.M15]: 730,
  [Interval.M30]: 730,
  [Interval.M45]: 730,
  [Interval.H1]: 730,
  [Interval.H2]: 730,
  [Interval.H3]: 730,
  [Interval.H4]: 730,
};

const INTERVAL_LABELS: Record<Interval, string> = {
  [Interval.M1]: '1 Minute',
  [Interval.M3]: '3 Minutes',
  [Interval.M5]: '5 Minutes',
  [Interval.M15]: '15 Minutes',
  [Interval.M30]: '30 Minutes',
  [Interval.M45]: '45 Minutes',
  [Interval.H1]: '1 Hour',
  [Interval.H2]: '2 Hours',
  [Interval.H3]: '3 Hours',
  [Interval.H4]: '4 Hours',
  [Interval.D1]: 'Daily',
  [Interval.W1]: 'Weekly',
  [Interval.MN1]: 'Monthly',
};

const ALL_INTERVALS: readonly Interval[] = [
  Interval.M1,
  Interval.M3,
  Interval.M5,
  Interval.M15,
  Interval.M30,
  Interval.M45,
  Interval.H1,
  Interval.H2,
  Interval.H3,
  Interval.H4,
  Interval.D1,
  Interval.W1,
  Interval.MN1,
];

/**
 * Validates whether a string is a valid Interval value.
 *
 * @example
 * ```typescript
 * isValidInterval('15')   // true
 * isValidInterval('10')   // false
 * ```
 */
export function isValidInterval(value: string): value is Interval {
  return ALL_INTERVALS.some((interval) => interval === value);
}

/**
 * Parses a string into an Interval, throwing if invalid.
 *
 * @throws {InvalidQueryError} If value is not a supported interval
 *
 * @example
 * ```typescript
 * parseInterval('1D')   // Interval.D1
 * parseInterval('2D')   // throws InvalidQueryError
 * ```
 */
export function parseInterval(value: string): Interval {
  if (!isValidInterval(value)) {
    throw new InvalidQueryError(
      `Invalid interval: ${value}. Must be one of: ${ALL_INTERVALS.join(', ')}`,
      { interval: value }
    );
  }
  return value;
}

/**
 * Seconds per bar for an interval.
 *
 * @example
 * ```typescript
 * intervalToSeconds(Interval.M15)  // 900
 * intervalToSeconds(Interval.D1)   // 86400
 * ```
 */
export function intervalToSeconds(interval: Interval): number {
  return INTERVAL_SECONDS[interval];
}

/**
 * True for intervals shorter than one day.
 */
export function isIntraday(interval: Interval): boolean {
  return INTERVAL_SECONDS[interval] < 86400;
}

/**
 * Maximum history depth in calendar days, or undefined when unbounded.
 */
export function getMaxHistoryDays(interval: Interval): number | undefined {
  return INTERVAL_MAX_HISTORY_DAYS[interval];
}

/**
 * Gets a human-readable label for an interval.
 */
export function getIntervalLabel(interval: Interval): string {
  return INTERVAL_LABELS[interval];
}

/**
 * Returns all supported intervals in ascending order.
 */
export function getAllIntervals(): Interval[] {
  return [...ALL_INTERVALS];
}
