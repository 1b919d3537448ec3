/**
 * Range-mode planning: date normalization, history-depth clamp, chunk
 * sizing, the chunk windows and their range tokens.
 *
 * Pure functions; `now` is always passed in.
 */

import {
  InvalidQueryError,
  SAFE_BAR_RATIO,
  getMaxHistoryDays,
  intervalToSeconds,
  isIntraday,
  type Interval,
} from '@chartfeed/contracts';

export const MS_PER_DAY = 86_400_000;

/**
 * Start used when a range request gives only an end: 2000-01-01T00:00:00Z.
 */
export const DEFAULT_START_MS = Date.UTC(2000, 0, 1);

/**
 * Both bounds of an intraday range token move back by this much to line
 * up with the server's session-boundary rounding.
 */
export const INTRADAY_SHIFT_MS = 1_800_000;

/**
 * Half-open window `[startMs, endMs)` in epoch milliseconds.
 */
export interface ChunkWindow {
  startMs: number;
  endMs: number;
}

export type DateRange = ChunkWindow;

export type DateInput = Date | string | number;

/**
 * Converts a Date, ISO 8601 string or epoch-ms number.
 *
 * @throws {InvalidQueryError} If the value is not a valid instant
 */
export function toEpochMs(value: DateInput, field: string): number {
  const ms = value instanceof Date ? value.getTime() : typeof value === 'number' ? value : Date.parse(value);
  if (!Number.isFinite(ms)) {
    throw new InvalidQueryError(`Invalid ${field} date: ${String(value)}`, { field, value: String(value) });
  }
  return ms;
}

/**
 * Defaults a missing start to 2000-01-01, clamps the end to `now`.
 *
 * @throws {InvalidQueryError} If a bound is unparsable or start >= end
 */
export function normalizeDateRange(start: DateInput | undefined, end: DateInput | undefined, now: number): DateRange {
  const startMs = start === undefined ? DEFAULT_START_MS : toEpochMs(start, 'start');
  const requestedEnd = end === undefined ? now : toEpochMs(end, 'end');
  const endMs = Math.min(requestedEnd, now);

  if (startMs >= endMs) {
    throw new InvalidQueryError('start must be before end', {
      start: new Date(startMs).toISOString(),
      end: new Date(endMs).toISOString(),
    });
  }

  return { startMs, endMs };
}

/**
 * Moves the start forward to `end - maxHistoryDays` for intervals with
 * limited history.
 */
export function clampToHistoryDepth(range: DateRange, interval: Interval): { range: DateRange; clamped: boolean } {
  const maxDays = getMaxHistoryDays(interval);
  if (maxDays === undefined) {
    return { range, clamped: false };
  }

  const earliest = range.endMs - maxDays * MS_PER_DAY;
  if (range.startMs >= earliest) {
    return { range, clamped: false };
  }

  return { range: { startMs: earliest, endMs: range.endMs }, clamped: true };
}

/**
 * Bars requested per chunk: 80% of the plan's per-query cap.
 */
export function safeBarCount(planBarLimit: number): number {
  return Math.floor(planBarLimit * SAFE_BAR_RATIO);
}

/**
 * Calendar days per chunk so one chunk stays under the safe bar count.
 *
 * @example
 * ```typescript
 * computeChunkDays(5000, Interval.M15)  // floor(4000 * 900 / 86400) = 41
 * computeChunkDays(5000, Interval.M1)   // floor(4000 * 60 / 86400) = 2
 * ```
 */
export function computeChunkDays(planBarLimit: number, interval: Interval): number {
  const days = Math.floor((safeBarCount(planBarLimit) * intervalToSeconds(interval)) / 86_400);
  return Math.max(1, days);
}

/**
 * Contiguous windows of `chunkDays` days covering `[startMs, endMs)`; the
 * last one is cut at `endMs`.
 *
 * @throws {InvalidQueryError} If chunkDays is not a positive integer
 */
export function planChunks(range: DateRange, chunkDays: number): ChunkWindow[] {
  if (!Number.isInteger(chunkDays) || chunkDays < 1) {
    throw new InvalidQueryError(`chunkDays must be a positive integer: ${chunkDays}`, { chunkDays });
  }

  const step = chunkDays * MS_PER_DAY;
  const windows: ChunkWindow[] = [];
  for (let cursor = range.startMs; cursor < range.endMs; cursor += step) {
    windows.push({ startMs: cursor, endMs: Math.min(cursor + step, range.endMs) });
  }
  return windows;
}

/**
 * `r,<start>:<end>` token for `create_series`, shifted back 30 minutes for
 * intraday intervals.
 *
 * @example
 * ```typescript
 * toRangeToken({ startMs: 1704067200000, endMs: 1704153600000 }, Interval.D1)
 * // 'r,1704067200000:1704153600000'
 * ```
 */
export function toRangeToken(window: ChunkWindow, interval: Interval): string {
  const shift = isIntraday(interval) ? INTRADAY_SHIFT_MS : 0;
  return `r,${window.startMs - shift}:${window.endMs - shift}`;
}

/**
 * Rough bar count to expect for a range, for log context only.
 */
export interface CoverageEstimate {
  calendarDays: number;
  tradingDays: number;
  /** Regular-session bars per trading day; undefined for daily and above */
  barsPerDay?: number;
  expectedBars: number;
}

const TRADING_DAYS_PER_YEAR = 252;

const REGULAR_SESSION_SECONDS = 6.5 * 3600;

export function estimateCoverage(range: DateRange, interval: Interval): CoverageEstimate {
  const calendarDays = Math.floor((range.endMs - range.startMs) / MS_PER_DAY);
  const tradingDays = Math.floor((calendarDays * TRADING_DAYS_PER_YEAR) / 365);

  if (!isIntraday(interval)) {
    return { calendarDays, tradingDays, expectedBars: tradingDays };
  }

  const barsPerDay = Math.floor(REGULAR_SESSION_SECONDS / intervalToSeconds(interval));
  return { calendarDays, tradingDays, barsPerDay, expectedBars: tradingDays * barsPerDay };
}
