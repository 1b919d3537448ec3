/**
 * Bar clipping utilities.
 *
 * Extracts the bars of a sorted series that fall inside a timestamp range.
 * Both bounds are inclusive: a request for [start, end] keeps a bar stamped
 * exactly at `end`.
 */

import type { Bar } from "@chartfeed/contracts";

/**
 * Clips bars to the closed range [from, to].
 *
 * Uses binary search on the (assumed ascending) timestamps.
 *
 * @param bars - Bars sorted by timestamp ascending
 * @param from - Lower bound in epoch ms, inclusive. Omit for no lower bound.
 * @param to - Upper bound in epoch ms, inclusive. Omit for no upper bound.
 *
 * @example
 * ```typescript
 * // bars at 14:00 .. 14:05
 * clipBars(bars, ts("14:01"), ts("14:04"));
 * // Result: [bars at 14:01, 14:02, 14:03, 14:04]
 * ```
 *
 * Edge cases:
 * - Empty input: Returns empty array
 * - from > to: Returns empty array
 * - from === to: Returns the bar at exactly that timestamp, if any
 *
 * Note: unsorted input gives undefined results.
 */
export function clipBars(bars: readonly Bar[], from?: number, to?: number): Bar[] {
  if (bars.length === 0) {
    return [];
  }

  const lower = from ?? -Infinity;
  const upper = to ?? Infinity;

  if (lower > upper) {
    return [];
  }

  const startIdx = firstIndexAtOrAfter(bars, lower);
  if (startIdx === -1) {
    return [];
  }

  const endIdx = lastIndexAtOrBefore(bars, upper);
  if (endIdx === -1 || endIdx < startIdx) {
    return [];
  }

  return bars.slice(startIdx, endIdx + 1);
}

/**
 * First index with timestamp >= target, or -1.
 */
function firstIndexAtOrAfter(bars: readonly Bar[], target: number): number {
  let left = 0;
  let right = bars.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = bars[mid];
    if (!bar) break;

    if (bar.timestamp >= target) {
      result = mid;
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return result;
}

/**
 * Last index with timestamp <= target, or -1.
 */
function lastIndexAtOrBefore(bars: readonly Bar[], target: number): number {
  let left = 0;
  let right = bars.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    const bar = bars[mid];
    if (!bar) break;

    if (bar.timestamp <= target) {
      result = mid;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  return result;
}
