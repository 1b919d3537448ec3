/**
 * Chunk stitching.
 *
 * Combines the bar lists of several sub-queries into one series that is
 * sorted by timestamp and unique per timestamp.
 */

import type { Bar } from "@chartfeed/contracts";
import { clipBars } from "./clip.js";
import { promoteOpenInterest } from "./columns.js";

/**
 * Concatenates chunks in the given order, keeps the first bar seen for
 * each timestamp, then sorts ascending.
 *
 * For chunks that agree on overlapping bars the result does not depend on
 * chunk order, and merging a merged series again returns it unchanged.
 *
 * @example
 * ```typescript
 * mergeBars([[bar(3), bar(1)], [bar(2), bar(3)]]);
 * // [bar(1), bar(2), bar(3)]
 * ```
 */
export function mergeBars(chunks: ReadonlyArray<readonly Bar[]>): Bar[] {
  const byTimestamp = new Map<number, Bar>();

  for (const chunk of chunks) {
    for (const bar of chunk) {
      if (!byTimestamp.has(bar.timestamp)) {
        byTimestamp.set(bar.timestamp, bar);
      }
    }
  }

  return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Options for stitchSeries.
 */
export interface StitchOptions {
  /** Inclusive lower bound in epoch ms */
  from?: number;

  /** Inclusive upper bound in epoch ms */
  to?: number;
}

/**
 * Merge, dedupe, sort, clip to [from, to] and normalize the open-interest
 * column, in that order.
 */
export function stitchSeries(
  chunks: ReadonlyArray<readonly Bar[]>,
  options: StitchOptions = {}
): { bars: Bar[]; hasOpenInterest: boolean } {
  const merged = mergeBars(chunks);
  const clipped = clipBars(merged, options.from, options.to);
  return promoteOpenInterest(clipped);
}
