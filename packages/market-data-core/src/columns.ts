/**
 * Series-level column handling.
 *
 * The open-interest column is all-or-nothing for a series: if any bar
 * carries a value, every bar gets the key (null where missing); otherwise
 * no bar has it.
 */

import type { Bar } from "@chartfeed/contracts";

/**
 * True when at least one bar has a numeric open interest.
 */
export function hasOpenInterest(bars: readonly Bar[]): boolean {
  return bars.some((bar) => typeof bar.openInterest === "number");
}

/**
 * Normalizes the open-interest column across a series.
 *
 * Returns new bar objects; the input is not modified.
 *
 * @example
 * ```typescript
 * promoteOpenInterest([{ ...a, openInterest: 120 }, { ...b }]);
 * // { hasOpenInterest: true, bars: [{ ...a, openInterest: 120 }, { ...b, openInterest: null }] }
 * ```
 */
export function promoteOpenInterest(bars: readonly Bar[]): { bars: Bar[]; hasOpenInterest: boolean } {
  if (hasOpenInterest(bars)) {
    return {
      hasOpenInterest: true,
      bars: bars.map((bar) => ({ ...bar, openInterest: bar.openInterest ?? null })),
    };
  }

  return {
    hasOpenInterest: false,
    bars: bars.map(({ openInterest: _dropped, ...bar }) => bar),
  };
}
