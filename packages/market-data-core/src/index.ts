/**
 * @chartfeed/market-data-core
 *
 * Pure utilities for assembling bar series from several sub-queries.
 * No I/O; all timestamps are UTC epoch milliseconds.
 *
 * @example
 * ```typescript
 * import { stitchSeries } from "@chartfeed/market-data-core";
 *
 * const { bars, hasOpenInterest } = stitchSeries([chunk1, chunk2], { from, to });
 * ```
 *
 * @packageDocumentation
 */

export { clipBars } from "./clip.js";

export { hasOpenInterest, promoteOpenInterest } from "./columns.js";

export { mergeBars, stitchSeries } from "./merge.js";
export type { StitchOptions } from "./merge.js";
