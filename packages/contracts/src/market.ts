/**
 * @fileoverview Market data types and provider contracts.
 *
 * Pure data structures shared by the protocol engine, the merge utilities
 * and the CLI. No I/O.
 *
 * @module @chartfeed/contracts/market
 */

import type { Interval } from './intervals.js';

/**
 * A single OHLCV bar, optionally carrying open interest.
 *
 * @invariant open, high, low, close are finite
 * @invariant timestamp is Unix epoch milliseconds (UTC), negative before 1970
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: 1705329000000, // 2024-01-15T14:30:00.000Z
 *   open: 4750.0,
 *   high: 4752.25,
 *   low: 4749.5,
 *   close: 4751.75,
 *   volume: 12500
 * };
 * ```
 */
export interface Bar {
  /** Bar open time, Unix epoch milliseconds (UTC) */
  timestamp: number;

  open: number;

  high: number;

  low: number;

  close: number;

  /** Traded volume; 0 when the server omits it */
  volume: number;

  /**
   * Open interest. Present on every bar of a series whose `hasOpenInterest`
   * is true (null where the server sent none) and absent otherwise.
   */
  openInterest?: number | null;
}

/**
 * An ordered bar series as returned to callers.
 */
export interface HistoricalSeries {
  /** Fully qualified symbol, e.g. `CME_MINI:ES1!` */
  symbol: string;

  interval: Interval;

  /** Bars sorted by timestamp ascending, unique per timestamp */
  bars: Bar[];

  /** Whether the open-interest column is present */
  hasOpenInterest: boolean;
}

/**
 * A request for historical bars.
 *
 * Without `start`/`end` the request runs in bar-count mode and fetches the
 * latest `barCount` bars in one session. With either bound set it runs in
 * range mode and is split into chunks.
 *
 * @invariant start < end when both are given
 * @invariant barCount > 0
 *
 * @example
 * ```typescript
 * const query: HistoricalQuery = {
 *   symbol: 'ES',
 *   exchange: 'CME_MINI',
 *   contract: 1,
 *   interval: Interval.M15,
 *   start: '2024-01-01T00:00:00Z',
 *   end: '2024-06-30T00:00:00Z'
 * };
 * ```
 */
export interface HistoricalQuery {
  /** Ticker (`AAPL`) or qualified symbol (`NASDAQ:AAPL`) */
  symbol: string;

  /** Exchange prefix used when `symbol` is not qualified */
  exchange?: string;

  interval: Interval;

  /** Number of latest bars (bar-count mode). Defaults to 10 */
  barCount?: number;

  /** Range start, inclusive (Date, ISO 8601 string or epoch ms) */
  start?: Date | string | number;

  /** Range end, inclusive; clamped to now */
  end?: Date | string | number;

  /** Continuous futures contract number (1 = front month) */
  contract?: number;

  /** Request extended-hours session data */
  extendedSession?: boolean;

  /** Override the calendar days per chunk */
  chunkDays?: number;

  /** Pause between chunks in seconds (also the retry backoff unit) */
  sleepSeconds?: number;
}

/**
 * Account subscription tiers as reported by the service.
 * The empty string is the free (or anonymous) tier.
 */
export type PlanTier = '' | 'pro' | 'pro_plus' | 'pro_premium';

/**
 * Maximum bars per query for each plan tier.
 */
export const PLAN_BAR_LIMITS: Readonly<Record<PlanTier, number>> = {
  '': 5000,
  pro: 10000,
  pro_plus: 10000,
  pro_premium: 20000,
};

/**
 * Fraction of the per-query cap that chunk sizing treats as safe.
 */
export const SAFE_BAR_RATIO = 0.8;

export function isPlanTier(value: string): value is PlanTier {
  return Object.prototype.hasOwnProperty.call(PLAN_BAR_LIMITS, value);
}

/**
 * Bars-per-query cap for a tier string. Unknown tiers get the free limit.
 *
 * @example
 * ```typescript
 * getPlanBarLimit('pro_premium')  // 20000
 * getPlanBarLimit('enterprise')   // 5000
 * ```
 */
export function getPlanBarLimit(tier: string): number {
  return isPlanTier(tier) ? PLAN_BAR_LIMITS[tier] : PLAN_BAR_LIMITS[''];
}

/**
 * Security metadata reported by the quote session.
 */
export interface SecurityInfo {
  /** Fully qualified symbol */
  symbol: string;
  description?: string;
  exchange?: string;
  /** Instrument type, e.g. `stock`, `futures` */
  type?: string;
  currency?: string;
  /** Minimum price increment (`minmov / pricescale`) */
  tickSize?: number;
  /** Currency value of a one-point move */
  pointValue?: number;
  pricescale?: number;
  minmov?: number;
  timezone?: string;
  session?: string;
  isTradable?: boolean;
  fractional?: boolean;
  typespecs?: string[];
}

/**
 * Describes a provider's supported features and limitations.
 */
export interface ProviderCapabilities {
  supportedIntervals: Interval[];

  /** Maximum bars returnable in a single query for the active plan */
  maxBarsPerRequest: number;

  requiresAuthentication: boolean;

  supportsExtendedHours: boolean;

  supportsOpenInterest: boolean;
}
