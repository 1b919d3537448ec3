/**
 * @fileoverview Main entry point for @chartfeed/contracts package.
 *
 * Exports intervals, market data types, plan limits and the error taxonomy.
 *
 * @module @chartfeed/contracts
 */

// Intervals
export {
  Interval,
  isValidInterval,
  parseInterval,
  intervalToSeconds,
  isIntraday,
  getMaxHistoryDays,
  getIntervalLabel,
  getAllIntervals,
} from './intervals.js';

// Market data types
export type {
  Bar,
  HistoricalSeries,
  HistoricalQuery,
  PlanTier,
  SecurityInfo,
  ProviderCapabilities,
} from './market.js';

export { PLAN_BAR_LIMITS, SAFE_BAR_RATIO, isPlanTier, getPlanBarLimit } from './market.js';

// Error classes and guards
export {
  ChartfeedError,
  InvalidQueryError,
  SymbolFormatError,
  AuthenticationError,
  SymbolResolutionError,
  ConnectionError,
  isChartfeedError,
  isInvalidQueryError,
  isSymbolFormatError,
  isAuthenticationError,
  isSymbolResolutionError,
  isConnectionError,
} from './errors.js';
