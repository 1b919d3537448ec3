/**
 * Core types for exchange-qualified symbols
 */

/**
 * Exchange-qualified symbol string
 * Examples: "NASDAQ:AAPL", "CBOT:ZC1!", "CME_MINI:ES2!"
 */
export type QualifiedSymbol = string;

/**
 * Exchange prefix
 * Examples: "NASDAQ", "CBOT", "CME_MINI"
 */
export type ExchangeCode = string;

/**
 * Components of a qualified symbol
 */
export interface ParsedSymbol {
  exchange: ExchangeCode;
  /** Ticker part as written after the colon, including any `N!` suffix */
  ticker: string;
  /** Ticker without the continuous-contract suffix */
  root: string;
  /** Continuous contract number (1 = front month), when present */
  contract?: number;
}
