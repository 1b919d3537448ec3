/**
 * Symbol parsing
 * Splits qualified symbols back into their parts and derives cache keys
 */

import { InvalidQueryError } from '@chartfeed/contracts';
import type { ParsedSymbol, QualifiedSymbol } from './types.js';

const CONTINUOUS_SUFFIX = /^(.+?)(\d+)!$/;

export function isQualifiedSymbol(symbol: string): symbol is QualifiedSymbol {
  const colon = symbol.indexOf(':');
  return colon > 0 && colon < symbol.length - 1;
}

/**
 * Parse `EXCHANGE:TICKER[N!]`
 *
 * @throws {InvalidQueryError} If the symbol has no exchange or ticker part
 *
 * @example
 * ```typescript
 * parseSymbol('CBOT:ZC1!')    // → { exchange: 'CBOT', ticker: 'ZC1!', root: 'ZC', contract: 1 }
 * parseSymbol('NASDAQ:AAPL')  // → { exchange: 'NASDAQ', ticker: 'AAPL', root: 'AAPL' }
 * ```
 */
export function parseSymbol(symbol: string): ParsedSymbol {
  if (!isQualifiedSymbol(symbol)) {
    throw new InvalidQueryError(`Symbol must be exchange-qualified (EXCHANGE:TICKER): ${symbol}`, {
      symbol,
    });
  }

  const colon = symbol.indexOf(':');
  const exchange = symbol.slice(0, colon);
  const ticker = symbol.slice(colon + 1);

  const match = CONTINUOUS_SUFFIX.exec(ticker);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { exchange, ticker, root: match[1], contract: Number(match[2]) };
  }

  return { exchange, ticker, root: ticker };
}

/**
 * Section key used by the security-info store: ticker without `!`, an
 * underscore, then the exchange.
 *
 * @example
 * ```typescript
 * securityInfoKey('CBOT:ZC1!')    // → 'ZC1_CBOT'
 * securityInfoKey('NASDAQ:AAPL')  // → 'AAPL_NASDAQ'
 * ```
 */
export function securityInfoKey(symbol: QualifiedSymbol): string {
  const { exchange, ticker } = parseSymbol(symbol);
  return `${ticker.replace(/!$/, '')}_${exchange}`;
}
