/**
 * Symbol formatting
 * Builds the exchange-qualified form the chart server resolves
 */

import { SymbolFormatError } from '@chartfeed/contracts';
import type { QualifiedSymbol } from './types.js';

/**
 * True when `contract` is usable as a continuous-contract number
 */
export function isValidContractNumber(contract: unknown): contract is number {
  return typeof contract === 'number' && Number.isInteger(contract) && contract >= 1;
}

/**
 * Qualify a ticker with its exchange and optional continuous contract
 *
 * Symbols that already contain `:` are returned unchanged, so the function
 * is idempotent.
 *
 * @throws {SymbolFormatError} If contract is given but is not an integer >= 1
 *
 * @example
 * ```typescript
 * formatSymbol('AAPL', 'NASDAQ')         // → 'NASDAQ:AAPL'
 * formatSymbol('ZC', 'CBOT', 1)          // → 'CBOT:ZC1!'
 * formatSymbol('CBOT:ZC1!', 'CBOT', 1)   // → 'CBOT:ZC1!'
 * formatSymbol('ES', 'CME_MINI', 0)      // throws SymbolFormatError
 * ```
 */
export function formatSymbol(symbol: string, exchange: string, contract?: number): QualifiedSymbol {
  if (symbol.includes(':')) {
    return symbol;
  }

  if (contract === undefined) {
    return `${exchange}:${symbol}`;
  }

  if (!isValidContractNumber(contract)) {
    throw new SymbolFormatError(`Invalid contract number: ${String(contract)}. Must be an integer >= 1`, {
      symbol,
      exchange,
      contract,
    });
  }

  return `${exchange}:${symbol}${contract}!`;
}
