/**
 * @chartfeed/symbol-registry
 * Exchange-qualified symbol formatting and parsing
 */

export type { QualifiedSymbol, ExchangeCode, ParsedSymbol } from './types.js';

export { formatSymbol } from './format.js';

export { parseSymbol, isQualifiedSymbol, securityInfoKey } from './parse.js';
