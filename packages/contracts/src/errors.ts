/**
 * @fileoverview Error taxonomy for chartfeed.
 *
 * Structured error classes with machine-readable codes and contextual data.
 * Only caller input errors are ever thrown out of a history request; network,
 * protocol and data problems travel as result values and end up in logs.
 *
 * @module @chartfeed/contracts/errors
 */

/**
 * Base error class for all chartfeed errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new ChartfeedError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class ChartfeedError extends Error {
  /**
   * Machine-readable error code (e.g., 'INVALID_QUERY').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  /**
   * @param code - Error code constant
   * @param message - Human-readable error message
   * @param data - Optional structured context data
   */
  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ChartfeedError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown for caller input errors: unparsable dates, `start >= end`,
 * unknown intervals, non-positive bar counts.
 *
 * @example
 * ```typescript
 * throw new InvalidQueryError('start must be before end', {
 *   start: '2024-02-01T00:00:00.000Z',
 *   end: '2024-01-01T00:00:00.000Z'
 * });
 * ```
 */
export class InvalidQueryError extends ChartfeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('INVALID_QUERY', message, data);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Thrown when a continuous-contract number is not an integer >= 1.
 */
export class SymbolFormatError extends ChartfeedError {
  constructor(
    message: string,
    data: {
      symbol: string;
      exchange: string;
      contract: unknown;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_CONTRACT', message, data);
    this.name = 'SymbolFormatError';
  }
}

/**
 * Describes an explicit auth-rejection packet from the server.
 *
 * Never thrown across the public API; the session reports it as a
 * termination and the engine logs it.
 */
export class AuthenticationError extends ChartfeedError {
  constructor(
    message: string,
    data?: {
      reason?: string;
      recovered?: boolean;
      [key: string]: unknown;
    }
  ) {
    super('AUTH_REJECTED', message, data);
    this.name = 'AuthenticationError';
  }
}

/**
 * Describes a symbol the server could not resolve.
 *
 * @example
 * ```typescript
 * new SymbolResolutionError('Symbol "NASDAQ:AAPLX" not found', {
 *   symbol: 'NASDAQ:AAPLX',
 *   provider: 'tradingview'
 * });
 * ```
 */
export class SymbolResolutionError extends ChartfeedError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION', message, data);
    this.name = 'SymbolResolutionError';
  }
}

/**
 * Raised by transports when a socket cannot be opened, times out, or drops.
 */
export class ConnectionError extends ChartfeedError {
  constructor(
    message: string,
    data?: {
      url?: string;
      timeoutMs?: number;
      cause?: string;
      [key: string]: unknown;
    }
  ) {
    super('CONNECTION_FAILED', message, data);
    this.name = 'ConnectionError';
  }
}

/**
 * Type guard to check if an error is a ChartfeedError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isChartfeedError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isChartfeedError(error: unknown): error is ChartfeedError {
  return error instanceof ChartfeedError;
}

export function isInvalidQueryError(error: unknown): error is InvalidQueryError {
  return error instanceof InvalidQueryError;
}

export function isSymbolFormatError(error: unknown): error is SymbolFormatError {
  return error instanceof SymbolFormatError;
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}

export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError;
}
