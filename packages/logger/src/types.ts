/**
 * @fileoverview Type definitions for the chartfeed logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': failures the user has to act on (bad symbol, auth lost)
 * - 'warn': degraded runs (empty chunk, clamped range, retries)
 * - 'info': progress of a download (plan, chunks, coverage)
 * - 'debug': protocol traffic and skipped bars
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/chartfeed.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for an additional file transport.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Child logger context fields.
 * These fields are included in every log entry from the child logger.
 *
 * @example
 * ```typescript
 * const sessionLogger = logger.child({ component: 'protocol-session', symbol: 'NASDAQ:AAPL' });
 * sessionLogger.debug('Frame received'); // includes component and symbol
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'range-scheduler', 'protocol-session') */
  component?: string;

  /** Qualified symbol */
  symbol?: string;

  /** Bar interval code */
  interval?: string;

  /** Provider name */
  provider?: string;

  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
