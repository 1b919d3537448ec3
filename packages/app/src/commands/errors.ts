/**
 * Error handling for CLI commands
 *
 * Provides friendly error messages and structured error codes for
 * command failures.
 */

import { isChartfeedError } from '@chartfeed/contracts';

/**
 * Command error codes
 */
export enum CommandErrorCode {
  /** Invalid command arguments */
  INVALID_ARGS = 'INVALID_ARGS',
  /** Market data request failed */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** The request succeeded but returned nothing */
  MISSING_DATA = 'MISSING_DATA',
  /** Writing the output failed */
  OUTPUT_ERROR = 'OUTPUT_ERROR',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Friendly error messages for each error code
 */
export const ERROR_MESSAGES: Record<CommandErrorCode, string> = {
  [CommandErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [CommandErrorCode.PROVIDER_ERROR]: 'Failed to fetch market data',
  [CommandErrorCode.MISSING_DATA]: 'No data received',
  [CommandErrorCode.OUTPUT_ERROR]: 'Failed to write output',
  [CommandErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

/**
 * Command error class
 *
 * Extends Error with structured error codes and context.
 */
export class CommandError extends Error {
  readonly code: CommandErrorCode;
  readonly context?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(code: CommandErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super(message || ERROR_MESSAGES[code]);
    this.name = 'CommandError';
    this.code = code;
    this.context = context;
    this.cause = cause;
    Error.captureStackTrace(this, CommandError);
  }

  /**
   * Code and message, followed by any context as `key=value` pairs.
   */
  format(): string {
    const details = Object.entries(this.context ?? {}).map(
      ([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
    );
    const line = `${this.code}: ${this.message}`;
    return details.length > 0 ? `${line} (${details.join(', ')})` : line;
  }
}

/**
 * Message printed to stderr for a failed command or startup.
 */
export function formatCommandError(error: unknown): string {
  if (error instanceof CommandError) {
    return error.format();
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Wrap an error with command error context. Library input errors become
 * INVALID_ARGS with their own message and data.
 */
export function wrapError(error: unknown, code: CommandErrorCode, context?: Record<string, unknown>): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  if (isChartfeedError(error) && (error.code === 'INVALID_QUERY' || error.code === 'INVALID_CONTRACT')) {
    return new CommandError(CommandErrorCode.INVALID_ARGS, error.message, { ...context, ...error.data }, error);
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CommandError(code, `${ERROR_MESSAGES[code]}: ${cause.message}`, context, cause);
}
