/**
 * Command types and interfaces
 */

import type { CommandError } from './errors.js';

/**
 * Base command interface
 */
export interface Command<TOptions> {
  name: string;
  description: string;
  execute(symbol: string, options: TOptions): Promise<CommandResult>;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  /** Text to write to stdout or the output file; empty on failure */
  output: string;
  error?: CommandError;
  duration?: number;
  metadata?: Record<string, unknown>;
}
