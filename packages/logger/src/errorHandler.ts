/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections.
 * Everything is logged before the process exits.
 */

import type { Logger } from './types.js';

/**
 * Time given to transports to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let attached: (() => void) | null = null;

/**
 * Attaches process-level handlers that log fatal errors and exit with code 1.
 * Warnings are logged and execution continues.
 *
 * Returns a function that removes the handlers again. Attaching twice is a
 * no-op that logs a warning and returns the existing detach function.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return attached;
  }

  const onUncaughtException = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const onUnhandledRejection = (reason: unknown): void => {
    const error =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const onWarning = (warning: Error): void => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  process.on('warning', onWarning);

  const detach = (): void => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    process.off('warning', onWarning);
    attached = null;
  };
  attached = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detach;
}

function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.stderr.write(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit\n`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
