/**
 * @fileoverview Logger factory for chartfeed.
 * Creates Winston loggers with redaction, standard fields and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Redaction runs before anything else in the format chain; output is JSON
 * in production and a colorized single line otherwise.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', filePath: './logs/chartfeed.log' });
 * logger.info('Download started', { symbol: 'CME_MINI:ES1!', interval: '15' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for CSV/JSON output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    // File output is always JSON so it can be grepped and parsed
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(redactPII(), standardFields, format.json()),
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries all carry `context`.
 *
 * @example
 * ```typescript
 * const log = createChildLogger(logger, { component: 'protocol-session', symbol: 'NASDAQ:AAPL' });
 * log.debug('Frame sent', { method: 'resolve_symbol' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
