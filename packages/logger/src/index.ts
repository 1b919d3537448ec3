/**
 * @fileoverview Public API for @chartfeed/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { redactPII, redactValue, isSensitiveKey, REDACTED, prettyLine } from './formats.js';

export { startTimer, measureAsync } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';

export type { PerfTimer, Clock } from './perf-timer.js';
