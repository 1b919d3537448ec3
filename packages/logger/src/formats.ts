/**
 * @fileoverview Custom Winston formats for the chartfeed logger.
 * Secret redaction, standard fields and human-readable output.
 */

import { format } from 'winston';

/**
 * Field names whose values never reach a transport.
 * Matches are case-insensitive, so `authToken`, `TV_TOKEN` and `Password`
 * are all caught.
 */
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /password/i,
  /passwd/i,
  /^pwd$/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /^auth$/i,
  /auth[_-]?token/i,
  /cookie/i,
  /private[_-]?key/i,
];

export const REDACTED = '[REDACTED]';

/**
 * Winston's own fields, never redacted.
 */
const CORE_FIELDS: ReadonlySet<string> = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive key replaced by
 * `[REDACTED]`, at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ user: 'alice', auth: { token: 'test-secret' } });
 * // { user: 'alice', auth: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Goes first in the chain so nothing downstream sees a secret.
 *
 * @example
 * ```typescript
 * logger.info('Credential loaded', { source: 'file', token: 'test-secret' });
 * // {"level":"info","message":"Credential loaded","source":"file","token":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO 8601 timestamp and error stack capture.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

function renderField(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Renders one line per entry with the well-known context fields first.
 *
 * @example
 * ```typescript
 * // [2024-06-01T12:34:56.789+00:00] info: Chunk fetched component=range-scheduler symbol=NASDAQ:AAPL bars=3120
 * ```
 */
export const prettyLine = format.printf((info) => {
  const { timestamp, level, message, component, symbol, interval, stack, ...rest } = info;

  const context: string[] = [];
  if (component !== undefined) context.push(`component=${renderField(component)}`);
  if (symbol !== undefined) context.push(`symbol=${renderField(symbol)}`);
  if (interval !== undefined) context.push(`interval=${renderField(interval)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (key === 'splat') {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${renderField(timestamp)}] ${level}: ${renderField(message)}${contextStr}`;

  return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

/**
 * Pretty console output for development.
 */
export const prettyPrint = format.combine(format.colorize(), prettyLine);
