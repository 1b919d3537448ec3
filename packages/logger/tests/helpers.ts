import { Writable } from 'node:stream';
import winston from 'winston';
import type { Logger } from '../src/types.js';

/**
 * Attaches an in-memory transport and returns the parsed JSON entries it receives.
 */
export function captureEntries(logger: Logger): Array<Record<string, unknown>> {
  const entries: Array<Record<string, unknown>> = [];
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of chunk.toString().split('\n')) {
        if (line.trim().length > 0) {
          const parsed: unknown = JSON.parse(line);
          if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
            entries.push({ ...parsed });
          }
        }
      }
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream: sink }));
  return entries;
}
