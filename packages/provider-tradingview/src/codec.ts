/**
 * Frame encoding and decoding for the `~m~<len>~m~<payload>` wire format.
 *
 * Pure functions; no I/O.
 */

import { z } from 'zod';
import type { ProtocolPacket } from './types.js';

const FRAME_SPLITTER = /~m~\d+~m~/;

const HEARTBEAT_PREFIX = '~h~';

/**
 * Substrings the receive loop looks for in raw server messages.
 */
export const MARKERS = {
  seriesCompleted: 'series_completed',
  quoteCompleted: 'quote_completed',
  symbolError: 'symbol_error',
  protocolError: 'protocol_error',
} as const;

const packetSchema = z.object({
  m: z.string(),
  p: z.array(z.unknown()),
});

/**
 * Builds one outbound frame. The header carries the UTF-8 byte length of
 * the compact JSON payload.
 *
 * @example
 * ```typescript
 * encodeFrame('set_auth_token', ['unauthorized_user_token']);
 * // '~m~54~m~{"m":"set_auth_token","p":["unauthorized_user_token"]}'
 * ```
 */
export function encodeFrame(method: string, params: readonly unknown[]): string {
  const payload = JSON.stringify({ m: method, p: params });
  return `~m~${Buffer.byteLength(payload, 'utf8')}~m~${payload}`;
}

/**
 * Splits a raw buffer into JSON values. Empty fragments, heartbeats and
 * fragments that fail to parse are dropped.
 */
export function decodeFrames(raw: string): unknown[] {
  const values: unknown[] = [];

  for (const fragment of raw.split(FRAME_SPLITTER)) {
    const trimmed = fragment.trim();
    if (trimmed.length === 0 || trimmed.startsWith(HEARTBEAT_PREFIX)) {
      continue;
    }

    try {
      const value: unknown = JSON.parse(trimmed);
      values.push(value);
    } catch {
      // not a JSON frame; skipped
      continue;
    }
  }

  return values;
}

export function isProtocolPacket(value: unknown): value is ProtocolPacket {
  return packetSchema.safeParse(value).success;
}

/**
 * decodeFrames restricted to `{m, p}` packets.
 */
export function decodePackets(raw: string): ProtocolPacket[] {
  return decodeFrames(raw).filter(isProtocolPacket);
}
