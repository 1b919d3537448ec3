/**
 * Bar extraction from decoded packets.
 *
 * Reads `timescale_update` and `du` packets, finds the series payload under
 * `s1` or `sds_1`, and maps each `v` tuple
 * `[time_s, open, high, low, close, volume?, openInterest?]` to a Bar.
 * Output is in arrival order; sorting and dedupe happen at merge time.
 */

import { z } from 'zod';
import type { Bar } from '@chartfeed/contracts';
import type { Logger } from '@chartfeed/logger';

const SERIES_METHODS: ReadonlySet<string> = new Set(['timescale_update', 'du']);

const SERIES_KEYS = ['s1', 'sds_1'] as const;

const finite = z.number().finite();

/**
 * 5 to 7 numbers. Volume and open interest may be null.
 */
const barTupleSchema = z
  .tuple([finite, finite, finite, finite, finite])
  .rest(finite.nullable())
  .refine((v) => v.length <= 7, { message: 'bar tuple longer than 7 elements' });

const barEntrySchema = z.object({ v: barTupleSchema });

const seriesPacketSchema = z.object({
  m: z.string(),
  p: z.tuple([z.unknown(), z.record(z.unknown())]).rest(z.unknown()),
});

const seriesPayloadSchema = z.object({ s: z.array(z.unknown()) });

export interface AssembledSeries {
  symbol: string;
  /** Unsorted, possibly with duplicate timestamps */
  bars: Bar[];
  /** True when any bar carried a non-null open interest */
  hasOpenInterest: boolean;
  /** Entries dropped as malformed */
  skipped: number;
}

/**
 * Extracts bars from decoded packets.
 *
 * @example
 * ```typescript
 * const series = assembleBars(decodeFrames(result.raw), 'NASDAQ:AAPL', logger);
 * ```
 */
export function assembleBars(packets: readonly unknown[], symbol: string, logger?: Logger): AssembledSeries {
  const bars: Bar[] = [];
  let hasOpenInterest = false;
  let skipped = 0;

  for (const packet of packets) {
    const parsedPacket = seriesPacketSchema.safeParse(packet);
    if (!parsedPacket.success || !SERIES_METHODS.has(parsedPacket.data.m)) {
      continue;
    }

    const payload = parsedPacket.data.p[1];
    const seriesKey = SERIES_KEYS.find((key) => key in payload);
    if (seriesKey === undefined) {
      continue;
    }

    const series = seriesPayloadSchema.safeParse(payload[seriesKey]);
    if (!series.success) {
      continue;
    }

    for (const entry of series.data.s) {
      const parsed = barEntrySchema.safeParse(entry);
      if (!parsed.success) {
        skipped++;
        logger?.debug('Skipping malformed bar', {
          symbol,
          issue: parsed.error.issues[0]?.message,
        });
        continue;
      }

      const [time, open, high, low, close, volume, openInterest] = parsed.data.v;
      const bar: Bar = {
        timestamp: Math.round(time * 1000),
        open,
        high,
        low,
        close,
        volume: volume ?? 0,
      };

      if (typeof openInterest === 'number') {
        bar.openInterest = openInterest;
        hasOpenInterest = true;
      }

      bars.push(bar);
    }
  }

  return { symbol, bars, hasOpenInterest, skipped };
}
