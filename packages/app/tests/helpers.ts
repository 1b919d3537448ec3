import type { Bar, HistoricalSeries } from '@chartfeed/contracts';
import { Interval } from '@chartfeed/contracts';
import { createLogger, type Logger } from '@chartfeed/logger';

/** Errors only, so passing tests stay quiet. */
export function quietLogger(): Logger {
  return createLogger({ level: 'error', json: true });
}

export function bar(day: number, close: number, extra: Partial<Bar> = {}): Bar {
  return {
    timestamp: Date.UTC(2024, 0, 2 + day),
    open: close - 0.5,
    high: close + 0.25,
    low: close - 1,
    close,
    volume: 100 * (day + 1),
    ...extra,
  };
}

export function series(bars: Bar[], overrides: Partial<HistoricalSeries> = {}): HistoricalSeries {
  return { symbol: 'NASDAQ:AAPL', interval: Interval.D1, bars, hasOpenInterest: false, ...overrides };
}
