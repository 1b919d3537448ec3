import type { Bar } from "@chartfeed/contracts";

export function bar(timestamp: number, close = 100, extra: Partial<Bar> = {}): Bar {
  return { timestamp, open: close, high: close + 1, low: close - 1, close, volume: 10, ...extra };
}

export function timestamps(bars: readonly Bar[]): number[] {
  return bars.map((b) => b.timestamp);
}
