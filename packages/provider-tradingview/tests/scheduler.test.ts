import { describe, it, expect } from 'vitest';
import { Interval, InvalidQueryError } from '@chartfeed/contracts';
import { MS_PER_DAY } from '../src/chunk-plan.js';
import { RangeScheduler, type RangeSchedulerOptions } from '../src/scheduler.js';
import type { SeriesRequest, SessionRequest, SessionResult, Termination } from '../src/types.js';
import { barsMessage, dailyTuple, seriesCompleted, symbolError, type BarTuple } from './helpers/fake-server.js';

const DAY0 = Date.UTC(2024, 0, 1);
const NOW = Date.UTC(2024, 6, 1);
const CS = 'cs_aaaaaaaaaaaa';

type Reply = BarTuple[] | Termination;

function reply(value: Reply): SessionResult {
  if (typeof value === 'string') {
    const raw = value === 'symbol_error' ? `${symbolError(CS)}\n` : '';
    return { state: 'failed', termination: value, raw };
  }
  const raw = value.length > 0 ? `${barsMessage(CS, value)}\n${seriesCompleted(CS)}\n` : `${seriesCompleted(CS)}\n`;
  return { state: 'completed', termination: 'series_completed', raw };
}

function parseRange(request: SeriesRequest): { startMs: number; endMs: number } {
  const match = /^r,(-?\d+):(-?\d+)$/.exec(request.range ?? '');
  if (!match) {
    throw new Error(`unexpected range ${String(request.range)}`);
  }
  return { startMs: Number(match[1]), endMs: Number(match[2]) };
}

/** Daily tuples for every day in the window, both ends included. */
function daysIn(request: SeriesRequest): BarTuple[] {
  const { startMs, endMs } = parseRange(request);
  const tuples: BarTuple[] = [];
  for (let ms = startMs; ms <= endMs; ms += MS_PER_DAY) {
    tuples.push(dailyTuple((ms - DAY0) / MS_PER_DAY));
  }
  return tuples;
}

function harness(script: (request: SeriesRequest, call: number) => Reply, options: Partial<RangeSchedulerOptions> = {}) {
  const requests: SeriesRequest[] = [];
  const sleeps: number[] = [];
  const scheduler = new RangeScheduler({
    runSession: async (request: SessionRequest) => {
      if (request.kind !== 'series') {
        throw new Error('series requests only');
      }
      requests.push(request);
      return reply(script(request, requests.length - 1));
    },
    planBarLimit: () => 5000,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    now: () => NOW,
    ...options,
  });
  return { scheduler, requests, sleeps };
}

const day = (n: number): number => DAY0 + n * MS_PER_DAY;

describe('RangeScheduler.fetchLatest', () => {
  it('should run one session and return sorted bars', async () => {
    const { scheduler, requests } = harness(() => [dailyTuple(2), dailyTuple(0), dailyTuple(1)]);

    const series = await scheduler.fetchLatest({ symbol: 'NASDAQ:AAPL', interval: Interval.D1, barCount: 10 });

    expect(requests).toEqual([
      { kind: 'series', symbol: 'NASDAQ:AAPL', interval: Interval.D1, barCount: 10, extendedSession: undefined },
    ]);
    expect(series.bars.map((b) => b.timestamp)).toEqual([day(0), day(1), day(2)]);
    expect(series.hasOpenInterest).toBe(false);
    expect(series.bars[0]).toEqual({ timestamp: day(0), open: 99, high: 101, low: 98, close: 100, volume: 1000 });
  });

  it('should return an empty series without retrying', async () => {
    const { scheduler, requests } = harness(() => 'receive_error');

    const series = await scheduler.fetchLatest({ symbol: 'NASDAQ:AAPL', interval: Interval.D1, barCount: 10 });

    expect(series.bars).toEqual([]);
    expect(requests).toHaveLength(1);
  });
});

describe('RangeScheduler.fetchRange', () => {
  it('should fetch each chunk with the safe bar count and a range token', async () => {
    const { scheduler, requests, sleeps } = harness((request) => daysIn(request));

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(9),
      chunkDays: 3,
      sleepSeconds: 1,
    });

    expect(requests.map((r) => r.range)).toEqual([
      `r,${day(0)}:${day(3)}`,
      `r,${day(3)}:${day(6)}`,
      `r,${day(6)}:${day(9)}`,
    ]);
    expect(requests.every((r) => r.barCount === 4000)).toBe(true);
    expect(sleeps).toEqual([1000, 1000]);
    expect(series.bars.map((b) => b.timestamp)).toEqual(Array.from({ length: 10 }, (_, i) => day(i)));
  });

  it('should retry an empty chunk with linear backoff', async () => {
    const { scheduler, requests, sleeps } = harness((request, call) => (call === 1 || call === 2 ? [] : daysIn(request)));

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(9),
      chunkDays: 3,
      sleepSeconds: 1,
    });

    expect(requests).toHaveLength(5);
    expect(requests[1]?.range).toBe(requests[3]?.range);
    expect(sleeps).toEqual([1000, 1000, 2000, 1000]);
    expect(series.bars).toHaveLength(10);
  });

  it('should stop after three fully failed chunks in a row', async () => {
    const { scheduler, requests, sleeps } = harness(() => []);

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(10),
      chunkDays: 2,
      sleepSeconds: 1,
    });

    expect(series.bars).toEqual([]);
    expect(requests).toHaveLength(9);
    expect(sleeps).toEqual([1000, 2000, 1000, 1000, 2000, 1000, 1000, 2000]);
  });

  it('should reset the failure streak after a chunk succeeds', async () => {
    // chunks 1-2 fail, 3 succeeds on its first attempt, 4-5 fail
    const { scheduler, requests } = harness((request, call) => (call === 6 ? daysIn(request) : []));

    await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(10),
      chunkDays: 2,
      sleepSeconds: 0,
    });

    expect(new Set(requests.map((r) => r.range)).size).toBe(5);
    expect(requests).toHaveLength(3 + 3 + 1 + 3 + 3);
  });

  it('should stop the plan on symbol_error and keep earlier bars', async () => {
    const { scheduler, requests, sleeps } = harness((request, call) => (call === 0 ? daysIn(request) : 'symbol_error'));

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(9),
      chunkDays: 3,
      sleepSeconds: 1,
    });

    expect(requests).toHaveLength(2);
    expect(sleeps).toEqual([1000]);
    expect(series.bars.map((b) => b.timestamp)).toEqual([day(0), day(1), day(2), day(3)]);
  });

  it('should not retry auth_failed', async () => {
    const { scheduler, requests } = harness(() => 'auth_failed');

    await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(9),
      chunkDays: 3,
      sleepSeconds: 0,
    });

    expect(requests).toHaveLength(1);
  });

  it('should clip to the requested range inclusively', async () => {
    const { scheduler } = harness(() => [dailyTuple(-1), dailyTuple(0), dailyTuple(4), dailyTuple(5), dailyTuple(6)]);

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(5),
      chunkDays: 30,
      sleepSeconds: 0,
    });

    expect(series.bars.map((b) => b.timestamp)).toEqual([day(0), day(4), day(5)]);
  });

  it('should keep the first bar seen for a duplicated timestamp', async () => {
    const { scheduler } = harness((request) =>
      parseRange(request).startMs === day(0) ? [dailyTuple(2, 100)] : [dailyTuple(2, 200), dailyTuple(3, 200)]
    );

    const series = await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.D1,
      start: day(0),
      end: day(4),
      chunkDays: 2,
      sleepSeconds: 0,
    });

    expect(series.bars.map((b) => [b.timestamp, b.close])).toEqual([
      [day(2), 100],
      [day(3), 200],
    ]);
  });

  it('should promote open interest across the merged series', async () => {
    const { scheduler } = harness((request) =>
      parseRange(request).startMs === day(0) ? [dailyTuple(0, 100, [10, 55])] : [dailyTuple(3)]
    );

    const series = await scheduler.fetchRange({
      symbol: 'CBOT:ZC1!',
      interval: Interval.D1,
      start: day(0),
      end: day(4),
      chunkDays: 2,
      sleepSeconds: 0,
    });

    expect(series.hasOpenInterest).toBe(true);
    expect(series.bars.map((b) => b.openInterest)).toEqual([55, null]);
  });

  it('should derive the chunk size from the plan limit', async () => {
    const { scheduler, requests } = harness((request) => daysIn(request).slice(0, 1), {
      planBarLimit: () => 20000,
    });

    await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.H1,
      start: NOW - 700 * MS_PER_DAY,
      sleepSeconds: 0,
    });

    // floor(16000 * 3600 / 86400) = 666 days per chunk
    expect(requests).toHaveLength(2);
    expect(requests[0]?.barCount).toBe(16000);
    const start = NOW - 700 * MS_PER_DAY - 1_800_000;
    expect(requests[0]?.range).toBe(`r,${start}:${start + 666 * MS_PER_DAY}`);
  });

  it('should clamp intraday starts to the available history and shift the token', async () => {
    const { scheduler, requests } = harness(() => [], { maxAttempts: 1 });

    await scheduler.fetchRange({
      symbol: 'NASDAQ:AAPL',
      interval: Interval.M1,
      start: Date.UTC(2020, 0, 1),
      chunkDays: 200,
      sleepSeconds: 0,
    });

    expect(requests.map((r) => r.range)).toEqual([`r,${NOW - 180 * MS_PER_DAY - 1_800_000}:${NOW - 1_800_000}`]);
  });

  it('should reject an inverted range before any session runs', async () => {
    const { scheduler, requests } = harness(() => []);

    await expect(
      scheduler.fetchRange({ symbol: 'NASDAQ:AAPL', interval: Interval.D1, start: day(5), end: day(1) })
    ).rejects.toBeInstanceOf(InvalidQueryError);
    expect(requests).toHaveLength(0);
  });
});
