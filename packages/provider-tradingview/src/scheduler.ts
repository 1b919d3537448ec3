/**
 * RangeScheduler: turns one history request into one ordered bar series.
 *
 * n-bars mode runs a single session. Range mode plans chunks under the
 * plan's bar cap and fetches them strictly one after another, retrying
 * empty chunks with linear backoff and giving up after a streak of fully
 * failed chunks.
 */

import type { Bar, HistoricalSeries, Interval } from '@chartfeed/contracts';
import { createChildLogger, startTimer, type Logger } from '@chartfeed/logger';
import { stitchSeries } from '@chartfeed/market-data-core';
import { assembleBars } from './assembler.js';
import {
  clampToHistoryDepth,
  computeChunkDays,
  estimateCoverage,
  normalizeDateRange,
  planChunks,
  safeBarCount,
  toRangeToken,
  type DateInput,
  type DateRange,
} from './chunk-plan.js';
import { decodeFrames } from './codec.js';
import type { Now, SeriesRequest, SessionRunner, Sleep, Termination } from './types.js';

export const DEFAULT_BAR_COUNT = 10;

export const DEFAULT_SLEEP_SECONDS = 3;

/**
 * Seconds of connection overhead assumed per chunk in the time estimate.
 */
const CHUNK_OVERHEAD_SECONDS = 5;

/**
 * Outcomes that retrying cannot fix. They stop the whole plan.
 */
const FATAL_TERMINATIONS: ReadonlySet<Termination> = new Set(['symbol_error', 'auth_failed']);

export interface LatestBarsRequest {
  /** Exchange-qualified symbol */
  symbol: string;
  interval: Interval;
  barCount: number;
  extendedSession?: boolean;
}

export interface RangeRequest {
  /** Exchange-qualified symbol */
  symbol: string;
  interval: Interval;
  start?: DateInput;
  end?: DateInput;
  /** Calendar days per chunk; derived from the plan limit when omitted */
  chunkDays?: number;
  /** Pause between chunks, and the unit of the retry backoff */
  sleepSeconds?: number;
  extendedSession?: boolean;
}

export interface RangeSchedulerOptions {
  runSession: SessionRunner;

  /** Bars-per-query cap of the active plan, read when a range is planned */
  planBarLimit: () => number;

  /** Attempts per chunk, default 3 */
  maxAttempts?: number;

  /** Fully failed chunks in a row before the plan is abandoned, default 3 */
  maxConsecutiveFailures?: number;

  logger?: Logger;
  sleep?: Sleep;
  now?: Now;
}

interface ChunkOutcome {
  bars: Bar[];
  /** Set when a fatal termination ended the chunk */
  fatal?: Termination;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RangeScheduler {
  private readonly runSession: SessionRunner;
  private readonly planBarLimit: () => number;
  private readonly maxAttempts: number;
  private readonly maxConsecutiveFailures: number;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;
  private readonly now: Now;

  constructor(options: RangeSchedulerOptions) {
    this.runSession = options.runSession;
    this.planBarLimit = options.planBarLimit;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? 3;
    this.logger = options.logger ? createChildLogger(options.logger, { component: 'range-scheduler' }) : undefined;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Latest `barCount` bars in one session; no chunking, no retries.
   */
  async fetchLatest(request: LatestBarsRequest): Promise<HistoricalSeries> {
    const { symbol, interval, barCount, extendedSession } = request;
    this.logger?.debug('Fetching latest bars', { symbol, interval, bars: barCount });

    const { bars } = await this.attempt({ kind: 'series', symbol, interval, barCount, extendedSession });
    if (bars.length === 0) {
      this.logger?.error('No data received; check the exchange and symbol', { symbol, interval });
    }

    const stitched = stitchSeries([bars]);
    return { symbol, interval, bars: stitched.bars, hasOpenInterest: stitched.hasOpenInterest };
  }

  /**
   * Range mode: plan, fetch chunk by chunk, merge and clip to the
   * requested range (both ends inclusive).
   *
   * @throws {InvalidQueryError} For unparsable dates, start >= end or a bad chunkDays
   */
  async fetchRange(request: RangeRequest): Promise<HistoricalSeries> {
    const { symbol, interval, extendedSession } = request;
    const sleepSeconds = request.sleepSeconds ?? DEFAULT_SLEEP_SECONDS;

    const requested = normalizeDateRange(request.start, request.end, this.now());
    const { range, clamped } = clampToHistoryDepth(requested, interval);
    if (clamped) {
      this.logger?.warn('Start date predates available history; clamping', {
        symbol,
        interval,
        from: isoDate(requested.startMs),
        to: isoDate(range.startMs),
      });
    }

    const planLimit = this.planBarLimit();
    const barCount = safeBarCount(planLimit);
    const chunkDays = request.chunkDays ?? computeChunkDays(planLimit, interval);
    if (request.chunkDays === undefined) {
      this.logger?.info('Auto chunk size', { chunk_days: chunkDays, safe_bars: barCount, interval });
    }

    const windows = planChunks(range, chunkDays);
    this.logger?.info('Date range planned', {
      symbol,
      from: isoDate(range.startMs),
      to: isoDate(range.endMs),
      chunks: windows.length,
      chunk_days: chunkDays,
      est_seconds: windows.length * (CHUNK_OVERHEAD_SECONDS + sleepSeconds),
    });

    const collected: Bar[][] = [];
    let consecutiveFailures = 0;

    for (const [index, window] of windows.entries()) {
      const label = `${index + 1}/${windows.length}`;
      this.logger?.info('Fetching chunk', { chunk: label, from: isoDate(window.startMs), to: isoDate(window.endMs) });

      const timer = startTimer();
      const outcome = await this.fetchChunk(
        {
          kind: 'series',
          symbol,
          interval,
          barCount,
          range: toRangeToken(window, interval),
          extendedSession,
        },
        label,
        sleepSeconds
      );

      if (outcome.bars.length > 0) {
        collected.push(outcome.bars);
        consecutiveFailures = 0;
        this.logger?.debug('Chunk fetched', { chunk: label, bars: outcome.bars.length, duration_ms: timer.stop() });
      } else if (outcome.fatal) {
        this.logger?.warn('Stopping range download', { chunk: label, reason: outcome.fatal });
        break;
      } else {
        consecutiveFailures++;
        this.logger?.warn('Chunk failed after all attempts', { chunk: label, attempts: this.maxAttempts });
        if (consecutiveFailures >= this.maxConsecutiveFailures) {
          this.logger?.warn('Consecutive chunks failed; stopping (rate limited or history exhausted)', {
            failures: consecutiveFailures,
            interval,
          });
          break;
        }
      }

      if (index < windows.length - 1 && sleepSeconds > 0) {
        await this.sleep(sleepSeconds * 1000);
      }
    }

    const stitched = stitchSeries(collected, { from: range.startMs, to: range.endMs });
    this.logCoverage(symbol, interval, range, stitched.bars);

    return { symbol, interval, bars: stitched.bars, hasOpenInterest: stitched.hasOpenInterest };
  }

  /**
   * Up to maxAttempts sessions for one chunk, sleeping
   * `sleepSeconds * attempt` between them.
   */
  private async fetchChunk(request: SeriesRequest, label: string, sleepSeconds: number): Promise<ChunkOutcome> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const { bars, termination } = await this.attempt(request);
      if (bars.length > 0) {
        return { bars };
      }
      if (FATAL_TERMINATIONS.has(termination)) {
        return { bars: [], fatal: termination };
      }

      if (attempt < this.maxAttempts) {
        const delaySeconds = sleepSeconds * attempt;
        this.logger?.warn('Chunk returned no data; retrying', {
          chunk: label,
          attempt,
          of: this.maxAttempts,
          termination,
          retry_in_s: delaySeconds,
        });
        if (delaySeconds > 0) {
          await this.sleep(delaySeconds * 1000);
        }
      }
    }

    return { bars: [] };
  }

  private async attempt(request: SeriesRequest): Promise<{ bars: Bar[]; termination: Termination }> {
    const result = await this.runSession(request);
    const series = assembleBars(decodeFrames(result.raw), request.symbol, this.logger);
    if (series.skipped > 0) {
      this.logger?.debug('Malformed bars skipped', { skipped: series.skipped });
    }
    return { bars: series.bars, termination: result.termination };
  }

  private logCoverage(symbol: string, interval: Interval, range: DateRange, bars: readonly Bar[]): void {
    const first = bars[0];
    const last = bars[bars.length - 1];
    if (!first || !last) {
      this.logger?.warn('No bars retrieved for range', { symbol, interval });
      return;
    }

    const estimate = estimateCoverage(range, interval);
    this.logger?.info('Received bars', {
      symbol,
      bars: bars.length,
      first: isoDate(first.timestamp),
      last: isoDate(last.timestamp),
      est_trading_days: estimate.tradingDays,
      ...(estimate.barsPerDay !== undefined ? { bars_per_day: estimate.barsPerDay } : {}),
      expected_bars: estimate.expectedBars,
    });
  }
}

function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}
