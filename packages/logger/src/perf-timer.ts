/**
 * @fileoverview Elapsed-time measurement for logged operations.
 */

/**
 * Measures the duration of one operation.
 */
export interface PerfTimer {
  /** Start time in milliseconds on the timer's clock */
  readonly startTime: number;

  /** Milliseconds since start (or until stop, once stopped) */
  elapsed(): number;

  /** Freezes the timer and returns the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Millisecond clock; `performance.now` unless a test supplies its own.
 */
export type Clock = () => number;

/**
 * Create a running timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * await fetchChunk();
 * logger.info('Chunk fetched', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(clock: Clock = () => performance.now()): PerfTimer {
  const startTime = clock();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? clock()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = clock();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Await `fn` and report how long it took.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => session.run(request));
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>,
  clock?: Clock
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer(clock);
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
