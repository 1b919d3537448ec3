/**
 * history command: download bars and format them
 */

import { getIntervalLabel, parseInterval, type HistoricalQuery } from '@chartfeed/contracts';
import { startTimer, type Logger } from '@chartfeed/logger';
import type { Datafeed } from '@chartfeed/provider-tradingview';
import { SeriesFormatter, type OutputFormat } from '../formatters/series-formatter.js';
import { CommandError, CommandErrorCode, wrapError } from './errors.js';
import type { Command, CommandResult } from './types.js';

export interface HistoryOptions {
  exchange?: string;
  /** Interval code, e.g. `15`, `1H`, `1D` */
  interval: string;
  bars?: number;
  start?: string;
  end?: string;
  contract?: number;
  extended?: boolean;
  chunkDays?: number;
  sleep?: number;
  format: OutputFormat;
}

export interface HistoryCommandConfig {
  datafeed: Pick<Datafeed, 'getHistory'>;
  logger: Logger;
  /** Used when `sleep` is not given */
  defaultSleepSeconds?: number;
}

export class HistoryCommand implements Command<HistoryOptions> {
  name = 'history';
  description = 'Download historical bars for a symbol';

  private readonly datafeed: Pick<Datafeed, 'getHistory'>;
  private readonly logger: Logger;
  private readonly defaultSleepSeconds?: number;
  private readonly formatter = new SeriesFormatter();

  constructor(config: HistoryCommandConfig) {
    this.datafeed = config.datafeed;
    this.logger = config.logger;
    this.defaultSleepSeconds = config.defaultSleepSeconds;
  }

  async execute(symbol: string, options: HistoryOptions): Promise<CommandResult> {
    const timer = startTimer();

    try {
      const query: HistoricalQuery = {
        symbol,
        exchange: options.exchange,
        interval: parseInterval(options.interval),
        barCount: options.bars,
        start: options.start,
        end: options.end,
        contract: options.contract,
        extendedSession: options.extended,
        chunkDays: options.chunkDays,
        sleepSeconds: options.sleep ?? this.defaultSleepSeconds,
      };

      const series = await this.datafeed.getHistory(query);
      const duration = timer.elapsed();

      const first = series.bars[0];
      const last = series.bars[series.bars.length - 1];
      if (!first || !last) {
        return {
          success: false,
          output: '',
          duration,
          error: new CommandError(CommandErrorCode.MISSING_DATA, `No bars received for ${series.symbol}`, {
            symbol: series.symbol,
            interval: series.interval,
          }),
        };
      }

      const interval = getIntervalLabel(series.interval);
      this.logger.info('History downloaded', {
        symbol: series.symbol,
        interval,
        bars: series.bars.length,
        duration_ms: duration,
      });

      return {
        success: true,
        output: this.formatter.format(series, options.format),
        duration,
        metadata: {
          symbol: series.symbol,
          interval,
          bars: series.bars.length,
          first: new Date(first.timestamp).toISOString(),
          last: new Date(last.timestamp).toISOString(),
          hasOpenInterest: series.hasOpenInterest,
        },
      };
    } catch (error) {
      return {
        success: false,
        output: '',
        duration: timer.elapsed(),
        error: wrapError(error, CommandErrorCode.PROVIDER_ERROR, { symbol }),
      };
    }
  }
}
