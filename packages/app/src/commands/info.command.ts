/**
 * info command: security metadata for one symbol
 */

import { measureAsync, type Logger } from '@chartfeed/logger';
import type { Datafeed } from '@chartfeed/provider-tradingview';
import { formatSecurityInfo, type OutputFormat } from '../formatters/series-formatter.js';
import { CommandError, CommandErrorCode, wrapError } from './errors.js';
import type { Command, CommandResult } from './types.js';

export interface InfoOptions {
  exchange?: string;
  contract?: number;
  format: OutputFormat;
}

export interface InfoCommandConfig {
  datafeed: Pick<Datafeed, 'getSecurityInfo'>;
  logger: Logger;
}

export class InfoCommand implements Command<InfoOptions> {
  name = 'info';
  description = 'Show security metadata for a symbol';

  private readonly datafeed: Pick<Datafeed, 'getSecurityInfo'>;
  private readonly logger: Logger;

  constructor(config: InfoCommandConfig) {
    this.datafeed = config.datafeed;
    this.logger = config.logger;
  }

  async execute(symbol: string, options: InfoOptions): Promise<CommandResult> {
    try {
      const { result: info, duration_ms: duration } = await measureAsync(() =>
        this.datafeed.getSecurityInfo(symbol, options.exchange, options.contract)
      );
      if (!info) {
        return {
          success: false,
          output: '',
          duration,
          error: new CommandError(CommandErrorCode.MISSING_DATA, `No security info received for ${symbol}`, {
            symbol,
          }),
        };
      }

      this.logger.debug('Security info loaded', { symbol: info.symbol, duration_ms: duration });
      return {
        success: true,
        output: formatSecurityInfo(info, options.format),
        duration,
        metadata: { symbol: info.symbol },
      };
    } catch (error) {
      return { success: false, output: '', error: wrapError(error, CommandErrorCode.PROVIDER_ERROR, { symbol }) };
    }
  }
}
