/**
 * Command-line interface: `history` and `info`
 */

import { writeFile } from 'node:fs/promises';
import { Command } from 'commander';
import { z } from 'zod';
import type { Logger } from '@chartfeed/logger';
import type { Datafeed } from '@chartfeed/provider-tradingview';
import { CommandError, CommandErrorCode, formatCommandError, wrapError } from './commands/errors.js';
import { HistoryCommand } from './commands/history.command.js';
import { InfoCommand } from './commands/info.command.js';
import type { CommandResult } from './commands/types.js';
import { OUTPUT_FORMATS } from './formatters/series-formatter.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  /** Called once, on the first command that needs the network */
  datafeed: () => Pick<Datafeed, 'getHistory' | 'getSecurityInfo'>;
  logger: Logger;
  defaultSleepSeconds?: number;
  /** Writes the command output to stdout or `path` */
  write?: (text: string, path?: string) => Promise<void>;
  /** Reports an error line to the user */
  report?: (message: string) => void;
  setExitCode?: (code: number) => void;
}

const positiveInt = z.coerce.number().int().positive();

const formatOption = z.enum(['csv', 'json']).default('csv');

const historyCliSchema = z.object({
  exchange: z.string().min(1).optional(),
  interval: z.string().default('1D'),
  bars: positiveInt.optional(),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
  contract: positiveInt.optional(),
  extended: z.boolean().default(false),
  chunkDays: positiveInt.optional(),
  sleep: z.coerce.number().nonnegative().optional(),
  format: formatOption,
  out: z.string().min(1).optional(),
});

const infoCliSchema = z.object({
  exchange: z.string().min(1).optional(),
  contract: positiveInt.optional(),
  format: formatOption,
});

export async function writeOutput(text: string, path?: string): Promise<void> {
  if (path) {
    await writeFile(path, text, 'utf8');
    return;
  }
  process.stdout.write(text);
}

/**
 * Builds the program. `parseAsync` resolves once the command has finished
 * and its output is written.
 */
export function createProgram(deps: CliDeps): Command {
  const write = deps.write ?? writeOutput;
  const report = deps.report ?? ((message: string) => process.stderr.write(`${message}\n`));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  let datafeed: Pick<Datafeed, 'getHistory' | 'getSecurityInfo'> | undefined;
  const getDatafeed = (): Pick<Datafeed, 'getHistory' | 'getSecurityInfo'> => {
    datafeed ??= deps.datafeed();
    return datafeed;
  };

  const finish = async (result: CommandResult, out?: string): Promise<void> => {
    if (!result.success) {
      report(formatCommandError(result.error ?? new CommandError(CommandErrorCode.INTERNAL_ERROR)));
      setExitCode(1);
      return;
    }
    try {
      await write(result.output, out);
    } catch (error) {
      report(formatCommandError(wrapError(error, CommandErrorCode.OUTPUT_ERROR, { path: out })));
      setExitCode(1);
    }
  };

  const invalid = (error: z.ZodError): void => {
    const details = error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`);
    report(formatCommandError(new CommandError(CommandErrorCode.INVALID_ARGS, details.join('\n'))));
    setExitCode(2);
  };

  const program = new Command();

  program.name('chartfeed').description('Download historical bars over the chart-data WebSocket').version(VERSION);

  program
    .command('history')
    .description('Download historical bars (latest N bars, or a date range in chunks)')
    .argument('<symbol>', 'ticker or EXCHANGE:TICKER')
    .option('-e, --exchange <exchange>', 'exchange prefix for an unqualified symbol')
    .option('-i, --interval <interval>', 'bar interval: 1,3,5,15,30,45,1H,2H,3H,4H,1D,1W,1M', '1D')
    .option('-n, --bars <count>', 'number of latest bars (ignored with --start/--end)')
    .option('-s, --start <date>', 'range start, ISO 8601')
    .option('--end <date>', 'range end, ISO 8601 (defaults to now)')
    .option('-c, --contract <n>', 'continuous futures contract number (1 = front month)')
    .option('--extended', 'include extended-hours sessions', false)
    .option('--chunk-days <days>', 'calendar days per chunk (default: from the account plan)')
    .option('--sleep <seconds>', 'pause between chunks')
    .option('-f, --format <format>', `output format: ${OUTPUT_FORMATS.join(', ')}`, 'csv')
    .option('-o, --out <file>', 'write to a file instead of stdout')
    .action(async (symbol: string, rawOptions: Record<string, unknown>) => {
      const parsed = historyCliSchema.safeParse(rawOptions);
      if (!parsed.success) {
        invalid(parsed.error);
        return;
      }
      const { out, ...options } = parsed.data;

      const command = new HistoryCommand({
        datafeed: getDatafeed(),
        logger: deps.logger,
        defaultSleepSeconds: deps.defaultSleepSeconds,
      });
      await finish(await command.execute(symbol, options), out);
    });

  program
    .command('info')
    .description('Show security metadata (read through the local cache)')
    .argument('<symbol>', 'ticker or EXCHANGE:TICKER')
    .option('-e, --exchange <exchange>', 'exchange prefix for an unqualified symbol')
    .option('-c, --contract <n>', 'continuous futures contract number')
    .option('-f, --format <format>', `output format: ${OUTPUT_FORMATS.join(', ')}`, 'csv')
    .action(async (symbol: string, rawOptions: Record<string, unknown>) => {
      const parsed = infoCliSchema.safeParse(rawOptions);
      if (!parsed.success) {
        invalid(parsed.error);
        return;
      }

      const command = new InfoCommand({ datafeed: getDatafeed(), logger: deps.logger });
      await finish(await command.execute(symbol, parsed.data));
    });

  return program;
}
