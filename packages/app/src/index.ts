/**
 * @chartfeed/app
 *
 * Configuration, commands and formatters behind the `chartfeed` CLI.
 */

export { loadConfig, getConfigSummary, expandHome } from './config/index.js';
export type { Config } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';

export { createProgram, writeOutput, VERSION } from './cli.js';
export type { CliDeps } from './cli.js';

export { HistoryCommand } from './commands/history.command.js';
export type { HistoryOptions, HistoryCommandConfig } from './commands/history.command.js';
export { InfoCommand } from './commands/info.command.js';
export type { InfoOptions, InfoCommandConfig } from './commands/info.command.js';
export { CommandError, CommandErrorCode, formatCommandError, wrapError } from './commands/errors.js';
export type { Command, CommandResult } from './commands/types.js';

export { SeriesFormatter, formatSecurityInfo, isOutputFormat, OUTPUT_FORMATS } from './formatters/series-formatter.js';
export type { OutputFormat } from './formatters/series-formatter.js';

export { buildCredentialProvider, buildDatafeed } from './services/datafeed.factory.js';
