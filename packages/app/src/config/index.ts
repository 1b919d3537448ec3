/**
 * Configuration loading and management
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from '@chartfeed/logger';
import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Load configuration from environment and defaults
 *
 * Empty variables count as unset.
 *
 * @throws {Error} Listing every invalid field, one per line
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, Record<string, string>> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value === undefined || value === '') {
      continue;
    }
    const [group, key] = configPath.split('.');
    if (!group || !key) {
      continue;
    }
    const section = rawConfig[group] ?? {};
    section[key] = value;
    rawConfig[group] = section;
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

/**
 * Get configuration summary for logging. Never includes the token.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    auth: config.auth.token ? `token (${config.auth.plan || 'free'})` : `token file ${config.auth.tokenPath}`,
    url: config.connection.url,
    timeouts: {
      connect: config.connection.connectTimeoutMs,
      read: config.connection.readTimeoutMs,
      stream: config.connection.streamDeadlineMs,
    },
    sleepSeconds: config.download.sleepSeconds,
    securityInfoPath: config.cache.securityInfoPath,
  };
}

/**
 * Expands a leading `~/` to the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') {
    return home;
  }
  return path.startsWith('~/') ? join(home, path.slice(2)) : path;
}

export type { Config } from './schema.js';
