/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const positiveMs = z.coerce.number().int().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  auth: z
    .object({
      /** Fixed token; when unset the token file (then anonymous access) is used */
      token: z.string().min(1).optional(),
      plan: z.enum(['', 'pro', 'pro_plus', 'pro_premium']).default(''),
      tokenPath: z.string().min(1).default('~/.chartfeed/token'),
    })
    .default({}),

  connection: z
    .object({
      url: z.string().url().default('wss://data.tradingview.com/socket.io/websocket'),
      connectTimeoutMs: positiveMs.default(5000),
      readTimeoutMs: positiveMs.default(30000),
      // 0 disables the ceiling
      streamDeadlineMs: z.coerce.number().int().nonnegative().default(120000),
    })
    .default({}),

  download: z
    .object({
      sleepSeconds: z.coerce.number().nonnegative().default(3),
    })
    .default({}),

  cache: z
    .object({
      securityInfoPath: z.string().min(1).default('security_info.toml'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  TV_TOKEN: 'auth.token',
  TV_PLAN: 'auth.plan',
  TV_TOKEN_PATH: 'auth.tokenPath',
  TV_WS_URL: 'connection.url',
  TV_CONNECT_TIMEOUT_MS: 'connection.connectTimeoutMs',
  TV_READ_TIMEOUT_MS: 'connection.readTimeoutMs',
  TV_STREAM_DEADLINE_MS: 'connection.streamDeadlineMs',
  TV_SLEEP_SECONDS: 'download.sleepSeconds',
  SECURITY_INFO_PATH: 'cache.securityInfoPath',
};
