/**
 * Wires configuration into a Datafeed
 */

import type { Logger } from '@chartfeed/logger';
import {
  AnonymousCredentialProvider,
  Datafeed,
  StaticCredentialProvider,
  TokenFileCredentialProvider,
  TomlSecurityInfoCache,
  type CredentialProvider,
} from '@chartfeed/provider-tradingview';
import { expandHome, type Config } from '../config/index.js';

/**
 * `TV_TOKEN` wins; otherwise the token file, falling back to anonymous
 * access when the file is missing or its token is rejected.
 */
export function buildCredentialProvider(config: Config, logger?: Logger): CredentialProvider {
  if (config.auth.token) {
    return new StaticCredentialProvider(config.auth.token, config.auth.plan);
  }

  return new TokenFileCredentialProvider({
    path: expandHome(config.auth.tokenPath),
    fallback: new AnonymousCredentialProvider(),
    logger,
  });
}

export function buildDatafeed(config: Config, logger: Logger): Datafeed {
  return new Datafeed({
    credentials: buildCredentialProvider(config, logger),
    securityInfoCache: new TomlSecurityInfoCache(expandHome(config.cache.securityInfoPath), logger),
    connection: {
      url: config.connection.url,
      connectTimeoutMs: config.connection.connectTimeoutMs,
      readTimeoutMs: config.connection.readTimeoutMs,
      streamDeadlineMs: config.connection.streamDeadlineMs,
    },
    logger,
  });
}
