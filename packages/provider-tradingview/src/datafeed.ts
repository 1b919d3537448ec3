/**
 * Datafeed: the public entry point for history and security-info requests.
 *
 * Owns the credential state, validates caller input, and hands work to the
 * RangeScheduler or a quote-only ProtocolSession.
 */

import {
  InvalidQueryError,
  getAllIntervals,
  getPlanBarLimit,
  parseInterval,
  type HistoricalQuery,
  type HistoricalSeries,
  type Interval,
  type ProviderCapabilities,
  type SecurityInfo,
} from '@chartfeed/contracts';
import { createChildLogger, type Logger } from '@chartfeed/logger';
import { formatSymbol, isQualifiedSymbol, securityInfoKey } from '@chartfeed/symbol-registry';
import { normalizeDateRange } from './chunk-plan.js';
import { decodeFrames } from './codec.js';
import { CredentialManager, type CredentialProvider } from './credentials.js';
import { ProtocolSession } from './protocol-session.js';
import { DEFAULT_BAR_COUNT, RangeScheduler } from './scheduler.js';
import { InMemorySecurityInfoCache, parseSecurityInfo, type SecurityInfoCache } from './security-info.js';
import { connectWebSocket, type TransportFactory } from './transport.js';
import type { ConnectionSettings, Now, SessionIdentity, SessionRequest, SessionResult, Sleep } from './types.js';

export const DEFAULT_CONNECTION_SETTINGS: Readonly<ConnectionSettings> = {
  url: 'wss://data.tradingview.com/socket.io/websocket',
  origin: 'https://data.tradingview.com',
  connectTimeoutMs: 5000,
  readTimeoutMs: 30000,
  authProbeTimeoutMs: 3000,
  streamDeadlineMs: 120000,
};

/**
 * Configuration for a Datafeed.
 *
 * @example
 * ```typescript
 * const config: DatafeedConfig = {
 *   credentials: new TokenFileCredentialProvider({ path: '~/.chartfeed/token' }),
 *   securityInfoCache: new TomlSecurityInfoCache('./security_info.toml'),
 *   logger: createLogger({ level: 'info' })
 * };
 * ```
 */
export interface DatafeedConfig {
  credentials: CredentialProvider;

  /** Defaults to a process-local in-memory cache */
  securityInfoCache?: SecurityInfoCache;

  /** Defaults to a `ws` WebSocket */
  transportFactory?: TransportFactory;

  connection?: Partial<ConnectionSettings>;

  /** Attempts per chunk in range mode */
  maxAttempts?: number;

  /** Fully failed chunks in a row before a range download stops */
  maxConsecutiveFailures?: number;

  logger?: Logger;
  sleep?: Sleep;
  now?: Now;
  identity?: () => SessionIdentity;
}

export class Datafeed {
  private readonly credentials: CredentialManager;
  private readonly cache: SecurityInfoCache;
  private readonly transportFactory: TransportFactory;
  private readonly settings: ConnectionSettings;
  private readonly scheduler: RangeScheduler;
  private readonly logger?: Logger;
  private readonly now: Now;
  private readonly identity?: () => SessionIdentity;

  constructor(config: DatafeedConfig) {
    this.logger = config.logger ? createChildLogger(config.logger, { provider: 'tradingview' }) : undefined;
    this.credentials = new CredentialManager(
      config.credentials,
      this.logger ? createChildLogger(this.logger, { component: 'credentials' }) : undefined
    );
    this.cache = config.securityInfoCache ?? new InMemorySecurityInfoCache();
    this.transportFactory = config.transportFactory ?? connectWebSocket;
    this.settings = { ...DEFAULT_CONNECTION_SETTINGS, ...config.connection };
    this.now = config.now ?? Date.now;
    this.identity = config.identity;

    this.scheduler = new RangeScheduler({
      runSession: (request) => this.runSession(request),
      planBarLimit: () => getPlanBarLimit(this.credentials.planTier()),
      maxAttempts: config.maxAttempts,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
      logger: this.logger,
      sleep: config.sleep,
      now: this.now,
    });
  }

  /**
   * Historical bars, ascending and unique per timestamp.
   *
   * Without `start`/`end` the latest `barCount` bars are fetched in one
   * session; otherwise the range is downloaded in chunks. Network, auth and
   * data problems yield a shorter (possibly empty) series, never an error.
   *
   * @throws {InvalidQueryError} For bad intervals, dates, bar counts or an unqualified symbol without exchange
   * @throws {SymbolFormatError} For a contract number that is not an integer >= 1
   *
   * @example
   * ```typescript
   * const series = await datafeed.getHistory({
   *   symbol: 'ES',
   *   exchange: 'CME_MINI',
   *   contract: 1,
   *   interval: Interval.H1,
   *   start: '2024-01-01',
   *   end: '2024-03-01'
   * });
   * ```
   */
  async getHistory(query: HistoricalQuery): Promise<HistoricalSeries> {
    const interval = parseInterval(query.interval);
    const symbol = this.qualify(query.symbol, query.exchange, query.contract);
    const rangeMode = query.start !== undefined || query.end !== undefined;

    if (rangeMode) {
      normalizeDateRange(query.start, query.end, this.now());
      validateChunkOptions(query);
    } else if (query.barCount !== undefined) {
      validateBarCount(query.barCount);
    }

    const credential = await this.credentials.current();
    if (!credential) {
      this.logger?.warn('Engine is not authenticated; returning an empty series', { symbol });
      return emptySeries(symbol, interval);
    }

    this.logger?.info('Account', {
      plan: this.credentials.isAnonymous() ? 'nologin' : credential.planTier || 'free',
      max_bars: getPlanBarLimit(credential.planTier),
    });

    if (!rangeMode) {
      return this.scheduler.fetchLatest({
        symbol,
        interval,
        barCount: query.barCount ?? DEFAULT_BAR_COUNT,
        extendedSession: query.extendedSession,
      });
    }

    return this.scheduler.fetchRange({
      symbol,
      interval,
      start: query.start,
      end: query.end,
      chunkDays: query.chunkDays,
      sleepSeconds: query.sleepSeconds,
      extendedSession: query.extendedSession,
    });
  }

  /**
   * Security metadata, read through the cache. A miss runs one quote-only
   * session and stores the result.
   *
   * @returns undefined when the server sent no usable quote data
   */
  async getSecurityInfo(symbol: string, exchange?: string, contract?: number): Promise<SecurityInfo | undefined> {
    const qualified = this.qualify(symbol, exchange, contract);
    const key = securityInfoKey(qualified);

    const cached = await this.cache.lookup(key);
    if (cached) {
      this.logger?.debug('Security info cache hit', { key });
      return cached;
    }

    if (!(await this.credentials.current())) {
      this.logger?.warn('Engine is not authenticated; skipping security info', { symbol: qualified });
      return undefined;
    }

    const result = await this.runSession({ kind: 'quote', symbol: qualified });
    const info = parseSecurityInfo(decodeFrames(result.raw), qualified);
    if (!info) {
      this.logger?.warn('No security info received', { symbol: qualified, termination: result.termination });
      return undefined;
    }

    await this.cache.store(key, info);
    return info;
  }

  /**
   * Capabilities for the plan of the currently loaded credential (free
   * tier until the first request loads one).
   */
  capabilities(): ProviderCapabilities {
    return {
      supportedIntervals: getAllIntervals(),
      maxBarsPerRequest: getPlanBarLimit(this.credentials.planTier()),
      requiresAuthentication: false,
      supportsExtendedHours: true,
      supportsOpenInterest: true,
    };
  }

  /**
   * Bars-per-query cap of the account, loading the credential if needed.
   */
  async accountLimit(): Promise<number> {
    const credential = await this.credentials.current();
    return getPlanBarLimit(credential?.planTier ?? '');
  }

  isUnrecoverable(): boolean {
    return this.credentials.isUnrecoverable();
  }

  private runSession(request: SessionRequest): Promise<SessionResult> {
    const session = new ProtocolSession(request, {
      transportFactory: this.transportFactory,
      credentials: this.credentials,
      settings: this.settings,
      logger: this.logger,
      now: this.now,
      identity: this.identity,
    });
    return session.run();
  }

  private qualify(symbol: string, exchange: string | undefined, contract: number | undefined): string {
    if (!isQualifiedSymbol(symbol) && !exchange) {
      throw new InvalidQueryError(`Symbol "${symbol}" needs an exchange`, { symbol });
    }
    return formatSymbol(symbol, exchange ?? '', contract);
  }
}

/**
 * Creates a Datafeed.
 *
 * @example
 * ```typescript
 * const datafeed = createDatafeed({ credentials: new AnonymousCredentialProvider() });
 * const series = await datafeed.getHistory({ symbol: 'NASDAQ:AAPL', interval: Interval.D1, barCount: 100 });
 * ```
 */
export function createDatafeed(config: DatafeedConfig): Datafeed {
  return new Datafeed(config);
}

function emptySeries(symbol: string, interval: Interval): HistoricalSeries {
  return { symbol, interval, bars: [], hasOpenInterest: false };
}

function validateBarCount(barCount: number): void {
  if (!Number.isInteger(barCount) || barCount < 1) {
    throw new InvalidQueryError(`barCount must be a positive integer: ${barCount}`, { barCount });
  }
}

function validateChunkOptions(query: HistoricalQuery): void {
  if (query.chunkDays !== undefined && (!Number.isInteger(query.chunkDays) || query.chunkDays < 1)) {
    throw new InvalidQueryError(`chunkDays must be a positive integer: ${query.chunkDays}`, {
      chunkDays: query.chunkDays,
    });
  }
  if (query.sleepSeconds !== undefined && (!Number.isFinite(query.sleepSeconds) || query.sleepSeconds < 0)) {
    throw new InvalidQueryError(`sleepSeconds must be >= 0: ${query.sleepSeconds}`, {
      sleepSeconds: query.sleepSeconds,
    });
  }
}
