/**
 * @chartfeed/provider-tradingview
 *
 * Client for the framed WebSocket chart-data protocol. It handles:
 * - Frame encoding/decoding and per-connection session ids
 * - The auth handshake, with one credential-recovery retry
 * - Chunked range downloads under the account's per-query bar cap
 * - Bar assembly, merge and clipping
 * - Security metadata with a write-once cache
 *
 * @example
 * ```typescript
 * import { createDatafeed, AnonymousCredentialProvider } from '@chartfeed/provider-tradingview';
 * import { createLogger } from '@chartfeed/logger';
 * import { Interval } from '@chartfeed/contracts';
 *
 * const datafeed = createDatafeed({
 *   credentials: new AnonymousCredentialProvider(),
 *   logger: createLogger({ level: 'info' })
 * });
 *
 * const series = await datafeed.getHistory({
 *   symbol: 'ZC',
 *   exchange: 'CBOT',
 *   contract: 1,
 *   interval: Interval.D1,
 *   start: '2023-01-01',
 *   end: '2024-01-01'
 * });
 * ```
 *
 * @packageDocumentation
 */

export { Datafeed, createDatafeed, DEFAULT_CONNECTION_SETTINGS } from './datafeed.js';
export type { DatafeedConfig } from './datafeed.js';

export { RangeScheduler, DEFAULT_BAR_COUNT, DEFAULT_SLEEP_SECONDS, defaultSleep } from './scheduler.js';
export type { RangeSchedulerOptions, RangeRequest, LatestBarsRequest } from './scheduler.js';

export { ProtocolSession, QUOTE_FIELDS, SECURITY_INFO_FIELDS } from './protocol-session.js';
export type { ProtocolSessionDeps } from './protocol-session.js';

export { encodeFrame, decodeFrames, decodePackets, isProtocolPacket, MARKERS } from './codec.js';

export { newSession } from './session-identity.js';
export type { RandomIndex } from './session-identity.js';

export { connectWebSocket } from './transport.js';
export type { Transport, TransportFactory, ConnectOptions } from './transport.js';

export { assembleBars } from './assembler.js';
export type { AssembledSeries } from './assembler.js';

export {
  computeChunkDays,
  planChunks,
  toRangeToken,
  normalizeDateRange,
  clampToHistoryDepth,
  estimateCoverage,
  safeBarCount,
  DEFAULT_START_MS,
  INTRADAY_SHIFT_MS,
} from './chunk-plan.js';
export type { ChunkWindow, DateRange, DateInput, CoverageEstimate } from './chunk-plan.js';

export {
  CredentialManager,
  StaticCredentialProvider,
  AnonymousCredentialProvider,
  TokenFileCredentialProvider,
  ANONYMOUS_TOKEN,
} from './credentials.js';
export type { Credential, CredentialProvider, CredentialRequest, TokenFileCredentialProviderOptions } from './credentials.js';

export { InMemorySecurityInfoCache, TomlSecurityInfoCache, parseSecurityInfo } from './security-info.js';
export type { SecurityInfoCache } from './security-info.js';

export type {
  ProtocolPacket,
  SessionIdentity,
  SessionState,
  Termination,
  SeriesRequest,
  QuoteRequest,
  SessionRequest,
  SessionResult,
  SessionRunner,
  ConnectionSettings,
  Sleep,
  Now,
} from './types.js';
