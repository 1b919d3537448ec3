/**
 * Type definitions for the chart-data protocol client.
 *
 * Everything here is plain data passed between the session, the scheduler
 * and the facade.
 */

import type { ChartfeedError, Interval } from '@chartfeed/contracts';

/**
 * Decoded `{m, p}` envelope.
 */
export interface ProtocolPacket {
  /** Method name, e.g. `timescale_update` */
  m: string;

  /** Positional parameters */
  p: unknown[];
}

/**
 * The pair of server-side session ids scoping one connection.
 *
 * @invariant Fresh for every connection, never reused
 */
export interface SessionIdentity {
  /** `qs_` + 12 lowercase letters */
  quoteSession: string;

  /** `cs_` + 12 lowercase letters */
  chartSession: string;
}

/**
 * Lifecycle of one ProtocolSession.
 */
export type SessionState =
  | 'idle'
  | 'connecting'
  | 'authenticating'
  | 'resolving'
  | 'streaming'
  | 'completed'
  | 'failed';

/**
 * Why a session ended.
 *
 * - series_completed / quote_completed: terminal marker seen
 * - symbol_error: the server could not resolve the symbol
 * - receive_error: read timeout, socket error or close while streaming
 * - deadline: the overall streaming ceiling expired
 * - auth_failed: token rejected and recovery failed (or was already spent)
 * - connect_failed: the socket never opened
 */
export type Termination =
  | 'series_completed'
  | 'quote_completed'
  | 'symbol_error'
  | 'receive_error'
  | 'deadline'
  | 'auth_failed'
  | 'connect_failed';

/**
 * Bar series request: latest `barCount` bars, or the bars inside `range`
 * (a `r,<start>:<end>` token) capped at `barCount`.
 */
export interface SeriesRequest {
  kind: 'series';
  /** Exchange-qualified symbol */
  symbol: string;
  interval: Interval;
  barCount: number;
  range?: string;
  extendedSession?: boolean;
}

/**
 * Quote-only request used to read security metadata.
 */
export interface QuoteRequest {
  kind: 'quote';
  /** Exchange-qualified symbol */
  symbol: string;
}

export type SessionRequest = SeriesRequest | QuoteRequest;

/**
 * Outcome of one ProtocolSession run. Failures are data, not exceptions.
 */
export interface SessionResult {
  state: 'completed' | 'failed';
  termination: Termination;
  /** Every message received while streaming, newline-joined */
  raw: string;
  /** Identity of the last connection, absent if none was opened */
  session?: SessionIdentity;
  error?: ChartfeedError;
}

/**
 * Runs one session for a request. The scheduler depends on this shape only.
 */
export type SessionRunner = (request: SessionRequest) => Promise<SessionResult>;

/**
 * Promise-based sleep, injectable so tests never wait.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Millisecond wall clock.
 */
export type Now = () => number;

/**
 * Connection and timing settings shared by every session.
 *
 * @example
 * ```typescript
 * const settings: ConnectionSettings = {
 *   url: 'wss://data.tradingview.com/socket.io/websocket',
 *   origin: 'https://data.tradingview.com',
 *   connectTimeoutMs: 5000,
 *   readTimeoutMs: 30000,
 *   authProbeTimeoutMs: 3000,
 *   streamDeadlineMs: 120000
 * };
 * ```
 */
export interface ConnectionSettings {
  url: string;
  origin: string;
  connectTimeoutMs: number;

  /** Bound on each individual read while streaming */
  readTimeoutMs: number;

  /** Bound on each read while probing for an auth rejection */
  authProbeTimeoutMs: number;

  /** Overall ceiling on the streaming phase; 0 disables it */
  streamDeadlineMs: number;
}
