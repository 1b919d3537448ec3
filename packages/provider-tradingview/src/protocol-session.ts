/**
 * One connection's state machine:
 * connecting → authenticating → resolving → streaming → completed | failed.
 *
 * Each ProtocolSession runs exactly once. Every outcome, including network
 * and auth failures, comes back as a SessionResult; `run` does not throw.
 */

import {
  AuthenticationError,
  ConnectionError,
  SymbolResolutionError,
  isChartfeedError,
  type ChartfeedError,
} from '@chartfeed/contracts';
import { createChildLogger, type Logger } from '@chartfeed/logger';
import { MARKERS, decodePackets, encodeFrame } from './codec.js';
import type { CredentialManager } from './credentials.js';
import { newSession } from './session-identity.js';
import type { Transport, TransportFactory } from './transport.js';
import type {
  ConnectionSettings,
  Now,
  SeriesRequest,
  SessionIdentity,
  SessionRequest,
  SessionResult,
  SessionState,
  Termination,
} from './types.js';

/**
 * Quote fields subscribed alongside every series request.
 */
export const QUOTE_FIELDS = [
  'ch',
  'chp',
  'current_session',
  'description',
  'local_description',
  'language',
  'exchange',
  'fractional',
  'is_tradable',
  'lp',
  'lp_time',
  'minmov',
  'minmove2',
  'original_name',
  'pricescale',
  'pro_name',
  'short_name',
  'type',
  'update_mode',
  'volume',
  'currency_code',
  'rchp',
  'rtc',
] as const;

/**
 * Extra fields requested when reading security metadata.
 */
export const SECURITY_INFO_FIELDS = [...QUOTE_FIELDS, 'pointvalue', 'timezone', 'typespecs', 'session'] as const;

/**
 * Frames read after `set_auth_token` while looking for a rejection.
 */
const AUTH_PROBE_FRAMES = 3;

export interface ProtocolSessionDeps {
  transportFactory: TransportFactory;
  credentials: CredentialManager;
  settings: ConnectionSettings;
  logger?: Logger;
  now?: Now;
  /** Session id generator, one call per connection */
  identity?: () => SessionIdentity;
}

type AuthOutcome = { accepted: true } | { accepted: false; message: string };

type Connected = { transport: Transport; session: SessionIdentity };

export class ProtocolSession {
  private current: SessionState = 'idle';
  private readonly logger?: Logger;
  private readonly now: Now;
  private readonly identity: () => SessionIdentity;

  constructor(
    private readonly request: SessionRequest,
    private readonly deps: ProtocolSessionDeps
  ) {
    this.logger = deps.logger
      ? createChildLogger(deps.logger, { component: 'protocol-session', symbol: request.symbol })
      : undefined;
    this.now = deps.now ?? Date.now;
    this.identity = deps.identity ?? (() => newSession());
  }

  get state(): SessionState {
    return this.current;
  }

  async run(): Promise<SessionResult> {
    if (this.current !== 'idle') {
      throw new Error('ProtocolSession.run() may only be called once');
    }

    const { credentials } = this.deps;
    const credential = await credentials.current();
    if (!credential) {
      this.transition('failed');
      return this.failure('auth_failed', new AuthenticationError('Engine has no usable credential'));
    }

    const first = await this.connect();
    if (!isConnected(first)) {
      return this.failure('connect_failed', first, undefined);
    }
    let { transport, session } = first;

    this.transition('authenticating');
    const auth = await this.authenticate(transport, credential.token);

    if (!auth.accepted) {
      transport.close();
      this.logger?.error('Authentication rejected', { reason: auth.message });

      const recovered = await credentials.recover(credential.token, auth.message);
      if (!recovered) {
        this.transition('failed');
        return this.failure(
          'auth_failed',
          new AuthenticationError('Token rejected and could not be recovered', { reason: auth.message }),
          session
        );
      }

      const second = await this.connect();
      if (!isConnected(second)) {
        return this.failure('connect_failed', second, undefined);
      }
      ({ transport, session } = second);

      this.transition('authenticating');
      const retry = await this.authenticate(transport, recovered.token);
      if (!retry.accepted) {
        transport.close();
        credentials.markUnrecoverable();
        this.logger?.error('Recovered token rejected as well; giving up on authentication', {
          reason: retry.message,
        });
        this.transition('failed');
        return this.failure(
          'auth_failed',
          new AuthenticationError('Recovered token was rejected', { reason: retry.message, recovered: true }),
          session
        );
      }
    }

    this.transition('resolving');
    this.sendRequest(transport, session);

    this.transition('streaming');
    const streamed = await this.stream(transport);
    transport.close();

    const completed = streamed.termination === 'series_completed' || streamed.termination === 'quote_completed';
    this.transition(completed ? 'completed' : 'failed');

    return {
      state: completed ? 'completed' : 'failed',
      termination: streamed.termination,
      raw: streamed.raw,
      session,
      ...(streamed.error ? { error: streamed.error } : {}),
    };
  }

  private async connect(): Promise<Connected | ChartfeedError> {
    const { transportFactory, settings } = this.deps;
    const session = this.identity();
    this.transition('connecting');

    try {
      const transport = await transportFactory({
        url: settings.url,
        origin: settings.origin,
        connectTimeoutMs: settings.connectTimeoutMs,
        logger: this.logger,
      });
      return { transport, session };
    } catch (err) {
      this.transition('failed');
      const error = isChartfeedError(err)
        ? err
        : new ConnectionError(`Failed to connect: ${describe(err)}`, { url: settings.url });
      this.logger?.warn('Connection failed', { error: error.message });
      return error;
    }
  }

  /**
   * Sends the token and reads a few frames looking for an explicit
   * rejection. A timeout or read error ends the probe as accepted.
   */
  private async authenticate(transport: Transport, token: string): Promise<AuthOutcome> {
    transport.send(encodeFrame('set_auth_token', [token]));

    for (let i = 0; i < AUTH_PROBE_FRAMES; i++) {
      let message: string;
      try {
        message = await transport.receive(this.deps.settings.authProbeTimeoutMs);
      } catch {
        break;
      }

      if (!message.includes(MARKERS.protocolError)) {
        continue;
      }

      const rejection = decodePackets(message).find((packet) => packet.m === MARKERS.protocolError);
      if (rejection) {
        const [reason] = rejection.p;
        return { accepted: false, message: typeof reason === 'string' ? reason : '' };
      }
    }

    return { accepted: true };
  }

  private sendRequest(transport: Transport, session: SessionIdentity): void {
    const { request } = this;
    const { quoteSession, chartSession } = session;
    const send = (method: string, params: readonly unknown[]): void => {
      this.logger?.debug('Sending', { method });
      transport.send(encodeFrame(method, params));
    };

    if (request.kind === 'quote') {
      send('quote_create_session', [quoteSession]);
      send('quote_set_fields', [quoteSession, ...SECURITY_INFO_FIELDS]);
      send('quote_add_symbols', [quoteSession, request.symbol, { flags: ['force_permission'] }]);
      send('quote_fast_symbols', [quoteSession, request.symbol]);
      return;
    }

    send('chart_create_session', [chartSession, '']);
    send('quote_create_session', [quoteSession]);
    send('quote_set_fields', [quoteSession, ...QUOTE_FIELDS]);
    send('quote_add_symbols', [quoteSession, request.symbol, { flags: ['force_permission'] }]);
    send('quote_fast_symbols', [quoteSession, request.symbol]);
    send('resolve_symbol', [chartSession, 'symbol_1', resolveSymbolParam(request)]);
    send('create_series', createSeriesParams(chartSession, request));
    send('switch_timezone', [chartSession, 'exchange']);
  }

  /**
   * Accumulates messages until a terminal marker, a symbol error, a read
   * failure or the overall deadline.
   */
  private async stream(
    transport: Transport
  ): Promise<{ termination: Termination; raw: string; error?: ChartfeedError }> {
    const { readTimeoutMs, streamDeadlineMs } = this.deps.settings;
    const terminal = this.request.kind === 'quote' ? MARKERS.quoteCompleted : MARKERS.seriesCompleted;
    const deadline = streamDeadlineMs > 0 ? this.now() + streamDeadlineMs : undefined;
    let raw = '';

    for (;;) {
      let timeoutMs = readTimeoutMs;
      if (deadline !== undefined) {
        const remaining = deadline - this.now();
        if (remaining <= 0) {
          return { termination: 'deadline', raw, error: this.deadlineError(streamDeadlineMs) };
        }
        timeoutMs = Math.min(timeoutMs, remaining);
      }

      let message: string;
      try {
        message = await transport.receive(timeoutMs);
      } catch (err) {
        if (deadline !== undefined && this.now() >= deadline) {
          return { termination: 'deadline', raw, error: this.deadlineError(streamDeadlineMs) };
        }
        const error = isChartfeedError(err) ? err : new ConnectionError(describe(err));
        this.logger?.warn('Receive failed; ending stream', { error: error.message, bytes: raw.length });
        return { termination: 'receive_error', raw, error };
      }

      raw += `${message}\n`;

      if (message.includes(terminal)) {
        return { termination: terminal, raw };
      }
      if (message.includes(MARKERS.symbolError)) {
        this.logger?.error('Invalid symbol: check the exchange and symbol name', { symbol: this.request.symbol });
        return {
          termination: 'symbol_error',
          raw,
          error: new SymbolResolutionError(`Symbol "${this.request.symbol}" could not be resolved`, {
            symbol: this.request.symbol,
            provider: 'tradingview',
          }),
        };
      }
    }
  }

  private deadlineError(streamDeadlineMs: number): ConnectionError {
    this.logger?.warn('Stream deadline reached', { deadline_ms: streamDeadlineMs });
    return new ConnectionError(`No terminal marker within ${streamDeadlineMs}ms`, { timeoutMs: streamDeadlineMs });
  }

  private failure(termination: Termination, error: ChartfeedError, session?: SessionIdentity): SessionResult {
    return {
      state: 'failed',
      termination,
      raw: '',
      ...(session ? { session } : {}),
      error,
    };
  }

  private transition(next: SessionState): void {
    this.logger?.debug('Session state', { from: this.current, to: next });
    this.current = next;
  }
}

/**
 * `resolve_symbol` parameter: `=` followed by compact JSON.
 */
export function resolveSymbolParam(request: SeriesRequest): string {
  return `=${JSON.stringify({
    symbol: request.symbol,
    adjustment: 'splits',
    session: request.extendedSession ? 'extended' : 'regular',
  })}`;
}

export function createSeriesParams(chartSession: string, request: SeriesRequest): unknown[] {
  const params: unknown[] = [chartSession, 's1', 's1', 'symbol_1', request.interval, request.barCount];
  if (request.range !== undefined) {
    params.push(request.range);
  }
  return params;
}

function isConnected(value: Connected | ChartfeedError): value is Connected {
  return !isChartfeedError(value);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
