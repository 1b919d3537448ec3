import { describe, it, expect } from 'vitest';
import { Interval, isAuthenticationError, isConnectionError, isSymbolResolutionError } from '@chartfeed/contracts';
import { CredentialManager, StaticCredentialProvider, type CredentialProvider } from '../src/credentials.js';
import { ProtocolSession, type ProtocolSessionDeps } from '../src/protocol-session.js';
import type { ConnectionSettings, SessionIdentity, SessionRequest } from '../src/types.js';
import { FakeServer, chartServer, dailyTuple, type ChartServerScript } from './helpers/fake-server.js';

const SETTINGS: ConnectionSettings = {
  url: 'wss://chart.test/socket',
  origin: 'https://chart.test',
  connectTimeoutMs: 100,
  readTimeoutMs: 100,
  authProbeTimeoutMs: 50,
  streamDeadlineMs: 0,
};

const SERIES: SessionRequest = {
  kind: 'series',
  symbol: 'NASDAQ:AAPL',
  interval: Interval.D1,
  barCount: 10,
};

function identities(): () => SessionIdentity {
  let n = 0;
  return () => {
    const letter = String.fromCharCode(97 + n++);
    return { quoteSession: `qs_${letter.repeat(12)}`, chartSession: `cs_${letter.repeat(12)}` };
  };
}

/** Hands out `initial` first, then each of `recovered` in turn. */
function scriptedProvider(initial: string, ...recovered: string[]): CredentialProvider {
  return {
    name: 'scripted',
    obtain: async (request) => {
      if (request.reason === 'initial') {
        return { token: initial, planTier: 'pro' };
      }
      const next = recovered.shift();
      return next === undefined ? undefined : { token: next, planTier: 'pro' };
    },
  };
}

function setup(
  script: ChartServerScript,
  options: { provider?: CredentialProvider; refuse?: (index: number) => boolean; deps?: Partial<ProtocolSessionDeps> } = {}
) {
  const server = new FakeServer({ onPacket: chartServer(script), refuse: options.refuse });
  const credentials = new CredentialManager(options.provider ?? new StaticCredentialProvider('test-token', 'pro'));
  const deps: ProtocolSessionDeps = {
    transportFactory: server.factory,
    credentials,
    settings: SETTINGS,
    identity: identities(),
    ...options.deps,
  };
  return { server, credentials, deps };
}

describe('ProtocolSession', () => {
  it('should send the series request in order and stop at series_completed', async () => {
    const { server, deps } = setup({ series: () => [dailyTuple(0), dailyTuple(1)] });
    const session = new ProtocolSession(SERIES, deps);

    const result = await session.run();

    expect(result.state).toBe('completed');
    expect(result.termination).toBe('series_completed');
    expect(result.session).toEqual({ quoteSession: 'qs_aaaaaaaaaaaa', chartSession: 'cs_aaaaaaaaaaaa' });
    expect(result.raw).toContain('timescale_update');
    expect(session.state).toBe('completed');

    expect(server.methods(0)).toEqual([
      'set_auth_token',
      'chart_create_session',
      'quote_create_session',
      'quote_set_fields',
      'quote_add_symbols',
      'quote_fast_symbols',
      'resolve_symbol',
      'create_series',
      'switch_timezone',
    ]);
    expect(server.packet(0, 'set_auth_token')?.p).toEqual(['test-token']);
    expect(server.packet(0, 'resolve_symbol')?.p).toEqual([
      'cs_aaaaaaaaaaaa',
      'symbol_1',
      '={"symbol":"NASDAQ:AAPL","adjustment":"splits","session":"regular"}',
    ]);
    expect(server.packet(0, 'create_series')?.p).toEqual(['cs_aaaaaaaaaaaa', 's1', 's1', 'symbol_1', '1D', 10]);
    expect(server.packet(0, 'switch_timezone')?.p).toEqual(['cs_aaaaaaaaaaaa', 'exchange']);
    expect(server.connections[0]?.closed).toBe(true);
  });

  it('should append the range token and request the extended session', async () => {
    const { server, deps } = setup({});
    const request: SessionRequest = {
      ...SERIES,
      interval: Interval.M15,
      barCount: 4000,
      range: 'r,1704065400000:1704151800000',
      extendedSession: true,
    };

    await new ProtocolSession(request, deps).run();

    expect(server.packet(0, 'create_series')?.p).toEqual([
      'cs_aaaaaaaaaaaa',
      's1',
      's1',
      'symbol_1',
      '15',
      4000,
      'r,1704065400000:1704151800000',
    ]);
    expect(server.packet(0, 'resolve_symbol')?.p[2]).toBe(
      '={"symbol":"NASDAQ:AAPL","adjustment":"splits","session":"extended"}'
    );
  });

  it('should send only quote messages for a quote request', async () => {
    const { server, deps } = setup({ quote: { description: 'Apple Inc.' } });

    const result = await new ProtocolSession({ kind: 'quote', symbol: 'NASDAQ:AAPL' }, deps).run();

    expect(result.termination).toBe('quote_completed');
    expect(server.methods(0)).toEqual([
      'set_auth_token',
      'quote_create_session',
      'quote_set_fields',
      'quote_add_symbols',
      'quote_fast_symbols',
    ]);
    expect(server.packet(0, 'quote_set_fields')?.p).toContain('pointvalue');
  });

  it('should reconnect with a fresh identity after recovering a rejected token', async () => {
    const { server, credentials, deps } = setup(
      { rejectTokens: ['stale-token'], series: () => [dailyTuple(0)] },
      { provider: scriptedProvider('stale-token', 'fresh-token') }
    );

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('series_completed');
    expect(server.connections).toHaveLength(2);
    expect(server.connections[0]?.closed).toBe(true);
    expect(server.methods(0)).toEqual(['set_auth_token']);
    expect(server.packet(1, 'set_auth_token')?.p).toEqual(['fresh-token']);
    expect(server.packet(1, 'chart_create_session')?.p[0]).toBe('cs_bbbbbbbbbbbb');
    expect(result.session?.chartSession).toBe('cs_bbbbbbbbbbbb');
    expect(credentials.isUnrecoverable()).toBe(false);
  });

  it('should give up when the recovered token is rejected too', async () => {
    const { server, credentials, deps } = setup(
      { rejectTokens: ['stale-token', 'also-stale'] },
      { provider: scriptedProvider('stale-token', 'also-stale', 'never-asked') }
    );

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.state).toBe('failed');
    expect(result.termination).toBe('auth_failed');
    expect(isAuthenticationError(result.error)).toBe(true);
    expect(server.connections).toHaveLength(2);
    expect(server.methods(1)).toEqual(['set_auth_token']);
    expect(credentials.isUnrecoverable()).toBe(true);
  });

  it('should fail authentication without reconnecting when recovery yields nothing', async () => {
    const { server, credentials, deps } = setup(
      { rejectTokens: ['test-token'] },
      { provider: new StaticCredentialProvider('test-token', 'pro') }
    );

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('auth_failed');
    expect(server.connections).toHaveLength(1);
    expect(credentials.isUnrecoverable()).toBe(true);
  });

  it('should not connect when the engine has no credential', async () => {
    const provider: CredentialProvider = { name: 'empty', obtain: async () => undefined };
    const { server, deps } = setup({}, { provider });

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('auth_failed');
    expect(server.connections).toHaveLength(0);
  });

  it('should report connect_failed when the socket does not open', async () => {
    const { deps } = setup({}, { refuse: () => true });

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result).toMatchObject({ state: 'failed', termination: 'connect_failed', raw: '' });
    expect(result.session).toBeUndefined();
    expect(isConnectionError(result.error)).toBe(true);
  });

  it('should stop on symbol_error', async () => {
    const { deps } = setup({ series: () => 'symbol_error' });

    const result = await new ProtocolSession({ ...SERIES, symbol: 'NASDAQ:NOPE' }, deps).run();

    expect(result.state).toBe('failed');
    expect(result.termination).toBe('symbol_error');
    expect(isSymbolResolutionError(result.error)).toBe(true);
    expect(result.error?.data).toEqual({ symbol: 'NASDAQ:NOPE', provider: 'tradingview' });
  });

  it('should end with receive_error when reads fail before the marker', async () => {
    const { server, deps } = setup({ series: () => 'silent' });

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('receive_error');
    expect(result.raw).toBe('');
    expect(server.connections[0]?.closed).toBe(true);
  });

  it('should end with deadline once the streaming ceiling passes', async () => {
    let clock = 0;
    const now = (): number => {
      clock += 1000;
      return clock;
    };
    const { deps } = setup(
      { series: () => 'silent' },
      { deps: { now, settings: { ...SETTINGS, streamDeadlineMs: 1500 } } }
    );

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('deadline');
    expect(isConnectionError(result.error)).toBe(true);
  });

  it('should read past heartbeats during the auth probe', async () => {
    const server = new FakeServer({
      onPacket: chartServer({ series: () => [dailyTuple(0)] }),
      greeting: ['~m~4~m~~h~1', '~m~4~m~~h~2'],
    });
    const deps: ProtocolSessionDeps = {
      transportFactory: server.factory,
      credentials: new CredentialManager(new StaticCredentialProvider('test-token')),
      settings: SETTINGS,
      identity: identities(),
    };

    const result = await new ProtocolSession(SERIES, deps).run();

    expect(result.termination).toBe('series_completed');
    expect(result.raw).not.toContain('~h~');
  });

  it('should refuse to run twice', async () => {
    const { deps } = setup({});
    const session = new ProtocolSession(SERIES, deps);
    await session.run();

    await expect(session.run()).rejects.toThrow('may only be called once');
  });
});
