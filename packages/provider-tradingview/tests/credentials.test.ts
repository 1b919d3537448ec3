import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  ANONYMOUS_TOKEN,
  AnonymousCredentialProvider,
  CredentialManager,
  StaticCredentialProvider,
  TokenFileCredentialProvider,
  type CredentialProvider,
} from '../src/credentials.js';

describe('StaticCredentialProvider', () => {
  it('should return its token initially and nothing after a rejection', async () => {
    const provider = new StaticCredentialProvider('test-token', 'pro');

    expect(await provider.obtain({ reason: 'initial' })).toEqual({ token: 'test-token', planTier: 'pro' });
    expect(await provider.obtain({ reason: 'rejected', rejectedToken: 'test-token' })).toBeUndefined();
  });
});

describe('AnonymousCredentialProvider', () => {
  it('should use the anonymous token on the free plan', async () => {
    expect(await new AnonymousCredentialProvider().obtain({ reason: 'initial' })).toEqual({
      token: ANONYMOUS_TOKEN,
      planTier: '',
    });
  });

  it('should replace a rejected account token but not its own', async () => {
    const provider = new AnonymousCredentialProvider();

    expect(await provider.obtain({ reason: 'rejected', rejectedToken: 'stale-token' })).toEqual({
      token: ANONYMOUS_TOKEN,
      planTier: '',
    });
    expect(await provider.obtain({ reason: 'rejected', rejectedToken: ANONYMOUS_TOKEN })).toBeUndefined();
  });
});

describe('TokenFileCredentialProvider', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chartfeed-token-'));
    path = join(dir, 'auth', 'token');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a JSON token file', async () => {
    const provider = new TokenFileCredentialProvider({ path });
    await provider.save({ token: 'test-token', planTier: 'pro_premium' });

    expect(await provider.obtain({ reason: 'initial' })).toEqual({ token: 'test-token', planTier: 'pro_premium' });
  });

  it('should read a bare token on the free plan', async () => {
    const flat = join(dir, 'token.txt');
    await writeFile(flat, 'test-token\n');

    expect(await new TokenFileCredentialProvider({ path: flat }).obtain({ reason: 'initial' })).toEqual({
      token: 'test-token',
      planTier: '',
    });
  });

  it('should write the file owner-readable only', async () => {
    await new TokenFileCredentialProvider({ path }).save({ token: 'test-token', planTier: '' });

    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  it('should fall back when the file is missing and cache the result', async () => {
    const fallback = new StaticCredentialProvider('fallback-token', 'pro');
    const provider = new TokenFileCredentialProvider({ path, fallback });

    expect(await provider.obtain({ reason: 'initial' })).toEqual({ token: 'fallback-token', planTier: 'pro' });
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({ token: 'fallback-token', planTier: 'pro' });
  });

  it('should not cache the anonymous token', async () => {
    const provider = new TokenFileCredentialProvider({ path, fallback: new AnonymousCredentialProvider() });

    expect((await provider.obtain({ reason: 'initial' }))?.token).toBe(ANONYMOUS_TOKEN);
    expect(await provider.read()).toBeUndefined();
  });

  it('should delete the file on rejection and save the replacement', async () => {
    const fallback: CredentialProvider = {
      name: 'refresh',
      obtain: async (request) =>
        request.reason === 'rejected' ? { token: 'fresh-token', planTier: 'pro' } : undefined,
    };
    const provider = new TokenFileCredentialProvider({ path, fallback });
    await provider.save({ token: 'stale-token', planTier: 'pro' });

    const next = await provider.obtain({ reason: 'rejected', rejectedToken: 'stale-token' });

    expect(next).toEqual({ token: 'fresh-token', planTier: 'pro' });
    expect(await provider.read()).toEqual({ token: 'fresh-token', planTier: 'pro' });
  });

  it('should leave no file behind when a rejection cannot be recovered', async () => {
    const provider = new TokenFileCredentialProvider({ path });
    await provider.save({ token: 'stale-token', planTier: '' });

    expect(await provider.obtain({ reason: 'rejected', rejectedToken: 'stale-token' })).toBeUndefined();
    await expect(stat(path)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should drop a rejected cached token for anonymous access', async () => {
    const provider = new TokenFileCredentialProvider({ path, fallback: new AnonymousCredentialProvider() });
    await provider.save({ token: 'stale-token', planTier: 'pro' });
    const manager = new CredentialManager(provider);

    expect(await manager.current()).toEqual({ token: 'stale-token', planTier: 'pro' });
    expect(await manager.recover('stale-token', 'wrong data')).toEqual({ token: ANONYMOUS_TOKEN, planTier: '' });
    expect(manager.isUnrecoverable()).toBe(false);
    expect(manager.isAnonymous()).toBe(true);
    expect(manager.planTier()).toBe('');
    await expect(stat(path)).rejects.toMatchObject({ code: 'ENOENT' });

    expect(await manager.recover(ANONYMOUS_TOKEN)).toBeUndefined();
    expect(manager.isUnrecoverable()).toBe(true);
  });

  it('should ignore a malformed JSON file', async () => {
    const flat = join(dir, 'token.json');
    await writeFile(flat, '{"planTier": "pro"}');

    expect(await new TokenFileCredentialProvider({ path: flat }).obtain({ reason: 'initial' })).toBeUndefined();
  });
});

describe('CredentialManager', () => {
  it('should obtain the initial credential once', async () => {
    const provider = new StaticCredentialProvider('test-token', 'pro');
    const obtain = vi.spyOn(provider, 'obtain');
    const manager = new CredentialManager(provider);

    expect(manager.planTier()).toBe('');
    await manager.current();
    await manager.current();

    expect(obtain).toHaveBeenCalledTimes(1);
    expect(manager.planTier()).toBe('pro');
    expect(manager.isAnonymous()).toBe(false);
  });

  it('should become unrecoverable when no initial credential exists', async () => {
    const manager = new CredentialManager({ name: 'empty', obtain: async () => undefined });

    expect(await manager.current()).toBeUndefined();
    expect(manager.isUnrecoverable()).toBe(true);
  });

  it('should replace the credential on recovery', async () => {
    const manager = new CredentialManager({
      name: 'rotating',
      obtain: async (request) =>
        request.reason === 'initial' ? { token: 'stale-token', planTier: '' } : { token: 'fresh-token', planTier: 'pro' },
    });
    await manager.current();

    expect(await manager.recover('stale-token', 'wrong data')).toEqual({ token: 'fresh-token', planTier: 'pro' });
    expect(await manager.current()).toEqual({ token: 'fresh-token', planTier: 'pro' });
    expect(manager.planTier()).toBe('pro');
  });

  it('should stay unrecoverable once marked', async () => {
    const provider = new AnonymousCredentialProvider();
    const obtain = vi.spyOn(provider, 'obtain');
    const manager = new CredentialManager(provider);
    await manager.current();
    expect(manager.isAnonymous()).toBe(true);

    expect(await manager.recover(ANONYMOUS_TOKEN)).toBeUndefined();
    expect(manager.isUnrecoverable()).toBe(true);
    expect(await manager.current()).toBeUndefined();
    expect(await manager.recover(ANONYMOUS_TOKEN)).toBeUndefined();
    expect(obtain).toHaveBeenCalledTimes(2);
  });
});
