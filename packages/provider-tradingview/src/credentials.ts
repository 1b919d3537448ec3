/**
 * Credential providers and the engine's shared credential state.
 *
 * The engine asks for a credential once, on first use, and again only after
 * the server explicitly rejects the current token.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Logger } from '@chartfeed/logger';

/**
 * Bearer token plus the account's plan tier (`''` for free/anonymous).
 */
export interface Credential {
  token: string;
  planTier: string;
}

export type CredentialRequest =
  | { reason: 'initial' }
  | { reason: 'rejected'; rejectedToken: string; message?: string };

/**
 * Supplies credentials. Returning `undefined` means "cannot provide one";
 * after a rejection that makes the engine unrecoverable.
 */
export interface CredentialProvider {
  readonly name: string;
  obtain(request: CredentialRequest): Promise<Credential | undefined>;
}

/**
 * Token the service accepts for unauthenticated access.
 */
export const ANONYMOUS_TOKEN = 'unauthorized_user_token';

/**
 * A fixed token. Has no way to recover from a rejection.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider(process.env.TV_TOKEN ?? '', 'pro');
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  readonly name = 'static';

  constructor(
    private readonly token: string,
    private readonly planTier: string = ''
  ) {}

  async obtain(request: CredentialRequest): Promise<Credential | undefined> {
    if (request.reason === 'rejected') {
      return undefined;
    }
    return { token: this.token, planTier: this.planTier };
  }
}

/**
 * Anonymous access with the free-tier bar limit.
 *
 * Replaces any rejected token except the anonymous one itself.
 */
export class AnonymousCredentialProvider implements CredentialProvider {
  readonly name = 'anonymous';

  async obtain(request: CredentialRequest): Promise<Credential | undefined> {
    if (request.reason === 'rejected' && request.rejectedToken === ANONYMOUS_TOKEN) {
      return undefined;
    }
    return { token: ANONYMOUS_TOKEN, planTier: '' };
  }
}

const tokenFileSchema = z.object({
  token: z.string().min(1),
  planTier: z.string().default(''),
});

export interface TokenFileCredentialProviderOptions {
  /** Path of the cached token file */
  path: string;

  /** Asked when the file is missing or its token was rejected */
  fallback?: CredentialProvider;

  logger?: Logger;
}

/**
 * Token cached in a local file as `{"token": "...", "planTier": "pro"}`
 * (a bare token on one line is read with plan `''`).
 *
 * A rejected token's file is deleted. Whatever the fallback provider
 * returns is written back to the file.
 */
export class TokenFileCredentialProvider implements CredentialProvider {
  readonly name = 'token-file';

  private readonly path: string;
  private readonly fallback?: CredentialProvider;
  private readonly logger?: Logger;

  constructor(options: TokenFileCredentialProviderOptions) {
    this.path = options.path;
    this.fallback = options.fallback;
    this.logger = options.logger;
  }

  async obtain(request: CredentialRequest): Promise<Credential | undefined> {
    if (request.reason === 'initial') {
      const cached = await this.read();
      if (cached) {
        this.logger?.debug('Loaded cached token', { path: this.path });
        return cached;
      }
    } else {
      await this.remove();
    }

    const fresh = await this.fallback?.obtain(request);
    if (fresh && fresh.token !== ANONYMOUS_TOKEN) {
      await this.save(fresh);
    }
    return fresh;
  }

  async read(): Promise<Credential | undefined> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        return undefined;
      }
      throw err;
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return undefined;
    }

    if (!trimmed.startsWith('{')) {
      return { token: trimmed, planTier: '' };
    }

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      this.logger?.warn('Ignoring unreadable token file', { path: this.path });
      return undefined;
    }
    const parsed = tokenFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger?.warn('Ignoring malformed token file', { path: this.path });
      return undefined;
    }
    return parsed.data;
  }

  async save(credential: Credential): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(credential)}\n`, { encoding: 'utf8', mode: 0o600 });
    this.logger?.info('Token saved', { path: this.path });
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
    this.logger?.info('Token file deleted after rejection', { path: this.path });
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Credential state shared by every session of one engine.
 *
 * Not safe for concurrent use; one engine serves one caller flow.
 */
export class CredentialManager {
  private credential: Credential | undefined;
  private initialized = false;
  private unrecoverable = false;

  constructor(
    private readonly provider: CredentialProvider,
    private readonly logger?: Logger
  ) {}

  /**
   * Current credential, obtaining the initial one on first call.
   * Undefined once the engine is unrecoverable.
   */
  async current(): Promise<Credential | undefined> {
    if (this.unrecoverable) {
      return undefined;
    }
    if (!this.initialized) {
      this.initialized = true;
      this.credential = await this.provider.obtain({ reason: 'initial' });
      if (!this.credential) {
        this.logger?.error('No credential available', { provider: this.provider.name });
        this.unrecoverable = true;
      }
    }
    return this.credential;
  }

  /**
   * Asks the provider to replace a rejected token. Marks the engine
   * unrecoverable when it cannot.
   */
  async recover(rejectedToken: string, message?: string): Promise<Credential | undefined> {
    if (this.unrecoverable) {
      return undefined;
    }

    this.logger?.warn('Token rejected, attempting recovery', { provider: this.provider.name, reason: message });
    const next = await this.provider.obtain({ reason: 'rejected', rejectedToken, message });

    if (!next) {
      this.logger?.error('Could not recover credential automatically', { provider: this.provider.name });
      this.markUnrecoverable();
      return undefined;
    }

    this.credential = next;
    this.logger?.info('Credential recovered', { provider: this.provider.name, plan: next.planTier || 'free' });
    return next;
  }

  markUnrecoverable(): void {
    this.unrecoverable = true;
    this.credential = undefined;
  }

  isUnrecoverable(): boolean {
    return this.unrecoverable;
  }

  /**
   * Plan tier of the current credential, `''` until one is loaded.
   */
  planTier(): string {
    return this.credential?.planTier ?? '';
  }

  isAnonymous(): boolean {
    return this.credential?.token === ANONYMOUS_TOKEN;
  }
}
