/**
 * Security metadata: quote-packet parsing and the write-once cache.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { z } from 'zod';
import type { SecurityInfo } from '@chartfeed/contracts';
import type { Logger } from '@chartfeed/logger';

/**
 * Read-through store keyed by `securityInfoKey` (e.g. `ZC1_CBOT`).
 */
export interface SecurityInfoCache {
  lookup(key: string): Promise<SecurityInfo | undefined>;

  /**
   * Writes `info` under `key` unless the key already exists.
   * Returns false, without writing, when it does.
   */
  store(key: string, info: SecurityInfo): Promise<boolean>;
}

const securityInfoSchema = z.object({
  symbol: z.string(),
  description: z.string().optional(),
  exchange: z.string().optional(),
  type: z.string().optional(),
  currency: z.string().optional(),
  tickSize: z.number().optional(),
  pointValue: z.number().optional(),
  pricescale: z.number().optional(),
  minmov: z.number().optional(),
  timezone: z.string().optional(),
  session: z.string().optional(),
  isTradable: z.boolean().optional(),
  fractional: z.boolean().optional(),
  typespecs: z.array(z.string()).optional(),
});

/**
 * Process-local cache.
 */
export class InMemorySecurityInfoCache implements SecurityInfoCache {
  private readonly entries = new Map<string, SecurityInfo>();

  async lookup(key: string): Promise<SecurityInfo | undefined> {
    return this.entries.get(key);
  }

  async store(key: string, info: SecurityInfo): Promise<boolean> {
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, info);
    return true;
  }
}

/**
 * TOML file with one `[KEY]` table per symbol. New tables are appended; an
 * existing table is never rewritten. A missing file reads as empty.
 *
 * @example
 * ```toml
 * [ZC1_CBOT]
 * symbol = "CBOT:ZC1!"
 * exchange = "CBOT"
 * tickSize = 0.25
 * ```
 */
export class TomlSecurityInfoCache implements SecurityInfoCache {
  constructor(
    private readonly path: string,
    private readonly logger?: Logger
  ) {}

  async lookup(key: string): Promise<SecurityInfo | undefined> {
    const tables = await this.readAll();
    return tables.get(key);
  }

  async store(key: string, info: SecurityInfo): Promise<boolean> {
    const tables = await this.readAll();
    if (tables.has(key)) {
      this.logger?.debug('Security info already cached', { key });
      return false;
    }

    await mkdir(dirname(this.path), { recursive: true });
    const section = stringifyToml({ [key]: withoutUndefined(info) });
    const separator = tables.size > 0 ? '\n' : '';
    await appendFile(this.path, `${separator}${section}\n`, 'utf8');
    this.logger?.info('Security info cached', { key, path: this.path });
    return true;
  }

  /**
   * Every valid table in the file. Tables that do not look like security
   * info are ignored.
   */
  async readAll(): Promise<Map<string, SecurityInfo>> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new Map();
      }
      throw err;
    }

    const tables = new Map<string, SecurityInfo>();
    for (const [key, value] of Object.entries(parseToml(text))) {
      const parsed = securityInfoSchema.safeParse(value);
      if (parsed.success) {
        tables.set(key, parsed.data);
      } else {
        this.logger?.warn('Ignoring malformed security info table', { key, path: this.path });
      }
    }
    return tables;
  }
}

function withoutUndefined(info: SecurityInfo): Record<string, string | number | boolean | string[]> {
  const out: Record<string, string | number | boolean | string[]> = {};
  for (const [key, value] of Object.entries(info)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

const quotePacketSchema = z.object({
  m: z.literal('qsd'),
  p: z.tuple([
    z.string(),
    z.object({
      n: z.string().optional(),
      s: z.string().optional(),
      v: z.record(z.unknown()).optional(),
    }),
  ]).rest(z.unknown()),
});

const quoteFieldsSchema = z.object({
  description: z.string().optional(),
  exchange: z.string().optional(),
  type: z.string().optional(),
  currency_code: z.string().optional(),
  pricescale: z.number().optional(),
  minmov: z.number().optional(),
  pointvalue: z.number().optional(),
  timezone: z.string().optional(),
  session: z.string().optional(),
  is_tradable: z.boolean().optional(),
  fractional: z.boolean().optional(),
  typespecs: z.array(z.string()).optional(),
});

/**
 * Folds `qsd` packets into SecurityInfo. Later values overwrite earlier
 * ones; fields of the wrong type are ignored. Returns undefined when no
 * usable quote data arrived or the server reported an error status.
 *
 * `tickSize` is derived as `minmov / pricescale`.
 */
export function parseSecurityInfo(packets: readonly unknown[], symbol: string): SecurityInfo | undefined {
  const merged: Record<string, unknown> = {};
  let received = false;

  for (const packet of packets) {
    const parsed = quotePacketSchema.safeParse(packet);
    if (!parsed.success) {
      continue;
    }
    const body = parsed.data.p[1];
    if (body.s === 'error') {
      return undefined;
    }
    if (body.v) {
      Object.assign(merged, body.v);
      received = true;
    }
  }

  if (!received) {
    return undefined;
  }

  const fields: Record<string, unknown> = {};
  for (const [key, schema] of Object.entries(quoteFieldsSchema.shape)) {
    if (schema.safeParse(merged[key]).success) {
      fields[key] = merged[key];
    }
  }
  const quote = quoteFieldsSchema.parse(fields);

  const info: SecurityInfo = { symbol };
  if (quote.description !== undefined) info.description = quote.description;
  if (quote.exchange !== undefined) info.exchange = quote.exchange;
  if (quote.type !== undefined) info.type = quote.type;
  if (quote.currency_code !== undefined) info.currency = quote.currency_code;
  if (quote.pricescale !== undefined) info.pricescale = quote.pricescale;
  if (quote.minmov !== undefined) info.minmov = quote.minmov;
  if (quote.pointvalue !== undefined) info.pointValue = quote.pointvalue;
  if (quote.timezone !== undefined) info.timezone = quote.timezone;
  if (quote.session !== undefined) info.session = quote.session;
  if (quote.is_tradable !== undefined) info.isTradable = quote.is_tradable;
  if (quote.fractional !== undefined) info.fractional = quote.fractional;
  if (quote.typespecs !== undefined) info.typespecs = quote.typespecs;
  if (quote.minmov !== undefined && quote.pricescale !== undefined && quote.pricescale !== 0) {
    info.tickSize = quote.minmov / quote.pricescale;
  }

  return info;
}
