/**
 * Access gate: shared-secret token, scoped API keys and the client IP
 * allow-list.
 *
 * Secrets are compared in constant time. Both sides are hashed first so the
 * comparison does not leak the expected length either.
 */

import { createHash, timingSafeEqual } from 'crypto';
import { readFile } from 'fs/promises';
import { BlockList, isIPv4, isIPv6 } from 'net';
import { Cidr } from '../config';
import { ApiKeyEntry, ApiKeysFileSchema, hasScope, Scope } from '../domain/access';
import {
  errorMessage,
  forbidden,
  internal,
  maskSecret,
  tooManyRequests,
  unauthorized,
} from '../domain/errors';
import { Clock, MinuteWindowLimiter, RateDecision } from './rate-limit';

export const API_KEY_HEADER = 'x-api-key';
export const PASTE_TOKEN_HEADER = 'x-paste-token';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/** Constant-time string equality. */
export function secretsEqual(expected: string, provided: string): boolean {
  return timingSafeEqual(digest(expected), digest(provided));
}

/** With no expected token configured every request passes. */
export function verifyToken(expected: string | undefined, provided: string | undefined): void {
  if (expected === undefined) return;
  if (!secretsEqual(expected, provided ?? '')) {
    throw unauthorized('missing or invalid token');
  }
}

/** Strip the IPv4-mapped IPv6 prefix Node reports for IPv4 peers on dual-stack sockets. */
export function normalizeIp(ip: string): string {
  const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(ip);
  return mapped ? mapped[1] : ip;
}

export class ClientAllowList {
  private readonly blockList = new BlockList();
  readonly size: number;

  constructor(cidrs: Cidr[]) {
    for (const cidr of cidrs) {
      this.blockList.addSubnet(cidr.address, cidr.prefix, cidr.family);
    }
    this.size = cidrs.length;
  }

  /** An empty list allows every client. */
  check(ip: string | undefined): void {
    if (this.size === 0) return;
    if (!ip) throw forbidden('client IP unavailable');

    const addr = normalizeIp(ip);
    const family = isIPv4(addr) ? 'ipv4' : isIPv6(addr) ? 'ipv6' : null;
    if (!family || !this.blockList.check(addr, family)) {
      throw forbidden('client IP not in allowlist', { clientIp: addr });
    }
  }
}

export interface ApiKeyStoreOptions {
  now?: Clock;
}

export class ApiKeyStore {
  private readonly limiter: MinuteWindowLimiter;

  constructor(
    private readonly entries: ApiKeyEntry[] = [],
    options: ApiKeyStoreOptions = {},
  ) {
    this.limiter = new MinuteWindowLimiter(options.now);
  }

  /** Load and validate a key file. No path means API keys are disabled. */
  static async fromFile(path: string | undefined, options: ApiKeyStoreOptions = {}): Promise<ApiKeyStore> {
    if (path === undefined) return new ApiKeyStore([], options);

    let json: unknown;
    try {
      json = JSON.parse(await readFile(path, 'utf8'));
    } catch (err) {
      throw internal(`read api key file: ${errorMessage(err)}`);
    }
    const parsed = ApiKeysFileSchema.safeParse(json);
    if (!parsed.success) {
      throw internal(`parse api key file: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }

    const seen = new Set<string>();
    for (const entry of parsed.data.keys) {
      if (seen.has(entry.key)) throw internal('duplicate api key in api key file');
      seen.add(entry.key);
    }
    return new ApiKeyStore(parsed.data.keys, options);
  }

  get enabled(): boolean {
    return this.entries.length > 0;
  }

  /** Every entry is compared so lookup time does not depend on which key matched. */
  resolveKey(provided: string): ApiKeyEntry | undefined {
    let match: ApiKeyEntry | undefined;
    for (const entry of this.entries) {
      if (secretsEqual(entry.key, provided) && !match) match = entry;
    }
    return match;
  }

  /**
   * Resolve the key, check its scope, then count the request against its
   * quota. Returns the rate decision for a key with a ceiling, if any.
   */
  authorize(provided: string | undefined, scope: Scope): { entry?: ApiKeyEntry; rate?: RateDecision } {
    if (!this.enabled) return {};

    if (!provided) throw unauthorized('missing or invalid API key');
    const entry = this.resolveKey(provided);
    if (!entry) throw unauthorized('missing or invalid API key');

    if (!hasScope(entry, scope)) {
      throw forbidden(`api key lacks required scope '${scope}'`, { requiredScope: scope });
    }

    const rate = this.enforceRateLimit(entry);
    return { entry, rate };
  }

  enforceRateLimit(entry: ApiKeyEntry): RateDecision | undefined {
    const limit = entry.max_requests_per_minute;
    if (limit === undefined) return undefined;

    const decision = this.limiter.consume(keyIdentity(entry), limit);
    if (!decision.allowed) throw tooManyRequests(decision.retryAfterMs, limit);
    return decision;
  }
}

/** Rate-limit identity: the key's name, or a short key prefix when unnamed. */
export function keyIdentity(entry: ApiKeyEntry): string {
  return entry.name ?? `key:${entry.key.slice(0, 8)}`;
}

/** Identity safe to put in logs. */
export function keyLabel(entry: ApiKeyEntry): string {
  return entry.name ?? maskSecret(entry.key);
}
