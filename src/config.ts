/**
 * Server configuration.
 *
 * `ServeConfigSchema` validates the values collected by the CLI (flags or
 * LANPASTE_* environment variables) before anything touches the disk.
 */

import { isIP } from 'net';
import { join, resolve } from 'path';
import { z } from 'zod';
import { invalidInput } from './domain/errors';
import { PushMode } from './domain/paste';
import { LogLevel } from './logger';

export const DEFAULT_BIND = '0.0.0.0:8090';
export const DEFAULT_MAX_BYTES = 1_048_576;
export const DEFAULT_REMOTE = 'origin';
export const DEFAULT_AUTHOR_NAME = 'LAN Paste';
export const DEFAULT_AUTHOR_EMAIL = 'paste@lan';

export interface BindAddress {
  host: string;
  port: number;
}

/** Parse `host:port` or `[v6]:port`. */
export function parseBindAddress(value: string): BindAddress | null {
  const idx = value.lastIndexOf(':');
  if (idx <= 0) return null;
  let host = value.slice(0, idx);
  const portText = value.slice(idx + 1);
  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1);
  if (!/^\d+$/.test(portText)) return null;
  const port = Number(portText);
  if (port > 65535 || isIP(host) === 0) return null;
  return { host, port };
}

export interface Cidr {
  address: string;
  prefix: number;
  family: 'ipv4' | 'ipv6';
}

export function parseCidr(value: string): Cidr | null {
  const [address, prefixText, ...rest] = value.trim().split('/');
  if (rest.length > 0 || !address) return null;
  const version = isIP(address);
  if (version === 0) return null;
  const family = version === 4 ? 'ipv4' : 'ipv6';
  const maxPrefix = version === 4 ? 32 : 128;
  const prefix = prefixText === undefined ? maxPrefix : Number(prefixText);
  if (prefixText === '' || !Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) return null;
  return { address, prefix, family };
}

export const ServeConfigSchema = z
  .object({
    dir: z.string().min(1),
    bind: z
      .string()
      .default(DEFAULT_BIND)
      .transform((value, ctx) => {
        const parsed = parseBindAddress(value);
        if (!parsed) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid bind address: ${value}` });
          return z.NEVER;
        }
        return parsed;
      }),
    token: z.string().min(1).optional(),
    apiKeysFile: z.string().min(1).optional(),
    maxBytes: z.number().int().positive().default(DEFAULT_MAX_BYTES),
    push: z.nativeEnum(PushMode).default(PushMode.Off),
    remote: z.string().min(1).default(DEFAULT_REMOTE),
    allowCidr: z
      .array(z.string())
      .default([])
      .transform((values, ctx) => {
        const out: Cidr[] = [];
        for (const value of values) {
          const cidr = parseCidr(value);
          if (!cidr) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid CIDR: ${value}` });
            return z.NEVER;
          }
          out.push(cidr);
        }
        return out;
      }),
    gitAuthorName: z.string().min(1).default(DEFAULT_AUTHOR_NAME),
    gitAuthorEmail: z.string().min(1).default(DEFAULT_AUTHOR_EMAIL),
    trustProxy: z.boolean().default(false),
    logLevel: z.nativeEnum(LogLevel).default(LogLevel.Info),
  });

export type ServeConfig = z.output<typeof ServeConfigSchema>;
export type ServeConfigInput = z.input<typeof ServeConfigSchema>;

/** Validate raw settings; the first problem found fails with InvalidInput. */
export function parseServeConfig(input: ServeConfigInput): ServeConfig {
  const parsed = ServeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw invalidInput(field ? `${field}: ${issue.message}` : issue.message);
  }
  return parsed.data;
}

/** On-disk layout below the storage root. */
export interface AppPaths {
  base: string;
  repo: string;
  run: string;
  tmp: string;
  gitLock: string;
  daemonLock: string;
  idempotency: string;
}

export function resolvePaths(dir: string): AppPaths {
  const base = resolve(dir);
  const run = join(base, 'run');
  return {
    base,
    repo: join(base, 'repo'),
    run,
    tmp: join(base, 'tmp'),
    gitLock: join(run, 'git.lock'),
    daemonLock: join(run, 'daemon.lock'),
    idempotency: join(run, 'idempotency'),
  };
}
