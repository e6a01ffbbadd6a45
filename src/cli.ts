#!/usr/bin/env node
/**
 * `lanpaste serve`: run the paste server.
 *
 * Every flag can also be given as a LANPASTE_* environment variable,
 * e.g. LANPASTE_MAX_BYTES or LANPASTE_API_KEYS_FILE.
 */

import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  DEFAULT_AUTHOR_EMAIL,
  DEFAULT_AUTHOR_NAME,
  DEFAULT_BIND,
  DEFAULT_MAX_BYTES,
  DEFAULT_REMOTE,
  parseServeConfig,
  ServeConfig,
} from './config';
import { errorMessage, isPasteError } from './domain/errors';
import { PushMode } from './domain/paste';
import { LogLevel, logger } from './logger';
import { startServer } from './server';

export const ENV_PREFIX = 'LANPASTE';

const NO_CIDRS: string[] = [];

export interface ServeArgs {
  dir: string;
  bind: string;
  token?: string;
  'api-keys-file'?: string;
  'max-bytes': number;
  push: PushMode;
  remote: string;
  'allow-cidr': string[];
  'git-author-name': string;
  'git-author-email': string;
  'trust-proxy': boolean;
  'log-level': LogLevel;
}

export function serveOptions(y: Argv) {
  return y
    .option('dir', { type: 'string', demandOption: true, describe: 'Storage root (repo/, run/, tmp/)' })
    .option('bind', { type: 'string', default: DEFAULT_BIND, describe: 'Listen address host:port' })
    .option('token', { type: 'string', describe: 'Shared secret required in X-Paste-Token for creates' })
    .option('api-keys-file', { type: 'string', describe: 'JSON file of scoped API keys' })
    .option('max-bytes', { type: 'number', default: DEFAULT_MAX_BYTES, describe: 'Maximum paste size' })
    .option('push', {
      choices: [PushMode.Off, PushMode.BestEffort, PushMode.Strict] as const,
      default: PushMode.Off,
      describe: 'Push policy after each commit',
    })
    .option('remote', { type: 'string', default: DEFAULT_REMOTE, describe: 'Remote to push to' })
    .option('allow-cidr', {
      type: 'string',
      array: true,
      default: NO_CIDRS,
      describe: 'Client ranges allowed to create pastes (repeatable)',
    })
    .option('git-author-name', { type: 'string', default: DEFAULT_AUTHOR_NAME })
    .option('git-author-email', { type: 'string', default: DEFAULT_AUTHOR_EMAIL })
    .option('trust-proxy', {
      type: 'boolean',
      default: false,
      describe: 'Take the client IP from X-Forwarded-For',
    })
    .option('log-level', {
      choices: [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error] as const,
      default: LogLevel.Info,
    });
}

export function configFromArgs(args: ServeArgs): ServeConfig {
  return parseServeConfig({
    dir: args.dir,
    bind: args.bind,
    token: args.token,
    apiKeysFile: args['api-keys-file'],
    maxBytes: args['max-bytes'],
    push: args.push,
    remote: args.remote,
    allowCidr: args['allow-cidr'],
    gitAuthorName: args['git-author-name'],
    gitAuthorEmail: args['git-author-email'],
    trustProxy: args['trust-proxy'],
    logLevel: args['log-level'],
  });
}

/** Parse `serve` flags without running anything. */
export function parseServeArgs(argv: string[], env = true): ServeConfig {
  let parser = serveOptions(yargs(argv)).strict().exitProcess(false);
  if (env) parser = parser.env(ENV_PREFIX);
  return configFromArgs(parser.parseSync());
}

async function serve(config: ServeConfig): Promise<void> {
  const running = await startServer(config);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { signal });
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  await yargs(argv)
    .scriptName('lanpaste')
    .env(ENV_PREFIX)
    .command('serve', 'Run the paste server', serveOptions, async (args) => {
      await serve(configFromArgs(args));
    })
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

if (require.main === module) {
  main().catch((err: unknown) => {
    const code = isPasteError(err) ? err.code : undefined;
    logger.error('Fatal', { code, error: errorMessage(err) });
    process.exitCode = 1;
  });
}
