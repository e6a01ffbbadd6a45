/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Server } from 'http';
import { AppPaths, ServeConfig, resolvePaths } from './config';
import { Scope } from './domain/access';
import { errorMessage, internal } from './domain/errors';
import { Logger, logger as rootLogger, setLogLevel } from './logger';
import { ApiKeyStore, ClientAllowList } from './api/auth';
import { errorHandler, requestContext, requireScope } from './api/middleware';
import { createPasteRoutes } from './api/pastes';
import { createViewRoutes } from './api/views';
import { PasteService } from './service/paste-service';
import { runPreflight } from './storage/bootstrap';
import { GitAdapter } from './storage/git-adapter';
import { acquireLock } from './storage/repository-lock';
import { VersionControl } from './storage/version-control';

export const API_NAME = 'lanpaste';
export const API_VERSION = 'v1';

export const API_ENDPOINTS = [
  '/api/v1/paste (POST)',
  '/api/v1/p/{id} (GET)',
  '/api/v1/p/{id}/raw (GET)',
  '/api/v1/recent?n=50&tag=... (GET)',
];

/** Application context containing all services. */
export interface AppContext {
  config: ServeConfig;
  paths: AppPaths;
  git: GitAdapter;
  service: PasteService;
  apiKeys: ApiKeyStore;
  allowList: ClientAllowList;
  logger: Logger;
}

export interface AppContextOverrides {
  /** Replaces the git backend for commits and history lookups. */
  vcs?: VersionControl;
  apiKeys?: ApiKeyStore;
  logger?: Logger;
  now?: () => Date;
}

/** Create the application context with all services. */
export async function createAppContext(
  config: ServeConfig,
  overrides: AppContextOverrides = {},
): Promise<AppContext> {
  const logger = overrides.logger ?? rootLogger;
  const paths = resolvePaths(config.dir);
  const git = new GitAdapter({
    repoDir: paths.repo,
    identity: { name: config.gitAuthorName, email: config.gitAuthorEmail },
  });
  const apiKeys = overrides.apiKeys ?? (await ApiKeyStore.fromFile(config.apiKeysFile));

  if (apiKeys.enabled && config.token !== undefined) {
    logger.warn('API keys are enabled; --token is ignored for paste creation');
  }

  const service = new PasteService({
    paths,
    vcs: overrides.vcs ?? git,
    pushMode: config.push,
    remote: config.remote,
    maxBytes: config.maxBytes,
    logger,
    now: overrides.now,
  });

  return {
    config,
    paths,
    git,
    service,
    apiKeys,
    allowList: new ClientAllowList(config.allowCidr),
    logger,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', ctx.config.trustProxy);

  app.use(requestContext(ctx.logger));

  app.get('/healthz', (_req, res) => {
    res.type('text').send('ok');
  });

  app.get('/readyz', async (_req, res, next) => {
    try {
      await ctx.service.ready();
      res.type('text').send('ok');
    } catch (err) {
      next(err);
    }
  });

  app.get('/api', requireScope(ctx.apiKeys, Scope.ApiIndex, ctx.logger), (_req, res) => {
    res.json({ name: API_NAME, version: API_VERSION, endpoints: API_ENDPOINTS });
  });

  app.use(
    '/api/v1',
    createPasteRoutes({
      service: ctx.service,
      apiKeys: ctx.apiKeys,
      token: ctx.config.token,
      allowList: ctx.allowList,
      maxBytes: ctx.config.maxBytes,
    }),
  );

  app.use('/', createViewRoutes(ctx.service));

  app.use(errorHandler(ctx.logger));

  return app;
}

export interface RunningServer {
  server: Server;
  context: AppContext;
  close(): Promise<void>;
}

function listen(app: express.Application, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * Preflight, take the single-instance lock, then listen. The daemon lock is
 * held until `close()` resolves.
 */
export async function startServer(config: ServeConfig): Promise<RunningServer> {
  setLogLevel(config.logLevel);
  const context = await createAppContext(config);
  const { paths, logger } = context;

  await runPreflight(paths, context.git, logger);
  const daemonLock = await acquireLock(paths.daemonLock, { logger });

  let server: Server;
  try {
    server = await listen(createApp(context), config.bind.host, config.bind.port);
  } catch (err) {
    await daemonLock.release();
    throw internal(`bind failed: ${errorMessage(err)}`);
  }

  logger.info('Server listening', {
    host: config.bind.host,
    port: config.bind.port,
    dir: paths.base,
    push: config.push,
    apiKeys: context.apiKeys.enabled,
  });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await daemonLock.release();
    logger.info('Server stopped');
  };

  return { server, context, close };
}
