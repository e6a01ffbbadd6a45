/**
 * API Middleware: request ids, API-key scopes, and error handling.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuid } from 'uuid';
import { Scope } from '../domain/access';
import {
  apiError,
  createTypedError,
  errorMessage,
  httpStatusFor,
  isPasteError,
  tooLarge,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { API_KEY_HEADER, ApiKeyStore, keyLabel } from './auth';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** Single value of a request header, or undefined when absent or empty. */
export function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first === '' ? undefined : first;
}

/** Single string query parameter; repeated or nested values are ignored. */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/** Peer address, or the forwarded client when `trust proxy` is enabled. */
export function clientIp(req: Request): string | undefined {
  return req.ip ?? req.socket.remoteAddress;
}

/** Tag every response with a request id and log its completion. */
export function requestContext(logger: Logger = rootLogger): RequestHandler {
  return (req, res, next) => {
    const requestId = uuid();
    res.setHeader(REQUEST_ID_HEADER, requestId);
    res.locals.requestId = requestId;

    const started = Date.now();
    res.on('finish', () => {
      logger.debug('Request completed', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Require `scope` from the API key in `X-API-Key`. A no-op when no key file is loaded. */
export function requireScope(store: ApiKeyStore, scope: Scope, logger: Logger = rootLogger): RequestHandler {
  return (req, res, next) => {
    try {
      const { entry, rate } = store.authorize(headerValue(req, API_KEY_HEADER), scope);
      if (entry) logger.debug('API key authorized', { key: keyLabel(entry), scope });
      if (rate) {
        res.setHeader('X-RateLimit-Limit', String(rate.limit));
        res.setHeader('X-RateLimit-Remaining', String(rate.remaining));
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}

function isBodyTooLarge(err: unknown): err is { type: string; length?: number; limit?: number } {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

/** Global error handling middleware. */
export function errorHandler(logger: Logger = rootLogger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const requestId: unknown = res.locals.requestId;

    if (isBodyTooLarge(err)) {
      const typed = tooLarge(err.length ?? 0, err.limit ?? 0).typedError;
      logger.warn('Request error', { requestId, code: typed.code, status: 413 });
      res.status(413).json(apiError(typed));
      return;
    }

    if (isPasteError(err)) {
      const typed = err.typedError;
      const status = httpStatusFor(typed.kind);
      if (typed.kind === 'too_many_requests') {
        const retryAfterMs = typed.details?.retryAfterMs;
        if (typeof retryAfterMs === 'number') {
          res.setHeader('Retry-After', String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
        }
      }
      if (status >= 500) {
        logger.error('Request failed', { requestId, code: typed.code, status, message: typed.message });
      } else {
        logger.warn('Request error', { requestId, code: typed.code, status });
      }
      res.status(status).json(apiError(typed));
      return;
    }

    logger.error('Unhandled request error', {
      requestId,
      message: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });

    res.status(500).json(
      apiError(
        createTypedError({
          code: 'SYSTEM.INTERNAL',
          kind: 'internal',
          message: 'Internal server error',
        }),
      ),
    );
  };
}
