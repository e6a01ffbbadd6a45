/**
 * Paste API routes, mounted under /api/v1.
 *
 * POST /paste: Store a paste (raw body)
 * GET /p/:id: Paste metadata
 * GET /p/:id/raw: Paste bytes as a download
 * GET /recent: Newest pastes, `?n=&tag=`
 */

import express, { RequestHandler, Router } from 'express';
import { Scope } from '../domain/access';
import { invalidInput } from '../domain/errors';
import { PasteService } from '../service/paste-service';
import {
  API_KEY_HEADER,
  ApiKeyStore,
  ClientAllowList,
  normalizeIp,
  PASTE_TOKEN_HEADER,
  verifyToken,
} from './auth';
import { clientIp, headerValue, queryString, requireScope } from './middleware';

export const IDEMPOTENCY_KEY_HEADER = 'idempotency-key';

export interface PasteRouteDeps {
  service: PasteService;
  apiKeys: ApiKeyStore;
  /** Shared secret for creates; ignored while API keys are enabled. */
  token?: string;
  allowList: ClientAllowList;
  maxBytes: number;
}

/** API key with `paste:create`, or the shared token, then the client allow-list. */
function createGate(deps: PasteRouteDeps): RequestHandler {
  return (req, _res, next) => {
    try {
      if (deps.apiKeys.enabled) {
        deps.apiKeys.authorize(headerValue(req, API_KEY_HEADER), Scope.PasteCreate);
      } else {
        verifyToken(deps.token, headerValue(req, PASTE_TOKEN_HEADER));
      }
      deps.allowList.check(clientIp(req));
      next();
    } catch (err) {
      next(err);
    }
  };
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) throw invalidInput('n must be a non-negative integer', { n: value });
  return Number(value);
}

export function createPasteRoutes(deps: PasteRouteDeps): Router {
  const router = Router();
  const { service, apiKeys } = deps;

  router.post(
    '/paste',
    createGate(deps),
    express.raw({ type: () => true, limit: deps.maxBytes }),
    async (req, res, next) => {
      try {
        const bytes: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const ip = clientIp(req);
        const outcome = await service.create(
          {
            name: queryString(req, 'name'),
            message: queryString(req, 'msg'),
            tag: queryString(req, 'tag'),
            contentType: headerValue(req, 'content-type'),
            bytes,
            clientIp: ip !== undefined ? normalizeIp(ip) : undefined,
            userAgent: headerValue(req, 'user-agent'),
          },
          headerValue(req, IDEMPOTENCY_KEY_HEADER)?.trim() || undefined,
        );
        res.status(outcome.status === 'created' ? 201 : 200).json(outcome.response);
      } catch (err) {
        next(err);
      }
    },
  );

  router.get('/p/:id', requireScope(apiKeys, Scope.PasteRead), async (req, res, next) => {
    try {
      res.json(await service.getMeta(req.params.id));
    } catch (err) {
      next(err);
    }
  });

  router.get('/p/:id/raw', requireScope(apiKeys, Scope.PasteRead), async (req, res, next) => {
    try {
      const { bytes } = await service.getContent(req.params.id);
      res.setHeader('Content-Type', 'application/octet-stream');
      res.setHeader('Content-Disposition', 'attachment');
      res.setHeader('X-Content-Type-Options', 'nosniff');
      res.send(bytes);
    } catch (err) {
      next(err);
    }
  });

  router.get('/recent', requireScope(apiKeys, Scope.RecentRead), async (req, res, next) => {
    try {
      const limit = parseLimit(queryString(req, 'n'));
      res.json(await service.recent(limit, queryString(req, 'tag')));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
