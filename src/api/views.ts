/**
 * Browser views. No API key or token is required.
 *
 * GET /, /dashboard: Recent pastes
 * GET /p/:id: One paste, markdown rendered
 */

import { Router } from 'express';
import { renderDashboard, renderPage, renderPasteBody } from '../render/pages';
import { PasteService } from '../service/paste-service';

export const DASHBOARD_LIMIT = 20;

export function createViewRoutes(service: PasteService): Router {
  const router = Router();

  router.get(['/', '/dashboard'], async (_req, res, next) => {
    try {
      const items = await service.recent(DASHBOARD_LIMIT);
      res.type('html').send(renderDashboard(items));
    } catch (err) {
      next(err);
    }
  });

  router.get('/p/:id', async (req, res, next) => {
    try {
      const { meta, bytes } = await service.getContent(req.params.id);
      res.type('html').send(renderPage(meta.id, renderPasteBody(meta, bytes)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
