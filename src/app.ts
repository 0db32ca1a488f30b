/* app.ts - Express routes for the navigation host */

import express, { type Express } from 'express';
import type { NavService } from './nav-service';
import { setupSecurity } from './security';
import {
  validateBody,
  pathRequestSchema,
  blockedRequestSchema,
  lineOfSightRequestSchema,
  entitiesUpdateSchema,
  errorHandler,
  type EntitiesUpdate,
  type JsonReply,
  type PathRequest,
  type BlockedRequest,
  type LineOfSightRequest,
} from './validation';
import type { MobileEntity } from './types';

export interface AppOptions {
  isDev: boolean;
  /** Called after the mobile entity list has been replaced */
  onEntitiesChanged?: (entities: readonly MobileEntity[]) => void;
}

export function createApp(nav: NavService, options: AppOptions): Express {
  const app = express();

  // Security headers + CORS - must come before other middleware
  setupSecurity(app, options.isDev);

  app.use(express.json({ limit: '256kb' }));

  // ── Navigation queries ─────────────────────────────────────

  app.post('/nav/path', validateBody(pathRequestSchema), (req: { body: PathRequest }, res: JsonReply) => {
    const body: PathRequest = req.body;
    res.json(nav.findPath(body));
  });

  app.post('/nav/blocked', validateBody(blockedRequestSchema), (req: { body: BlockedRequest }, res: JsonReply) => {
    const body: BlockedRequest = req.body;
    res.json(nav.blocked(body));
  });

  app.post('/nav/line-of-sight', validateBody(lineOfSightRequestSchema), (req: { body: LineOfSightRequest }, res: JsonReply) => {
    const body: LineOfSightRequest = req.body;
    res.json(nav.lineOfSight(body));
  });

  // ── World ──────────────────────────────────────────────────

  app.get('/world', (_req, res) => {
    res.json(nav.summary());
  });

  app.put('/world/entities', validateBody(entitiesUpdateSchema), entitiesUpdateHandler(nav, options.onEntitiesChanged));

  app.get('/health', (_req, res) => {
    const world = nav.summary();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      map: world.name,
      width: world.width,
      height: world.height,
      entities: world.entities.length,
      memoryUsage: process.memoryUsage(),
    });
  });

  // ── Error handler (must be LAST middleware) ──────────────────
  app.use(errorHandler);

  return app;
}

/** Replaces the mobile entity list from a validated body, then notifies */
export function entitiesUpdateHandler(nav: NavService, onChanged?: AppOptions['onEntitiesChanged']) {
  return (req: { body: EntitiesUpdate }, res: JsonReply): void => {
    const { entities } = req.body;
    const count = nav.replaceEntities(entities);
    onChanged?.(entities);
    res.json({ ok: true, count });
  };
}
