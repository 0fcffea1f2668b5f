/**
 * Publishers Routes
 *
 * GET /api/publishers - All publishers sorted by name, with game counts
 */

import { Router, type Request, type Response } from 'express';
import { serializePublisher } from '../models/publisher.js';
import type { RouteContext } from './context.js';

export function createPublishersRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const publishers = ctx.publishers.listWithGameCounts(ctx.db.getDb());
    res.json(publishers.map(serializePublisher));
  });

  return router;
}
