/**
 * Categories Routes
 *
 * GET /api/categories - All categories sorted by name, with game counts
 */

import { Router, type Request, type Response } from 'express';
import { serializeCategory } from '../models/category.js';
import type { RouteContext } from './context.js';

export function createCategoriesRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const categories = ctx.categories.listWithGameCounts(ctx.db.getDb());
    res.json(categories.map(serializeCategory));
  });

  return router;
}
