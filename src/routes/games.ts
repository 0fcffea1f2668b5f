/**
 * Games Routes
 *
 * GET    /api/games       - List games, optionally filtered by ?category=<id>&publisher=<id>
 * GET    /api/games/:id   - Get one game
 * POST   /api/games       - Create a game
 * PUT    /api/games/:id   - Partially update a game
 * DELETE /api/games/:id   - Delete a game
 *
 * Every write runs in one transaction; any error thrown inside it rolls the
 * write back before the error handler builds the response.
 */

import { Router, type Request, type Response } from 'express';
import { NotFoundError } from '../errors.js';
import {
  applyGameChanges,
  buildGame,
  serializeGame,
  type GameChangesInput,
} from '../models/game.js';
import {
  gameListQuerySchema,
  parseId,
  requireFields,
  requirePayload,
  resolveReference,
  type Payload,
} from './request.js';
import type { RouteContext } from './context.js';
import type { Connection } from '../storage/sqlite.js';
import type { MessageBody } from '../types/index.js';

const REQUIRED_FIELDS = ['title', 'description', 'category_id', 'publisher_id'] as const;

export function createGamesRouter(ctx: RouteContext): Router {
  const router = Router();

  /** Map a snake_case update payload onto model changes, resolving references */
  const toChanges = (conn: Connection, payload: Payload): GameChangesInput => {
    const changes: GameChangesInput = {};

    if ('title' in payload) {
      changes.title = payload.title;
    }
    if ('description' in payload) {
      changes.description = payload.description;
    }
    if ('star_rating' in payload) {
      changes.starRating = payload.star_rating;
    }
    if ('category_id' in payload) {
      changes.categoryId = resolveReference(conn, ctx.categories, payload.category_id, 'Category');
    }
    if ('publisher_id' in payload) {
      changes.publisherId = resolveReference(conn, ctx.publishers, payload.publisher_id, 'Publisher');
    }

    return changes;
  };

  router.get('/', (req: Request, res: Response) => {
    const query = gameListQuerySchema.parse(req.query);
    const games = ctx.games.list(ctx.db.getDb(), {
      categoryId: query.category,
      publisherId: query.publisher,
    });

    res.json(games.map(serializeGame));
  });

  router.get('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    const game = id === null ? null : ctx.games.findById(ctx.db.getDb(), id);
    if (!game) {
      throw new NotFoundError('Game');
    }

    res.json(serializeGame(game));
  });

  router.post('/', (req: Request, res: Response) => {
    const payload = requirePayload(req.body);
    requireFields(payload, REQUIRED_FIELDS);

    const game = ctx.db.transaction((conn) => {
      const categoryId = resolveReference(conn, ctx.categories, payload.category_id, 'Category');
      const publisherId = resolveReference(conn, ctx.publishers, payload.publisher_id, 'Publisher');

      const draft = buildGame({
        title: payload.title,
        description: payload.description,
        starRating: payload.star_rating,
        categoryId,
        publisherId,
      });

      return ctx.games.create(conn, draft);
    });

    res.status(201).json(serializeGame(game));
  });

  router.put('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);

    const game = ctx.db.transaction((conn) => {
      const existing = id === null ? null : ctx.games.findRecord(conn, id);
      if (!existing) {
        throw new NotFoundError('Game');
      }

      const payload = requirePayload(req.body);
      const updated = applyGameChanges(existing, toChanges(conn, payload));
      return ctx.games.update(conn, updated);
    });

    res.json(serializeGame(game));
  });

  router.delete('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id);

    const title = ctx.db.transaction((conn) => {
      const existing = id === null ? null : ctx.games.findRecord(conn, id);
      if (!existing) {
        throw new NotFoundError('Game');
      }

      ctx.games.delete(conn, existing.id);
      return existing.title;
    });

    const body: MessageBody = { message: `Game '${title}' deleted successfully` };
    res.json(body);
  });

  return router;
}
