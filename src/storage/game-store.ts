/**
 * Game Store
 * Persistence for games; reads go through the joined query builder
 */

import { buildGameQuery, mapGameRow, type GameJoinRow } from './game-query.js';
import type { Connection } from './sqlite.js';
import type { Game, GameFilters, GameWithRefs, NewGame } from '../types/index.js';

export class GameStore {
  /**
   * List games matching every filter given
   */
  list(conn: Connection, filters: Omit<GameFilters, 'id'> = {}): GameWithRefs[] {
    const { sql, params } = buildGameQuery(filters);
    return conn.prepare<number[], GameJoinRow>(sql).all(...params).map(mapGameRow);
  }

  /**
   * Get a game with its publisher and category
   */
  findById(conn: Connection, id: number): GameWithRefs | null {
    const { sql, params } = buildGameQuery({ id });
    const row = conn.prepare<number[], GameJoinRow>(sql).get(...params);
    return row ? mapGameRow(row) : null;
  }

  /**
   * Get the bare game row, without joins
   */
  findRecord(conn: Connection, id: number): Game | null {
    const row = conn.prepare<[number], Game>(`
      SELECT id, title, description, star_rating AS starRating,
             category_id AS categoryId, publisher_id AS publisherId
      FROM games
      WHERE id = ?
    `).get(id);

    return row ?? null;
  }

  create(conn: Connection, draft: NewGame): GameWithRefs {
    const result = conn.prepare(`
      INSERT INTO games (title, description, star_rating, category_id, publisher_id)
      VALUES (?, ?, ?, ?, ?)
    `).run(
      draft.title,
      draft.description,
      draft.starRating,
      draft.categoryId,
      draft.publisherId
    );

    return this.requireById(conn, Number(result.lastInsertRowid));
  }

  /**
   * Write every column of an already-validated record
   */
  update(conn: Connection, game: Game): GameWithRefs {
    conn.prepare(`
      UPDATE games
      SET title = ?, description = ?, star_rating = ?, category_id = ?, publisher_id = ?
      WHERE id = ?
    `).run(
      game.title,
      game.description,
      game.starRating,
      game.categoryId,
      game.publisherId,
      game.id
    );

    return this.requireById(conn, game.id);
  }

  delete(conn: Connection, id: number): boolean {
    const result = conn.prepare(`
      DELETE FROM games WHERE id = ?
    `).run(id);

    return result.changes > 0;
  }

  count(conn: Connection): number {
    const row = conn.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM games
    `).get();

    return row?.count ?? 0;
  }

  private requireById(conn: Connection, id: number): GameWithRefs {
    const game = this.findById(conn, id);
    if (!game) {
      throw new Error(`Game ${id} missing after write`);
    }
    return game;
  }
}
