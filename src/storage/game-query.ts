/**
 * Game Query Builder
 * Builds the joined read query shared by the game list and lookup endpoints
 */

import type { GameFilters, GameWithRefs } from '../types/index.js';

export interface GameQuery {
  sql: string;
  params: number[];
}

/** Row shape returned by the joined query */
export interface GameJoinRow {
  id: number;
  title: string;
  description: string;
  starRating: number | null;
  categoryId: number;
  publisherId: number;
  publisherRefId: number | null;
  publisherName: string | null;
  categoryRefId: number | null;
  categoryName: string | null;
}

// Left joins keep games whose publisher or category cannot be resolved
const BASE_QUERY = `
  SELECT
    g.id, g.title, g.description,
    g.star_rating AS starRating,
    g.category_id AS categoryId,
    g.publisher_id AS publisherId,
    p.id AS publisherRefId, p.name AS publisherName,
    c.id AS categoryRefId, c.name AS categoryName
  FROM games g
  LEFT JOIN publishers p ON g.publisher_id = p.id
  LEFT JOIN categories c ON g.category_id = c.id
`;

/**
 * Build the game read query. Each filter present is an exact match on its
 * column; filters combine with AND. Results are in insertion order.
 */
export function buildGameQuery(filters: GameFilters = {}): GameQuery {
  const conditions: string[] = [];
  const params: number[] = [];

  if (filters.id !== undefined) {
    conditions.push('g.id = ?');
    params.push(filters.id);
  }
  if (filters.categoryId !== undefined) {
    conditions.push('g.category_id = ?');
    params.push(filters.categoryId);
  }
  if (filters.publisherId !== undefined) {
    conditions.push('g.publisher_id = ?');
    params.push(filters.publisherId);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  return {
    sql: `${BASE_QUERY}${where}\n  ORDER BY g.id`,
    params,
  };
}

export function mapGameRow(row: GameJoinRow): GameWithRefs {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    starRating: row.starRating,
    categoryId: row.categoryId,
    publisherId: row.publisherId,
    publisher: row.publisherRefId !== null && row.publisherName !== null
      ? { id: row.publisherRefId, name: row.publisherName }
      : null,
    category: row.categoryRefId !== null && row.categoryName !== null
      ? { id: row.categoryRefId, name: row.categoryName }
      : null,
  };
}
