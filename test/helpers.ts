/**
 * Shared test fixture: an in-memory catalog with two categories,
 * two publishers and three games
 */

import { buildCategory } from '../src/models/category.js';
import { buildGame } from '../src/models/game.js';
import { buildPublisher } from '../src/models/publisher.js';
import { CategoryStore } from '../src/storage/category-store.js';
import { GameStore } from '../src/storage/game-store.js';
import { PublisherStore } from '../src/storage/publisher-store.js';
import { openDatabase, type DatabaseConfig, type DatabaseManager } from '../src/storage/sqlite.js';

export const TEST_DATA = {
  publishers: [
    { name: 'Lantern Works', description: 'Studio making tabletop-inspired games' },
    { name: 'Paper Crane Games', description: null },
  ],
  categories: [
    { name: 'Strategy', description: 'Games won by planning ahead' },
    { name: 'Party', description: null },
  ],
  games: [
    {
      title: 'Canal Barons',
      description: 'Build waterways and corner the river trade',
      categoryIndex: 0,
      publisherIndex: 0,
      starRating: 4.5,
    },
    {
      title: 'Quick Draw Quartet',
      description: 'Sketch clues while teammates shout guesses',
      categoryIndex: 1,
      publisherIndex: 1,
      starRating: 4.2,
    },
    {
      title: 'Orchard Wars',
      description: 'Claim fruit trees and outbid rivals at market',
      categoryIndex: 0,
      publisherIndex: 1,
      starRating: null,
    },
  ],
} as const;

export interface CatalogFixture {
  db: DatabaseManager;
  categoryIds: number[];
  publisherIds: number[];
  gameIds: number[];
}

export function createTestDatabase(config: Partial<DatabaseConfig> = {}): DatabaseManager {
  return openDatabase({ path: ':memory:', ...config });
}

export function createCatalog(): CatalogFixture {
  const db = createTestDatabase();
  const categories = new CategoryStore();
  const publishers = new PublisherStore();
  const games = new GameStore();

  return db.transaction((conn) => {
    const publisherIds = TEST_DATA.publishers.map(
      input => publishers.create(conn, buildPublisher(input)).id
    );
    const categoryIds = TEST_DATA.categories.map(
      input => categories.create(conn, buildCategory(input)).id
    );
    const gameIds = TEST_DATA.games.map(input => games.create(conn, buildGame({
      title: input.title,
      description: input.description,
      starRating: input.starRating,
      categoryId: categoryIds[input.categoryIndex],
      publisherId: publisherIds[input.publisherIndex],
    })).id);

    return { db, categoryIds, publisherIds, gameIds };
  });
}
