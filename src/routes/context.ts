/**
 * Route Context
 * Database and stores handed to every router
 */

import {
  CategoryStore,
  GameStore,
  PublisherStore,
  type DatabaseManager,
} from '../storage/index.js';

export interface RouteContext {
  db: DatabaseManager;
  games: GameStore;
  categories: CategoryStore;
  publishers: PublisherStore;
}

export function createRouteContext(db: DatabaseManager): RouteContext {
  return {
    db,
    games: new GameStore(),
    categories: new CategoryStore(),
    publishers: new PublisherStore(),
  };
}
