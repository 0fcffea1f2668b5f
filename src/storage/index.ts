/**
 * Storage Module Exports
 * Provides unified access to all storage components
 */

export {
  DatabaseManager,
  openDatabase,
  isConstraintError,
  type Connection,
  type DatabaseConfig,
  type MigrationInfo,
} from './sqlite.js';

export { CategoryStore } from './category-store.js';
export { PublisherStore } from './publisher-store.js';
export { GameStore } from './game-store.js';

export {
  buildGameQuery,
  mapGameRow,
  type GameQuery,
  type GameJoinRow,
} from './game-query.js';

export {
  seedDatabase,
  loadSeedFile,
  parseSeedData,
  type SeedData,
  type SeedSummary,
} from './seed.js';
