/**
 * Tests for the seed loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { CategoryStore } from '../src/storage/category-store.js';
import { GameStore } from '../src/storage/game-store.js';
import { loadSeedFile, parseSeedData, seedDatabase, type SeedData } from '../src/storage/seed.js';
import type { DatabaseManager } from '../src/storage/sqlite.js';
import { createTestDatabase } from './helpers.js';

const SEED_FILE = fileURLToPath(new URL('../data/seed.json', import.meta.url));

describe('Seed loader', () => {
  let db: DatabaseManager;

  beforeEach(() => {
    db = createTestDatabase();
  });

  afterEach(() => {
    db.close();
  });

  it('loads the bundled seed file', () => {
    const summary = seedDatabase(db, loadSeedFile(SEED_FILE));

    expect(summary).toEqual({ categories: 3, publishers: 3, games: 6 });

    const games = new GameStore().list(db.getDb());
    expect(games).toHaveLength(6);
    expect(games[0].title).toBe('Harbor Lights');
    expect(games[0].category?.name).toBe('Cooperative');
    expect(games[5].starRating).toBeNull();
  });

  it('refuses to seed twice', () => {
    const data = loadSeedFile(SEED_FILE);
    seedDatabase(db, data);

    expect(() => seedDatabase(db, data)).toThrow('Database already contains games; refusing to seed');
  });

  it('rolls back everything when a game references an unknown category', () => {
    const data: SeedData = {
      categories: [{ name: 'Strategy' }],
      publishers: [{ name: 'Lantern Works' }],
      games: [{
        title: 'Canal Barons',
        description: 'Build waterways and corner the river trade',
        category: 'Puzzle',
        publisher: 'Lantern Works',
      }],
    };

    expect(() => seedDatabase(db, data))
      .toThrow('Game "Canal Barons" references unknown category "Puzzle"');
    expect(new CategoryStore().count(db.getDb())).toBe(0);
  });

  it('applies entity validation to seed rows', () => {
    const data: SeedData = {
      categories: [{ name: 'S' }],
      publishers: [],
      games: [],
    };

    expect(() => seedDatabase(db, data)).toThrow('Category name must be at least 2 characters');
  });

  it('rejects malformed seed data', () => {
    expect(() => parseSeedData({ categories: 'Strategy', publishers: [], games: [] }))
      .toThrow(/^Invalid seed data: categories: /);
  });
});
