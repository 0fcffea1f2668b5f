/**
 * Seed Loader
 * Loads categories, publishers and games from a JSON file into an empty database
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { buildCategory } from '../models/category.js';
import { buildGame } from '../models/game.js';
import { buildPublisher } from '../models/publisher.js';
import { CategoryStore } from './category-store.js';
import { GameStore } from './game-store.js';
import { PublisherStore } from './publisher-store.js';
import type { DatabaseManager } from './sqlite.js';

// ============================================
// Schema
// ============================================

const referenceSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
});

const gameSchema = z.object({
  title: z.string(),
  description: z.string(),
  category: z.string().describe('Category name'),
  publisher: z.string().describe('Publisher name'),
  star_rating: z.number().nullable().optional(),
});

export const seedSchema = z.object({
  categories: z.array(referenceSchema),
  publishers: z.array(referenceSchema),
  games: z.array(gameSchema),
});

export type SeedData = z.infer<typeof seedSchema>;

export interface SeedSummary {
  categories: number;
  publishers: number;
  games: number;
}

// ============================================
// Loading
// ============================================

export function parseSeedData(raw: unknown, source = 'seed data'): SeedData {
  const parsed = seedSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadSeedFile(path: string): SeedData {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseSeedData(raw, `seed file ${path}`);
}

/**
 * Insert seed data in a single transaction. Games reference their category
 * and publisher by name. Refuses to run when the database already has games.
 */
export function seedDatabase(db: DatabaseManager, data: SeedData): SeedSummary {
  const categories = new CategoryStore();
  const publishers = new PublisherStore();
  const games = new GameStore();

  return db.transaction((conn) => {
    if (games.count(conn) > 0) {
      throw new Error('Database already contains games; refusing to seed');
    }

    const categoryIds = new Map<string, number>();
    for (const input of data.categories) {
      const category = categories.create(conn, buildCategory(input));
      categoryIds.set(category.name, category.id);
    }

    const publisherIds = new Map<string, number>();
    for (const input of data.publishers) {
      const publisher = publishers.create(conn, buildPublisher(input));
      publisherIds.set(publisher.name, publisher.id);
    }

    for (const input of data.games) {
      const categoryId = categoryIds.get(input.category);
      if (categoryId === undefined) {
        throw new Error(`Game "${input.title}" references unknown category "${input.category}"`);
      }
      const publisherId = publisherIds.get(input.publisher);
      if (publisherId === undefined) {
        throw new Error(`Game "${input.title}" references unknown publisher "${input.publisher}"`);
      }

      games.create(conn, buildGame({
        title: input.title,
        description: input.description,
        starRating: input.star_rating,
        categoryId,
        publisherId,
      }));
    }

    return {
      categories: data.categories.length,
      publishers: data.publishers.length,
      games: data.games.length,
    };
  });
}
