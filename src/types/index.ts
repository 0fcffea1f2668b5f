/**
 * Core types for the crowdfunding catalog
 * Records mirror the SQLite rows (camelCase); the *Dict types are the JSON wire shapes
 */

// ============================================
// Records
// ============================================

export interface Category {
  id: number;
  name: string;
  description: string | null;
}

export interface Publisher {
  id: number;
  name: string;
  description: string | null;
}

/** Category or Publisher together with the number of games referencing it */
export type WithGameCount<T> = T & { gameCount: number };

export interface Game {
  id: number;
  title: string;
  description: string;
  starRating: number | null;
  categoryId: number;
  publisherId: number;
}

/** Minimal view of a referenced entity, as embedded in a game */
export interface EntityRef {
  id: number;
  name: string;
}

/** A game joined with its publisher and category; refs are null when unresolvable */
export interface GameWithRefs extends Game {
  publisher: EntityRef | null;
  category: EntityRef | null;
}

// ============================================
// Drafts (validated, not yet persisted)
// ============================================

export type NewCategory = Omit<Category, 'id'>;
export type NewPublisher = Omit<Publisher, 'id'>;
export type NewGame = Omit<Game, 'id'>;

/** Fields a partial game update may carry; absent keys are left alone */
export type GameChanges = Partial<NewGame>;

// ============================================
// Wire format
// ============================================

export interface CategoryDict {
  id: number;
  name: string;
  description: string | null;
  game_count: number;
}

export type PublisherDict = CategoryDict;

export interface GameDict {
  id: number;
  title: string;
  description: string;
  publisher: EntityRef | null;
  category: EntityRef | null;
  starRating: number | null;
}

export interface ErrorBody {
  error: string;
}

export interface MessageBody {
  message: string;
}

// ============================================
// Queries
// ============================================

export interface GameFilters {
  id?: number;
  categoryId?: number;
  publisherId?: number;
}
