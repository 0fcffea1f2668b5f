/**
 * Game Model
 * Validation, partial updates and serialization for catalog games.
 *
 * Category and publisher ids are resolved against the stores by the route
 * layer before they get here; this module only validates the game's own fields.
 */

import { validateRating, validateStringLength } from './validation.js';
import type { Game, GameChanges, GameDict, GameWithRefs, NewGame } from '../types/index.js';

export interface GameInput {
  title: unknown;
  description: unknown;
  starRating?: unknown;
  categoryId: number;
  publisherId: number;
}

/** Raw partial update; a key that is present is validated and applied, even when null */
export interface GameChangesInput {
  title?: unknown;
  description?: unknown;
  starRating?: unknown;
  categoryId?: number;
  publisherId?: number;
}

export function validateGameTitle(title: unknown): string {
  return validateStringLength('Game title', title, { minLength: 2 });
}

export function validateGameDescription(description: unknown): string {
  return validateStringLength('Description', description, { minLength: 10 });
}

export function validateStarRating(starRating: unknown): number | null {
  return validateRating('Star rating', starRating);
}

export function buildGame(input: GameInput): NewGame {
  return {
    title: validateGameTitle(input.title),
    description: validateGameDescription(input.description),
    starRating: validateStarRating(input.starRating),
    categoryId: input.categoryId,
    publisherId: input.publisherId,
  };
}

/**
 * Validate the fields present in `input` and return them as typed changes.
 * Throws on the first invalid field, before anything is written.
 */
export function validateGameChanges(input: GameChangesInput): GameChanges {
  const changes: GameChanges = {};

  if ('title' in input) {
    changes.title = validateGameTitle(input.title);
  }
  if ('description' in input) {
    changes.description = validateGameDescription(input.description);
  }
  if ('starRating' in input) {
    changes.starRating = validateStarRating(input.starRating);
  }
  if (input.categoryId !== undefined) {
    changes.categoryId = input.categoryId;
  }
  if (input.publisherId !== undefined) {
    changes.publisherId = input.publisherId;
  }

  return changes;
}

/**
 * Produce the updated record. `game` itself is never modified.
 */
export function applyGameChanges(game: Game, input: GameChangesInput): Game {
  return { ...game, ...validateGameChanges(input) };
}

export function serializeGame(game: GameWithRefs): GameDict {
  return {
    id: game.id,
    title: game.title,
    description: game.description,
    publisher: game.publisher ? { id: game.publisher.id, name: game.publisher.name } : null,
    category: game.category ? { id: game.category.id, name: game.category.name } : null,
    starRating: game.starRating,
  };
}
