/**
 * Category Model
 * Validation and serialization for game categories
 */

import { validateStringLength } from './validation.js';
import type { CategoryDict, Category, NewCategory, WithGameCount } from '../types/index.js';

export interface CategoryInput {
  name: unknown;
  description?: unknown;
}

export function validateCategoryName(name: unknown): string {
  return validateStringLength('Category name', name, { minLength: 2 });
}

export function validateCategoryDescription(description: unknown): string | null {
  return validateStringLength('Description', description, { minLength: 10, allowNull: true });
}

export function buildCategory(input: CategoryInput): NewCategory {
  return {
    name: validateCategoryName(input.name),
    description: validateCategoryDescription(input.description),
  };
}

export function serializeCategory(category: WithGameCount<Category>): CategoryDict {
  return {
    id: category.id,
    name: category.name,
    description: category.description,
    game_count: category.gameCount,
  };
}
