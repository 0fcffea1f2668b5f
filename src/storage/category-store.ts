/**
 * Category Store
 */

import { ReferenceStore } from './reference-store.js';
import type { Category } from '../types/index.js';

export class CategoryStore extends ReferenceStore<Category> {
  constructor() {
    super({ table: 'categories', gameColumn: 'category_id' });
  }
}
