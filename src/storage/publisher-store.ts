/**
 * Publisher Store
 */

import { ReferenceStore } from './reference-store.js';
import type { Publisher } from '../types/index.js';

export class PublisherStore extends ReferenceStore<Publisher> {
  constructor() {
    super({ table: 'publishers', gameColumn: 'publisher_id' });
  }
}
