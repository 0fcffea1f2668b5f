/**
 * Reference Store
 * Shared persistence for the entities games point at (categories, publishers)
 */

import type { Connection } from './sqlite.js';
import type { WithGameCount } from '../types/index.js';

interface ReferenceRecord {
  id: number;
  name: string;
  description: string | null;
}

interface ReferenceTable {
  /** Table holding the entity */
  table: 'categories' | 'publishers';
  /** Column on `games` referencing it */
  gameColumn: 'category_id' | 'publisher_id';
}

export abstract class ReferenceStore<T extends ReferenceRecord> {
  protected constructor(private readonly ref: ReferenceTable) {}

  /**
   * Insert a validated draft. Throws a constraint error when the name is taken.
   */
  create(conn: Connection, draft: Omit<ReferenceRecord, 'id'>): T {
    const result = conn.prepare(`
      INSERT INTO ${this.ref.table} (name, description) VALUES (?, ?)
    `).run(draft.name, draft.description);

    const created = this.findById(conn, Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Inserted row missing from ${this.ref.table}`);
    }
    return created;
  }

  findById(conn: Connection, id: number): T | null {
    const row = conn.prepare<[number], T>(`
      SELECT id, name, description FROM ${this.ref.table} WHERE id = ?
    `).get(id);

    return row ?? null;
  }

  exists(conn: Connection, id: number): boolean {
    const row = conn.prepare<[number], { found: number }>(`
      SELECT 1 AS found FROM ${this.ref.table} WHERE id = ?
    `).get(id);

    return row !== undefined;
  }

  /**
   * All rows sorted by name, each with the number of games referencing it
   */
  listWithGameCounts(conn: Connection): WithGameCount<T>[] {
    return conn.prepare<[], WithGameCount<T>>(`
      SELECT e.id, e.name, e.description, COUNT(g.id) AS gameCount
      FROM ${this.ref.table} e
      LEFT JOIN games g ON g.${this.ref.gameColumn} = e.id
      GROUP BY e.id
      ORDER BY e.name ASC
    `).all();
  }

  /**
   * Delete by id. Games still referencing the row make this throw a
   * foreign key constraint error; nothing cascades.
   */
  delete(conn: Connection, id: number): boolean {
    const result = conn.prepare(`
      DELETE FROM ${this.ref.table} WHERE id = ?
    `).run(id);

    return result.changes > 0;
  }

  count(conn: Connection): number {
    const row = conn.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM ${this.ref.table}
    `).get();

    return row?.count ?? 0;
  }
}
