/**
 * SQLite Database Infrastructure
 * Manages the connection, schema migrations and transactions for the catalog
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or ':memory:' */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
  /** Enable foreign keys enforcement */
  foreignKeys: boolean;
  /** Log applied migrations to the console */
  verbose: boolean;
}

export interface MigrationInfo {
  version: number;
  appliedAt: number;
  description: string;
}

/**
 * Connection handle passed to every store operation. Inside
 * `DatabaseManager.transaction` it is the connection the transaction runs on.
 */
export type Connection = DatabaseType;

// ============================================
// Schema Migrations
// ============================================

interface Migration {
  version: number;
  description: string;
  up: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create categories and publishers tables',
    up: `
      CREATE TABLE IF NOT EXISTS categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT
      );

      CREATE TABLE IF NOT EXISTS publishers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT
      );
    `,
  },
  {
    version: 2,
    description: 'Create games table',
    up: `
      CREATE TABLE IF NOT EXISTS games (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        description TEXT NOT NULL,
        star_rating REAL,
        category_id INTEGER NOT NULL REFERENCES categories(id),
        publisher_id INTEGER NOT NULL REFERENCES publishers(id)
      );

      CREATE INDEX IF NOT EXISTS idx_games_category_id
        ON games(category_id);
      CREATE INDEX IF NOT EXISTS idx_games_publisher_id
        ON games(publisher_id);
    `,
  },
];

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: 'data/catalog.db',
      walMode: true,
      busyTimeout: 5000,
      foreignKeys: true,
      verbose: false,
      ...config,
    };
  }

  /**
   * Initialize the database connection and run migrations
   */
  initialize(): void {
    if (this.db) {
      return; // Already initialized
    }

    const inMemory = this.config.path === ':memory:';

    // Ensure directory exists
    const dbDir = dirname(this.config.path);
    if (!inMemory && dbDir && !existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }

    this.db = new Database(this.config.path);

    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    // The bundled SQLite enables foreign keys by default, so set it either way
    this.db.pragma(`foreign_keys = ${this.config.foreignKeys ? 'ON' : 'OFF'}`);

    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  /**
   * Get the database connection
   */
  getDb(): Connection {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Run `fn` as one unit of work: committed when it returns, rolled back when it throws
   */
  transaction<T>(fn: (conn: Connection) => T): T {
    const db = this.getDb();
    return db.transaction(() => fn(db))();
  }

  /**
   * Run schema migrations
   */
  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL,
        description TEXT NOT NULL
      );
    `);

    const current = db.prepare<[], { version: number }>(
      'SELECT COALESCE(MAX(version), 0) as version FROM schema_migrations'
    ).get();
    const currentVersion = current?.version ?? 0;

    for (const migration of MIGRATIONS) {
      if (migration.version <= currentVersion) {
        continue;
      }

      db.transaction(() => {
        db.exec(migration.up);
        db.prepare(
          'INSERT INTO schema_migrations (version, applied_at, description) VALUES (?, ?, ?)'
        ).run(migration.version, Date.now(), migration.description);
      })();

      if (this.config.verbose) {
        console.log(`Migration ${migration.version}: ${migration.description}`);
      }
    }
  }

  /**
   * Get applied migrations
   */
  getMigrations(): MigrationInfo[] {
    return this.getDb().prepare<[], MigrationInfo>(
      'SELECT version, applied_at as appliedAt, description FROM schema_migrations ORDER BY version'
    ).all();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db) {
      return;
    }

    if (this.config.walMode && this.config.path !== ':memory:') {
      try {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      } catch (error) {
        console.warn('WAL checkpoint failed on close:', error);
      }
    }

    this.db.close();
    this.db = null;
  }

  /**
   * Get database file path
   */
  getPath(): string {
    return this.config.path;
  }
}

/**
 * Open and migrate a database in one step
 */
export function openDatabase(config: Partial<DatabaseConfig> = {}): DatabaseManager {
  const manager = new DatabaseManager(config);
  manager.initialize();
  return manager;
}

/**
 * True when `error` is a SQLite constraint violation (unique, foreign key, not null, check)
 */
export function isConstraintError(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}
