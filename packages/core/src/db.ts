import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

export type TrackerDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export const DEFAULT_DB_PATH = 'tasks.db';

/** The raw SQL to create the tables from scratch (for new databases and tests) */
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    task_type TEXT NOT NULL,
    subject TEXT NOT NULL,
    due_date TEXT NOT NULL,
    description TEXT,
    is_done INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL DEFAULT 'required',
    user_id INTEGER REFERENCES users(id),
    created_at TEXT NOT NULL DEFAULT ''
);
`;

/** Indexes touch migrated columns, so they run after migrate() */
export const CREATE_INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
CREATE INDEX IF NOT EXISTS idx_tasks_user_id ON tasks(user_id);
CREATE INDEX IF NOT EXISTS idx_tasks_subject ON tasks(subject);
`;

interface ColumnMigration {
  readonly table: string;
  readonly column: string;
  readonly definition: string;
}

/** Columns added after the first release, oldest first */
export const COLUMN_MIGRATIONS: readonly ColumnMigration[] = [
  { table: 'tasks', column: 'priority', definition: `TEXT NOT NULL DEFAULT 'required'` },
  { table: 'tasks', column: 'user_id', definition: 'INTEGER REFERENCES users(id)' },
  { table: 'tasks', column: 'created_at', definition: `TEXT NOT NULL DEFAULT ''` },
];

/** Check whether a table already has a column */
export function hasColumn(raw: Database.Database, table: string, column: string): boolean {
  const cols = raw.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return cols.some(c => c.name === column);
}

/**
 * Bring an existing database up to the current column set.
 * Idempotent: a column is only added when PRAGMA table_info does not list it.
 * Returns the columns that were added, as `table.column`.
 */
export function migrate(raw: Database.Database): string[] {
  const added: string[] = [];
  const run = raw.transaction(() => {
    for (const m of COLUMN_MIGRATIONS) {
      if (hasColumn(raw, m.table, m.column)) continue;
      raw.exec(`ALTER TABLE ${m.table} ADD COLUMN ${m.column} ${m.definition}`);
      added.push(`${m.table}.${m.column}`);
    }
  });
  run();
  return added;
}

/**
 * Create a Drizzle database connection with proper pragmas, tables and migrations applied.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string = DEFAULT_DB_PATH): TrackerDb {
  // Ensure directory exists for file-based databases
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  sqlite.exec(CREATE_TABLES_SQL);
  migrate(sqlite);
  sqlite.exec(CREATE_INDEXES_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): TrackerDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (pragmas, raw exec).
 */
export function getRawDb(db: TrackerDb): Database.Database {
  return db.$client;
}
