import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';
import * as schema from './schema/index.js';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TaskdockDb = BetterSQLite3Database<typeof schema>;

/** A connection or an open transaction; read helpers accept either */
export type TaskdockExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'taskdock');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'taskdock');
  } else {
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'taskdock');
  }

  return join(dir, 'taskdock.db');
}

/** The raw SQL to create the schema from scratch (idempotent) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    color TEXT NOT NULL DEFAULT '#007bff',
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    content TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('high', 'medium', 'low')),
    start_date TEXT,
    due_date TEXT,
    category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
    sort_order INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_sort ON tasks(sort_order, created_at);
CREATE INDEX IF NOT EXISTS idx_tasks_category ON tasks(category_id);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TaskdockDb {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** In-memory database with the schema applied. For tests. */
export function createTestDb(): TaskdockDb {
  return createDb(':memory:');
}
