import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';

export type TaskmgrDb = BetterSQLite3Database<typeof schema>;

/** The raw SQL to create the schema on a fresh connection */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    type TEXT,
    description TEXT NOT NULL DEFAULT '',
    due TEXT,
    rep TEXT NOT NULL,
    prio TEXT NOT NULL,
    done INTEGER NOT NULL DEFAULT 0,
    ctime INTEGER NOT NULL
);
`;

/**
 * Create a Drizzle database with the schema applied.
 * Defaults to an in-memory connection, which is gone when the process exits.
 */
export function createDb(path = ':memory:'): TaskmgrDb {
  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = MEMORY');
  sqlite.exec(CREATE_SCHEMA_SQL);
  return drizzle(sqlite, { schema });
}

/** Fresh in-memory database. For tests. */
export function createTestDb(): TaskmgrDb {
  return createDb(':memory:');
}
