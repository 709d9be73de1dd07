import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema';

export type EngineDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: EngineDatabase;
}

/**
 * Open (or create) the engine database and make sure its tables exist.
 * Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.exec(schema.CREATE_TABLES_SQL);

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

export { schema };
