import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type CheckDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: CheckDatabase;
}

/**
 * Open the SQLite database holding counter state.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function openDatabase(path: string): DatabaseHandle {
  const inMemory = path === ':memory:';

  // Ensure the data directory exists before opening the database file
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite: DatabaseType = new Database(path);

  if (!inMemory) {
    // WAL: readers never see a half-written page while a poll is writing
    sqlite.pragma('journal_mode = WAL');

    // - synchronous = NORMAL: Safe in WAL mode, skips fsync on most writes
    // - cache_size = -16000: 16 MB page cache (negative value = KiB)
    // - temp_store = MEMORY: Temp tables and indices kept in RAM
    sqlite.pragma('synchronous = NORMAL');
    sqlite.pragma('cache_size = -16000');
    sqlite.pragma('temp_store = MEMORY');
  }

  return { sqlite, db: drizzle(sqlite, { schema }) };
}
