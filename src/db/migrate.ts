import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { DatabaseHandle } from './index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Bring the counter database schema up to date: generated drizzle migrations
 * when a `drizzle/` folder sits next to the package, the built-in table
 * definition otherwise.
 */
export async function runMigrations(handle: DatabaseHandle): Promise<void> {
  const migrationsFolder = resolve(__dirname, '../../drizzle');

  if (existsSync(migrationsFolder)) {
    const { migrate } = await import('drizzle-orm/better-sqlite3/migrator');
    migrate(handle.db, { migrationsFolder });
    console.log('[Database] Migrations applied (drizzle migrator)');
    return;
  }

  createTables(handle);
}

/** Create the schema directly. Idempotent. */
export function createTables(handle: DatabaseHandle): void {
  handle.sqlite.exec(`
    CREATE TABLE IF NOT EXISTS counter_states (
      counter_id TEXT PRIMARY KEY,
      last_value REAL NOT NULL,
      last_timestamp REAL NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}
