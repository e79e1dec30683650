import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type ApprovalDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: ApprovalDb;
  path: string;
}

/**
 * Open the approval store database.
 *
 * WAL mode lets several processes read while one writes; busy_timeout makes a
 * second writer wait for the lock instead of failing immediately. Every
 * operation on the handle is synchronous.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });
  return { sqlite, db, path };
}

/**
 * Close database connections
 */
export function closeDatabase(handle: DatabaseHandle): void {
  if (handle.sqlite.open) {
    handle.sqlite.close();
  }
}

/**
 * Health check for database
 */
export function checkDbHealth(handle: DatabaseHandle): { ok: boolean; latencyMs?: number; error?: string } {
  const start = Date.now();
  try {
    handle.sqlite.prepare('SELECT 1').get();
    return { ok: true, latencyMs: Date.now() - start };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : 'Unknown error' };
  }
}
