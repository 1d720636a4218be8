/**
 * Database Connection Module
 *
 * SQLite via better-sqlite3. The CLI shares one connection per process
 * (`getDb`); tests open their own with `openDatabase(':memory:')`.
 * The default file is ~/.docent/docent.db (or storage.database_path).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

const MEMORY_PATH = ':memory:';

// Module-level singleton instance
let db: Database.Database | null = null;
let exitHookRegistered = false;

/**
 * Open a database, apply pragmas and run pending migrations.
 *
 * @throws DatabaseError if the file cannot be opened or a migration fails
 */
export function openDatabase(path: string = getDbPath()): Database.Database {
  let connection: Database.Database;
  try {
    if (path !== MEMORY_PATH) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    connection = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  // Foreign keys are OFF by default in SQLite
  connection.pragma('foreign_keys = ON');
  if (path !== MEMORY_PATH) {
    connection.pragma('journal_mode = WAL');
  }

  const { failed } = runMigrations(connection);
  if (failed.length > 0) {
    connection.close();
    throw new DatabaseError(
      `Database migration failed: ${failed.map((f) => `${f.name}: ${f.error}`).join('; ')}`
    );
  }

  return connection;
}

/**
 * Get the shared database instance, opening it on first call.
 *
 * @example
 * ```ts
 * const db = getDb(config.storage.database_path);
 * const ops = new DatabaseOperations(db);
 * ```
 */
export function getDb(path?: string): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(path);

  if (!exitHookRegistered) {
    exitHookRegistered = true;
    process.on('exit', () => closeDb());
  }

  return db;
}

/**
 * Close the shared connection. Safe to call more than once.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
