/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking them in `_migrations`.
 * Each migration runs in its own transaction; running twice is a no-op.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Result of running migrations. Failures are reported, not thrown.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the bundled CLI needs no files beside it
export const MIGRATIONS: ReadonlyArray<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Collections: one per indexed document set, pinned to an embedding model
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  embedding_model TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Chunks: text, Float32 embedding BLOB and source attribution
CREATE TABLE IF NOT EXISTS chunks (
  id TEXT NOT NULL,
  collection TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  source_path TEXT NOT NULL,
  source_title TEXT NOT NULL DEFAULT '',
  source_type TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  total_chunks INTEGER NOT NULL,
  metadata TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (collection, id),
  FOREIGN KEY (collection) REFERENCES collections(name) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_chunks_source ON chunks(collection, source_path);
    `.trim(),
  },
  {
    name: '002-add-indexed-at.sql',
    sql: `
-- Last successful ingest per collection, shown by \`docent health\`
ALTER TABLE collections ADD COLUMN indexed_at TEXT;
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Names of the migrations already applied to `db`.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  return db
    .prepare('SELECT name FROM _migrations ORDER BY id')
    .all()
    .map((row) => MigrationNameRowSchema.parse(row).name);
}

/**
 * Run all pending migrations.
 *
 * A failed migration does not stop later ones from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * for (const { name, error } of result.failed) {
 *   console.error(`  - ${name}: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const appliedBefore = new Set(getAppliedMigrations(db));
  const applied: string[] = [];
  const failed: MigrationResult['failed'] = [];

  for (const migration of MIGRATIONS) {
    if (appliedBefore.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}
