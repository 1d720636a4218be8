/**
 * Database Module Tests
 *
 * Connection, migrations, BLOB codec and row validation, on in-memory SQLite.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';

import { openDatabase } from '../connection.js';
import { getAppliedMigrations, MIGRATIONS, runMigrations } from '../migrate.js';
import { blobToEmbedding, embeddingToBlob } from '../schema.js';
import { CountRowSchema, SchemaValidationError, validateRow, validateRows } from '../validation.js';

describe('openDatabase', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration', () => {
    expect(getAppliedMigrations(db)).toEqual(MIGRATIONS.map((m) => m.name));
  });

  it('creates the collections and chunks tables', () => {
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all();

    expect(tables).toEqual([
      { name: '_migrations' },
      { name: 'chunks' },
      { name: 'collections' },
      { name: 'sqlite_sequence' },
    ]);
  });

  it('enables foreign keys', () => {
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('does nothing when migrations are already applied', () => {
    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
  });
});

describe('embedding BLOB codec', () => {
  it('round-trips a vector', () => {
    const embedding = new Float32Array([0.5, -1.25, 3]);
    expect(blobToEmbedding(embeddingToBlob(embedding))).toEqual(embedding);
  });

  it('stores only the viewed part of a subarray', () => {
    const view = new Float32Array([1, 2, 3, 4]).subarray(1, 3);
    const blob = embeddingToBlob(view);

    expect(blob.byteLength).toBe(8);
    expect(blobToEmbedding(blob)).toEqual(new Float32Array([2, 3]));
  });

  it('reads a BLOB at an unaligned offset', () => {
    const source = embeddingToBlob(new Float32Array([7, 8]));
    const padded = Buffer.alloc(source.byteLength + 1);
    source.copy(padded, 1);

    expect(blobToEmbedding(padded.subarray(1))).toEqual(new Float32Array([7, 8]));
  });
});

describe('row validation', () => {
  it('returns typed data for a valid row', () => {
    expect(validateRow(CountRowSchema, { count: 3 }, 'test')).toEqual({ count: 3 });
  });

  it('throws SchemaValidationError with a context', () => {
    expect(() => validateRow(CountRowSchema, { count: 'x' }, 'chunks.collection=docs')).toThrow(
      'Database schema mismatch in chunks.collection=docs'
    );
  });

  it('names the failing index in a row list', () => {
    const attempt = () => validateRows(CountRowSchema, [{ count: 1 }, { count: -1 }], 'counts');

    expect(attempt).toThrow(SchemaValidationError);
    expect(attempt).toThrow('Database schema mismatch in counts[1]');
  });

  it('summarises issues in the hint', () => {
    try {
      validateRow(CountRowSchema, {}, 'test');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.code).toBe(5);
        expect(error.issues).toEqual([{ path: 'count', message: 'Required' }]);
        expect(error.hint).toContain('  - count: Required');
      }
    }
  });
});
