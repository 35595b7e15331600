/**
 * Schema Helper Functions for Database Migrations
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
} from './schema-definitions.js';

/**
 * Configure per-connection pragmas. Not persistent: run on every open.
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create the schema version table and stamp it with `version`.
 * An existing stamp is overwritten.
 */
export function stampSchemaVersion(db: Database.Database, version: number): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at
    `
    ).run(1, version, now, now);
  } catch (error) {
    throw new MigrationError(
      `Failed to stamp schema version ${String(version)}`,
      'create_table',
      'schema_version',
      error
    );
  }
}

/**
 * Create all tables in definition order
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(
        `Failed to create table: ${table.name}`,
        'create_table',
        table.name,
        error
      );
    }
  }
}

/**
 * Create all indexes
 */
export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const indexName = indexSql.match(/CREATE INDEX IF NOT EXISTS (\w+)/)?.[1] ?? 'unknown';
      throw new MigrationError(`Failed to create index: ${indexName}`, 'create_index', indexName, error);
    }
  }
}

/**
 * Whether a table exists in the connected database
 */
export function tableExists(db: Database.Database, tableName: string): boolean {
  const row = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(tableName);
  return row !== undefined;
}

/**
 * Column names of a table, empty when the table is missing
 */
export function getColumnNames(db: Database.Database, tableName: string): Set<string> {
  const columns = db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
  return new Set(columns.map((c) => c.name));
}
