/**
 * Static operations for DatabaseService - open (creating on first use) and exists.
 */

import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { resolve } from 'path';
import {
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  verifySchema,
  configurePragmas,
} from '../migrations/index.js';
import { createPreMigrationBackup } from './pre-migration-backup.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import { prepareDatabasePath } from './helpers.js';

/**
 * Open a trial database, creating the file and schema when missing and
 * migrating an older file forward
 *
 * @throws DatabaseError if the file cannot be opened or the schema is invalid
 * @throws MigrationError if a migration step fails
 */
export function openDatabase(dbPath: string): { db: Database.Database; path: string } {
  const fullPath = prepareDatabasePath(dbPath);

  let db: Database.Database;
  try {
    db = new Database(fullPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database ${fullPath}: ${String(error)}`,
      DatabaseErrorCode.DATABASE_LOCKED,
      error
    );
  }

  try {
    configurePragmas(db);
  } catch (error) {
    db.close();
    throw error;
  }

  // A failed backup does not block the migration.
  try {
    createPreMigrationBackup(db, fullPath, checkSchemaVersion(db), getCurrentSchemaVersion());
  } catch (error) {
    console.error(
      `[DatabaseService] Pre-migration backup failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}. Missing columns: ${verification.missingColumns.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, path: fullPath };
}

/**
 * Open an existing trial database without creating it
 * @throws DatabaseError if the file does not exist
 */
export function openExistingDatabase(dbPath: string): { db: Database.Database; path: string } {
  if (!databaseExists(dbPath)) {
    throw new DatabaseError(
      `Database not found at ${resolve(dbPath)}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }
  return openDatabase(dbPath);
}

export function databaseExists(dbPath: string): boolean {
  return existsSync(resolve(dbPath));
}
