/**
 * Schema initialization and forward migrations
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  SCHEMA_VERSION,
  TRIAL_COLUMNS_V2,
  CREATE_SYNC_RUNS_TABLE,
} from './schema-definitions.js';
import {
  configurePragmas,
  stampSchemaVersion,
  createTables,
  createIndexes,
  tableExists,
  getColumnNames,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database.
 *
 * A database written before version tracking existed has a `trials` table
 * but no `schema_version` table; it reports version 1.
 *
 * @returns Current schema version, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    if (!tableExists(db, 'schema_version')) {
      return tableExists(db, 'trials') ? 1 : 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize an empty database with the latest schema.
 * Idempotent; the version is stamped last inside the same transaction.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    stampSchemaVersion(db, SCHEMA_VERSION);
  });

  initTransaction();
}

/**
 * Migrate from schema version 1 to version 2
 *
 * Changes in v2:
 * - trials: enrollment type, oversight flags, and the raw/parsed/precision/type
 *   columns of every date not stored by v1
 * - sync_runs: new table
 */
function migrateV1ToV2(db: Database.Database): void {
  const migrate = db.transaction(() => {
    const existing = getColumnNames(db, 'trials');
    for (const [name, type] of TRIAL_COLUMNS_V2) {
      if (existing.has(name)) continue;
      try {
        db.exec(`ALTER TABLE trials ADD COLUMN ${name} ${type}`);
      } catch (error) {
        throw new MigrationError(
          `Failed to add column trials.${name}`,
          'alter_table',
          'trials',
          error
        );
      }
    }

    try {
      db.exec(CREATE_SYNC_RUNS_TABLE);
    } catch (error) {
      throw new MigrationError('Failed to create table: sync_runs', 'create_table', 'sync_runs', error);
    }

    // Tables missing from a partial v1 file (e.g. no citations yet) and indexes.
    createTables(db);
    createIndexes(db);
  });

  migrate();
}

/**
 * Bring a database to the latest schema version
 * @throws MigrationError if the file is newer than this build or a step fails
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  if (currentVersion < 2) {
    migrateV1ToV2(db);
    stampSchemaVersion(db, 2);
  }
}
