/**
 * Pre-Migration Backup
 *
 * Copies a trial database aside before its schema is migrated forward, as
 * `<file>.pre-migrate-v<version>`. An existing copy for the same version is
 * kept (it is the pristine one).
 *
 * @module database/pre-migration-backup
 */

import { copyFileSync, existsSync } from 'fs';
import type Database from 'better-sqlite3';

export interface BackupResult {
  created: boolean;
  backupPath: string | null;
  reason?: 'fresh_database' | 'already_current' | 'backup_exists';
}

export function backupPathFor(dbPath: string, version: number): string {
  return `${dbPath}.pre-migrate-v${String(version)}`;
}

/**
 * Back up the database file if `currentVersion` is behind `targetVersion`.
 * Must run after the connection is open and before migrateToLatest().
 */
export function createPreMigrationBackup(
  db: Database.Database,
  dbPath: string,
  currentVersion: number,
  targetVersion: number
): BackupResult {
  if (currentVersion === 0) {
    return { created: false, backupPath: null, reason: 'fresh_database' };
  }
  if (currentVersion >= targetVersion) {
    return { created: false, backupPath: null, reason: 'already_current' };
  }

  const backupPath = backupPathFor(dbPath, currentVersion);
  if (existsSync(backupPath)) {
    return { created: false, backupPath, reason: 'backup_exists' };
  }

  // Flush the WAL so the main file is a complete snapshot.
  db.pragma('wal_checkpoint(TRUNCATE)');
  copyFileSync(dbPath, backupPath);

  console.error(
    `[DatabaseService] Backed up v${String(currentVersion)} database before migrating to v${String(targetVersion)}: ${backupPath}`
  );
  return { created: true, backupPath };
}
