/**
 * Sync run ledger operations for DatabaseService
 *
 * @module database/sync-run-operations
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { utcNowIso } from '../../../utils/time.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import type { SyncRun, SyncRunRow } from './types.js';
import { rowToSyncRun } from './converters.js';

/**
 * Record the start of a sync pass
 * @returns Run id
 */
export function startSyncRun(db: Database.Database, topics: readonly string[]): string {
  const id = uuidv4();
  db.prepare(
    `INSERT INTO sync_runs (id, started_at, topics_json, status)
     VALUES (?, ?, ?, 'running')`
  ).run(id, utcNowIso(), JSON.stringify(topics));
  return id;
}

/**
 * Close a running sync pass with its counts and outcome
 * @throws DatabaseError if the run id is unknown
 */
export function finishSyncRun(
  db: Database.Database,
  id: string,
  outcome: { received: number; stored: number; error?: string }
): void {
  const result = db
    .prepare(
      `UPDATE sync_runs
       SET finished_at = ?, received_count = ?, stored_count = ?, status = ?, error_message = ?
       WHERE id = ?`
    )
    .run(
      utcNowIso(),
      outcome.received,
      outcome.stored,
      outcome.error === undefined ? 'complete' : 'failed',
      outcome.error ?? null,
      id
    );
  if (result.changes === 0) {
    throw new DatabaseError(`Sync run not found: ${id}`, DatabaseErrorCode.SYNC_RUN_NOT_FOUND);
  }
}

export function getSyncRun(db: Database.Database, id: string): SyncRun | null {
  const row = db.prepare('SELECT * FROM sync_runs WHERE id = ?').get(id) as SyncRunRow | undefined;
  return row ? rowToSyncRun(row) : null;
}

/**
 * Most recent sync runs first
 */
export function listSyncRuns(db: Database.Database, limit = 20): SyncRun[] {
  const rows = db
    .prepare('SELECT * FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit) as SyncRunRow[];
  return rows.map(rowToSyncRun);
}
