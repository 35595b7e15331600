/**
 * Trial operations for DatabaseService
 *
 * Upserts are keyed on nct_id: the topic tag set accumulates across syncs
 * while every other column is overwritten by the latest record.
 *
 * @module database/trial-operations
 */

import type Database from 'better-sqlite3';
import type { TrialRecord } from '../../../models/trial.js';
import type { ScoreResult } from '../../../models/score.js';
import { utcNowIso } from '../../../utils/time.js';
import type { ActionableWindow, StoredTrial, TrialRow } from './types.js';
import { decodeStringList, mergeTopicTags, rowToStoredTrial, trialToColumns } from './converters.js';

export interface UpsertTrialOptions {
  /** Raw registry document to snapshot into raw_json */
  raw?: unknown;
  /** Override for last_synced_utc */
  syncedAt?: string;
}

/**
 * Stored topic tags for a trial, [] when the trial is new
 */
export function getTopicTags(db: Database.Database, nctId: string): string[] {
  const row = db.prepare('SELECT topic_tags_json FROM trials WHERE nct_id = ?').get(nctId) as
    | { topic_tags_json: string | null }
    | undefined;
  return row ? decodeStringList(row.topic_tags_json, 'topic_tags_json', nctId) : [];
}

/**
 * Insert or fully overwrite a trial row, unioning `topicName` into its tags
 *
 * @returns Tags stored after the merge
 */
export function upsertTrial(
  db: Database.Database,
  record: TrialRecord,
  topicName: string,
  scores: ScoreResult,
  options: UpsertTrialOptions = {}
): string[] {
  const upsert = db.transaction((): string[] => {
    const tags = mergeTopicTags(getTopicTags(db, record.nct_id), topicName);
    const columns = trialToColumns(record, tags, scores, options.syncedAt ?? utcNowIso(), options.raw);

    const names = Object.keys(columns);
    const updates = names
      .filter((name) => name !== 'nct_id')
      .map((name) => `${name} = excluded.${name}`)
      .join(',\n        ');

    db.prepare(
      `INSERT INTO trials (${names.join(', ')})
       VALUES (${names.map((name) => `@${name}`).join(', ')})
       ON CONFLICT(nct_id) DO UPDATE SET
        ${updates}`
    ).run(columns);

    return tags;
  });

  return upsert();
}

/**
 * Overwrite the literature summary columns only
 *
 * @returns false when no trial row has this id
 */
export function updateLiteratureSummary(
  db: Database.Database,
  nctId: string,
  citationCount: number,
  latestDate: string | null,
  checkedAt: string = utcNowIso()
): boolean {
  const result = db
    .prepare(
      `UPDATE trials
       SET pubmed_count = ?, pubmed_latest_date = ?, last_pubmed_check_utc = ?
       WHERE nct_id = ?`
    )
    .run(Math.trunc(citationCount), latestDate, checkedAt, nctId);
  return result.changes > 0;
}

/**
 * Stored citation count, 0 for an unknown trial
 */
export function getLiteratureCount(db: Database.Database, nctId: string): number {
  const row = db.prepare('SELECT pubmed_count FROM trials WHERE nct_id = ?').get(nctId) as
    | { pubmed_count: number | null }
    | undefined;
  return row?.pubmed_count ?? 0;
}

export function getTrialRow(db: Database.Database, nctId: string): TrialRow | null {
  const row = db.prepare('SELECT * FROM trials WHERE nct_id = ?').get(nctId) as TrialRow | undefined;
  return row ?? null;
}

export function getTrial(db: Database.Database, nctId: string): StoredTrial | null {
  const row = getTrialRow(db, nctId);
  return row ? rowToStoredTrial(row) : null;
}

const ACTIONABLE_WHERE = `
  days_to_primary_completion IS NOT NULL
  AND (
    (days_to_primary_completion BETWEEN 0 AND @readout)
    OR (days_to_primary_completion BETWEEN -@recent AND -1)
  )`;

function windowParams(window: ActionableWindow): { readout: number; recent: number } {
  return {
    readout: Math.trunc(window.readoutWindowDays),
    recent: Math.trunc(window.recentlyCompletedDays),
  };
}

/**
 * Actionable trial rows for a digest, by total score descending, then by
 * primary completion date ascending
 */
export function fetchTrialsForDigest(db: Database.Database, window: ActionableWindow): TrialRow[] {
  return db
    .prepare(
      `SELECT * FROM trials
       WHERE ${ACTIONABLE_WHERE}
       ORDER BY total_score DESC, primary_completion_date_parsed ASC`
    )
    .all(windowParams(window)) as TrialRow[];
}

/**
 * Up to `limit` actionable trial ids, by total score descending
 */
export function fetchActionableIds(
  db: Database.Database,
  window: ActionableWindow,
  limit: number
): string[] {
  const rows = db
    .prepare(
      `SELECT nct_id FROM trials
       WHERE ${ACTIONABLE_WHERE}
       ORDER BY total_score DESC
       LIMIT @limit`
    )
    .all({ ...windowParams(window), limit: Math.trunc(limit) }) as Array<{ nct_id: string }>;
  return rows.map((r) => r.nct_id);
}

/**
 * Up to `limit` trial ids of any window, by total score descending
 */
export function fetchTopIds(db: Database.Database, limit: number): string[] {
  const rows = db
    .prepare('SELECT nct_id FROM trials ORDER BY total_score DESC LIMIT ?')
    .all(Math.trunc(limit)) as Array<{ nct_id: string }>;
  return rows.map((r) => r.nct_id);
}

export function countTrials(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM trials').get() as { count: number };
  return row.count;
}
