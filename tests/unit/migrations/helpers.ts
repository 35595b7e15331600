/**
 * Shared helpers for migration tests
 *
 * Uses REAL better-sqlite3 databases in temp directories. NO MOCKS.
 */

import Database from 'better-sqlite3';
import { createTestDbPath } from '../../helpers.js';

export { createTestDir, cleanupTestDir } from '../../helpers.js';

export interface TestContext {
  testDir: string;
  db: Database.Database | undefined;
  dbPath: string;
}

export function createTestDb(testDir: string): { db: Database.Database; dbPath: string } {
  const dbPath = createTestDbPath(testDir);
  return { db: new Database(dbPath), dbPath };
}

export function closeDb(db: Database.Database | undefined): void {
  if (db?.open) db.close();
}

/**
 * Require an open connection from a test context
 */
export function requireDb(ctx: TestContext): Database.Database {
  if (!ctx.db) throw new Error('test database not open');
  return ctx.db;
}

export function getTableNames(db: Database.Database): string[] {
  const rows = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`)
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

export function getIndexNames(db: Database.Database): string[] {
  const rows = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%' ORDER BY name`)
    .all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

export function getTableColumns(db: Database.Database, table: string): string[] {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return rows.map((r) => r.name);
}

/**
 * Schema written before version tracking: no schema_version table, no
 * sync_runs, and the narrower trials table
 */
export const LEGACY_V1_SCHEMA = `
CREATE TABLE trials (
  nct_id TEXT PRIMARY KEY,
  brief_title TEXT,
  official_title TEXT,
  acronym TEXT,
  overall_status TEXT,
  study_type TEXT,
  phase TEXT,
  phases_json TEXT,
  modality TEXT,
  enrollment INTEGER,
  lead_sponsor_name TEXT,
  lead_sponsor_class TEXT,
  has_results INTEGER,
  start_date TEXT,
  primary_completion_date TEXT,
  primary_completion_date_parsed TEXT,
  completion_date_parsed TEXT,
  last_update_post_date_parsed TEXT,
  results_first_post_date_parsed TEXT,
  conditions_json TEXT,
  interventions_json TEXT,
  intervention_types_json TEXT,
  contacts_json TEXT,
  location_count INTEGER,
  topic_tags_json TEXT,
  urgency_score INTEGER,
  major_score INTEGER,
  interesting_score INTEGER,
  total_score INTEGER,
  days_to_primary_completion INTEGER,
  score_reasons_json TEXT,
  pubmed_count INTEGER DEFAULT 0,
  pubmed_latest_date TEXT,
  last_pubmed_check_utc TEXT,
  last_synced_utc TEXT,
  raw_json TEXT
);
CREATE TABLE pubmed_citations (
  nct_id TEXT NOT NULL,
  pmid TEXT NOT NULL,
  title TEXT,
  source TEXT,
  pub_date TEXT,
  doi TEXT,
  last_seen_utc TEXT,
  PRIMARY KEY (nct_id, pmid)
);
`;

/**
 * Write a legacy database holding one trial, then close it
 */
export function writeLegacyV1Database(dbPath: string): void {
  const db = new Database(dbPath);
  try {
    db.exec(LEGACY_V1_SCHEMA);
    db.prepare(
      `INSERT INTO trials (nct_id, brief_title, phase, phases_json, has_results, start_date,
         primary_completion_date, primary_completion_date_parsed, topic_tags_json, total_score,
         days_to_primary_completion, score_reasons_json)
       VALUES ('NCT90000001', 'Legacy trial', 'PHASE3', '["PHASE3"]', 0, '2022-05',
         '2025-04-01', '2025-04-01', '["legacy"]', 70, 31, '{"urgency":["u"],"major":["m"],"interesting":[]}')`
    ).run();
  } finally {
    db.close();
  }
}
