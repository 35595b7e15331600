/**
 * SQL Schema Definitions for the trial store
 *
 * Column names of `trials` and `pubmed_citations` are part of the persisted
 * contract read by downstream dashboards; add columns, never rename them.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 2;

/**
 * Per-connection pragmas
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Trial columns added in schema version 2, in declaration order
 */
export const TRIAL_COLUMNS_V2: ReadonlyArray<readonly [name: string, type: string]> = [
  ['enrollment_type', 'TEXT'],
  ['is_fda_regulated_drug', 'INTEGER'],
  ['is_fda_regulated_device', 'INTEGER'],
  ['oversight_has_dmc', 'INTEGER'],
  ['start_date_parsed', 'TEXT'],
  ['start_date_precision', 'TEXT'],
  ['primary_completion_date_precision', 'TEXT'],
  ['primary_completion_date_type', 'TEXT'],
  ['completion_date', 'TEXT'],
  ['completion_date_precision', 'TEXT'],
  ['completion_date_type', 'TEXT'],
  ['last_update_post_date', 'TEXT'],
  ['last_update_post_date_precision', 'TEXT'],
  ['results_first_post_date', 'TEXT'],
  ['results_first_post_date_precision', 'TEXT'],
];

/**
 * Trials table - one row per registry identifier.
 * Version 1 columns first; the version 2 columns follow.
 */
export const CREATE_TRIALS_TABLE = `
CREATE TABLE IF NOT EXISTS trials (
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
  raw_json TEXT,
${TRIAL_COLUMNS_V2.map(([name, type]) => `  ${name} ${type}`).join(',\n')}
)
`;

/**
 * Citation table - composite key (trial, PubMed id)
 */
export const CREATE_PUBMED_CITATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS pubmed_citations (
  nct_id TEXT NOT NULL,
  pmid TEXT NOT NULL,
  title TEXT,
  source TEXT,
  pub_date TEXT,
  doi TEXT,
  last_seen_utc TEXT,
  PRIMARY KEY (nct_id, pmid)
)
`;

/**
 * Sync run ledger - one row per sync pass (schema version 2)
 */
export const CREATE_SYNC_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS sync_runs (
  id TEXT PRIMARY KEY,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  topics_json TEXT NOT NULL,
  received_count INTEGER NOT NULL DEFAULT 0,
  stored_count INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL CHECK (status IN ('running', 'complete', 'failed')),
  error_message TEXT
)
`;

/**
 * Index definitions
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_trials_total_score ON trials(total_score DESC)',
  'CREATE INDEX IF NOT EXISTS idx_trials_primary_completion ON trials(primary_completion_date_parsed)',
  'CREATE INDEX IF NOT EXISTS idx_trials_last_update ON trials(last_update_post_date_parsed)',
  'CREATE INDEX IF NOT EXISTS idx_sync_runs_started_at ON sync_runs(started_at)',
] as const;

/**
 * Table definitions in creation order
 */
export const TABLE_DEFINITIONS: ReadonlyArray<{ name: string; sql: string }> = [
  { name: 'trials', sql: CREATE_TRIALS_TABLE },
  { name: 'pubmed_citations', sql: CREATE_PUBMED_CITATIONS_TABLE },
  { name: 'sync_runs', sql: CREATE_SYNC_RUNS_TABLE },
];

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'trials',
  'pubmed_citations',
  'sync_runs',
] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'idx_trials_total_score',
  'idx_trials_primary_completion',
  'idx_trials_last_update',
  'idx_sync_runs_started_at',
] as const;
