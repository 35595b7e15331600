/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES, TRIAL_COLUMNS_V2 } from './schema-definitions.js';
import { tableExists, getColumnNames } from './schema-helpers.js';

// Columns read by the pipeline and digest queries
const REQUIRED_COLUMNS: Record<string, string[]> = {
  trials: [
    'nct_id',
    'topic_tags_json',
    'total_score',
    'days_to_primary_completion',
    'primary_completion_date_parsed',
    'pubmed_count',
    ...TRIAL_COLUMNS_V2.map(([name]) => name),
  ],
  pubmed_citations: ['nct_id', 'pmid', 'title', 'source', 'pub_date', 'doi', 'last_seen_utc'],
  sync_runs: ['id', 'started_at', 'status'],
};

/**
 * Verify all required tables, indexes and columns exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  for (const tableName of REQUIRED_TABLES) {
    if (!tableExists(db, tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    const exists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?`)
      .get(indexName);
    if (!exists) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!tableExists(db, table)) continue;
    const columnNames = getColumnNames(db, table);
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`${table}.${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
