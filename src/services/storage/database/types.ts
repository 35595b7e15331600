/**
 * Type definitions for DatabaseService
 *
 * Row types mirror the SQLite columns one to one. JSON-encoded columns are
 * decoded by converters.ts.
 */

import type { ContactBundle, DatePrecision } from '../../../models/trial.js';
import type { ScoreReasons } from '../../../models/score.js';

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  SYNC_RUN_NOT_FOUND = 'SYNC_RUN_NOT_FOUND',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Day-delta windows that make a trial actionable
 */
export interface ActionableWindow {
  /** Upcoming: 0 <= days <= readoutWindowDays */
  readoutWindowDays: number;
  /** Recently completed: -recentlyCompletedDays <= days <= -1 */
  recentlyCompletedDays: number;
}

/**
 * Database row type for trials
 */
export interface TrialRow {
  nct_id: string;
  brief_title: string | null;
  official_title: string | null;
  acronym: string | null;
  overall_status: string | null;
  study_type: string | null;
  phase: string | null;
  phases_json: string | null;
  modality: string | null;
  enrollment: number | null;
  lead_sponsor_name: string | null;
  lead_sponsor_class: string | null;
  has_results: number | null;
  start_date: string | null;
  primary_completion_date: string | null;
  primary_completion_date_parsed: string | null;
  completion_date_parsed: string | null;
  last_update_post_date_parsed: string | null;
  results_first_post_date_parsed: string | null;
  conditions_json: string | null;
  interventions_json: string | null;
  intervention_types_json: string | null;
  contacts_json: string | null;
  location_count: number | null;
  topic_tags_json: string | null;
  urgency_score: number | null;
  major_score: number | null;
  interesting_score: number | null;
  total_score: number | null;
  days_to_primary_completion: number | null;
  score_reasons_json: string | null;
  pubmed_count: number | null;
  pubmed_latest_date: string | null;
  last_pubmed_check_utc: string | null;
  last_synced_utc: string | null;
  raw_json: string | null;
  enrollment_type: string | null;
  is_fda_regulated_drug: number | null;
  is_fda_regulated_device: number | null;
  oversight_has_dmc: number | null;
  start_date_parsed: string | null;
  start_date_precision: string | null;
  primary_completion_date_precision: string | null;
  primary_completion_date_type: string | null;
  completion_date: string | null;
  completion_date_precision: string | null;
  completion_date_type: string | null;
  last_update_post_date: string | null;
  last_update_post_date_precision: string | null;
  results_first_post_date: string | null;
  results_first_post_date_precision: string | null;
}

/**
 * Decoded trial row
 */
export interface StoredTrial {
  nct_id: string;
  brief_title: string;
  official_title: string;
  acronym: string;
  overall_status: string;
  study_type: string;
  /** First listed phase token */
  phase: string | null;
  phases: string[];
  modality: string;
  enrollment: number | null;
  enrollment_type: string;
  lead_sponsor_name: string;
  lead_sponsor_class: string;
  is_fda_regulated_drug: boolean | null;
  is_fda_regulated_device: boolean | null;
  oversight_has_dmc: boolean | null;
  has_results: boolean;
  conditions: string[];
  interventions: string[];
  intervention_types: string[];
  contacts: ContactBundle;
  location_count: number | null;
  start_date: StoredDate;
  primary_completion_date: StoredDate & { type: string | null };
  completion_date: StoredDate & { type: string | null };
  last_update_post_date: StoredDate;
  results_first_post_date: StoredDate;
  topic_tags: string[];
  urgency_score: number | null;
  major_score: number | null;
  interesting_score: number | null;
  total_score: number | null;
  days_to_primary_completion: number | null;
  score_reasons: ScoreReasons;
  pubmed_count: number;
  pubmed_latest_date: string | null;
  last_pubmed_check_utc: string | null;
  last_synced_utc: string | null;
  raw_json: string | null;
}

export interface StoredDate {
  raw: string;
  parsed: string | null;
  precision: DatePrecision;
}

export type SyncRunStatus = 'running' | 'complete' | 'failed';

/**
 * Database row type for sync_runs
 */
export interface SyncRunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  topics_json: string;
  received_count: number;
  stored_count: number;
  status: SyncRunStatus;
  error_message: string | null;
}

/**
 * Decoded sync run
 */
export interface SyncRun {
  id: string;
  started_at: string;
  finished_at: string | null;
  topics: string[];
  received_count: number;
  stored_count: number;
  status: SyncRunStatus;
  error_message: string | null;
}
