/**
 * Row conversion functions for DatabaseService
 *
 * Encodes trial records into column values and decodes stored rows back into
 * typed objects. JSON columns that fail to decode fall back to an empty value
 * and are logged.
 */

import { z } from 'zod';
import type { ParsedDate, TrialRecord, DatePrecision, ContactBundle } from '../../../models/trial.js';
import type { ScoreReasons, ScoreResult } from '../../../models/score.js';
import type { StoredDate, StoredTrial, SyncRun, SyncRunRow, TrialRow } from './types.js';

export type ColumnValue = string | number | null;

const StringListSchema = z.array(z.unknown()).transform((items) => items.map((item) => String(item)));

const nullableString = z
  .unknown()
  .transform((value) => (value === undefined || value === null ? null : String(value)));

const ContactBundleSchema = z
  .object({
    central_contacts: z
      .array(
        z.object({
          name: nullableString,
          role: nullableString,
          phone: nullableString,
          email: nullableString,
        })
      )
      .catch([]),
    overall_officials: z
      .array(
        z.object({
          name: nullableString,
          affiliation: nullableString,
          role: nullableString,
        })
      )
      .catch([]),
  })
  .catch({ central_contacts: [], overall_officials: [] });

const ScoreReasonsSchema = z
  .object({
    urgency: StringListSchema.catch([]),
    major: StringListSchema.catch([]),
    interesting: StringListSchema.catch([]),
  })
  .catch({ urgency: [], major: [], interesting: [] });

const PRECISIONS: readonly DatePrecision[] = ['DAY', 'MONTH', 'YEAR', 'NONE'];

function parseJsonColumn(column: string, id: string, text: string | null): unknown {
  if (text === null || text === '') return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    console.error(
      `[DatabaseService] Corrupt ${column} for trial ${id}:`,
      error instanceof Error ? error.message : String(error)
    );
    return undefined;
  }
}

/**
 * Decode a JSON list column; anything but an array decodes to []
 */
export function decodeStringList(text: string | null, column = 'list', id = '?'): string[] {
  const result = StringListSchema.safeParse(parseJsonColumn(column, id, text));
  return result.success ? result.data : [];
}

export function decodeContacts(text: string | null, id = '?'): ContactBundle {
  return ContactBundleSchema.parse(parseJsonColumn('contacts_json', id, text));
}

export function decodeReasons(text: string | null, id = '?'): ScoreReasons {
  return ScoreReasonsSchema.parse(parseJsonColumn('score_reasons_json', id, text));
}

function decodePrecision(text: string | null, parsed: string | null): DatePrecision {
  const match = PRECISIONS.find((p) => p === text);
  if (match) return match;
  // v1 rows carry no precision column
  return parsed === null ? 'NONE' : 'DAY';
}

function decodeFlag(value: number | null): boolean | null {
  return value === null ? null : value !== 0;
}

function encodeFlag(value: boolean | null): number | null {
  return value === null ? null : value ? 1 : 0;
}

function storedDate(raw: string | null, parsed: string | null, precision: string | null): StoredDate {
  return { raw: raw ?? '', parsed, precision: decodePrecision(precision, parsed) };
}

/**
 * Insertion-ordered union of the stored tags and `topic`
 */
export function mergeTopicTags(existing: readonly string[], topic: string): string[] {
  return [...new Set([...existing, topic])];
}

function dateColumns(prefix: string, date: ParsedDate): Record<string, ColumnValue> {
  return {
    [prefix]: date.raw,
    [`${prefix}_parsed`]: date.value,
    [`${prefix}_precision`]: date.precision,
  };
}

/**
 * Column values for a full trial upsert, keyed by column name
 */
export function trialToColumns(
  record: TrialRecord,
  tags: readonly string[],
  scores: ScoreResult,
  syncedAt: string,
  raw: unknown
): Record<string, ColumnValue> {
  return {
    nct_id: record.nct_id,
    brief_title: record.brief_title,
    official_title: record.official_title,
    acronym: record.acronym,
    overall_status: record.overall_status,
    study_type: record.study_type,
    phase: record.phases.length > 0 ? record.phases[0] : null,
    phases_json: JSON.stringify(record.phases),
    modality: record.modality,
    enrollment: record.enrollment,
    enrollment_type: record.enrollment_type,
    lead_sponsor_name: record.lead_sponsor_name,
    lead_sponsor_class: record.lead_sponsor_class,
    is_fda_regulated_drug: encodeFlag(record.is_fda_regulated_drug),
    is_fda_regulated_device: encodeFlag(record.is_fda_regulated_device),
    oversight_has_dmc: encodeFlag(record.oversight_has_dmc),
    has_results: record.has_results ? 1 : 0,
    ...dateColumns('start_date', record.start_date),
    ...dateColumns('primary_completion_date', record.primary_completion_date),
    primary_completion_date_type: record.primary_completion_date_type,
    ...dateColumns('completion_date', record.completion_date),
    completion_date_type: record.completion_date_type,
    ...dateColumns('last_update_post_date', record.last_update_post_date),
    ...dateColumns('results_first_post_date', record.results_first_post_date),
    conditions_json: JSON.stringify(record.conditions),
    interventions_json: JSON.stringify(record.interventions),
    intervention_types_json: JSON.stringify(record.intervention_types),
    contacts_json: JSON.stringify(record.contacts),
    location_count: record.location_count,
    topic_tags_json: JSON.stringify(tags),
    urgency_score: scores.urgency,
    major_score: scores.major,
    interesting_score: scores.interesting,
    total_score: scores.total,
    days_to_primary_completion: scores.days_to_primary_completion,
    score_reasons_json: JSON.stringify(scores.reasons),
    last_synced_utc: syncedAt,
    raw_json: raw === undefined || raw === null ? null : JSON.stringify(raw),
  };
}

/**
 * Convert a trials row to a StoredTrial
 */
export function rowToStoredTrial(row: TrialRow): StoredTrial {
  const id = row.nct_id;
  return {
    nct_id: id,
    brief_title: row.brief_title ?? '',
    official_title: row.official_title ?? '',
    acronym: row.acronym ?? '',
    overall_status: row.overall_status ?? '',
    study_type: row.study_type ?? '',
    phase: row.phase,
    phases: decodeStringList(row.phases_json, 'phases_json', id),
    modality: row.modality ?? '',
    enrollment: row.enrollment,
    enrollment_type: row.enrollment_type ?? '',
    lead_sponsor_name: row.lead_sponsor_name ?? '',
    lead_sponsor_class: row.lead_sponsor_class ?? '',
    is_fda_regulated_drug: decodeFlag(row.is_fda_regulated_drug),
    is_fda_regulated_device: decodeFlag(row.is_fda_regulated_device),
    oversight_has_dmc: decodeFlag(row.oversight_has_dmc),
    has_results: Boolean(row.has_results),
    conditions: decodeStringList(row.conditions_json, 'conditions_json', id),
    interventions: decodeStringList(row.interventions_json, 'interventions_json', id),
    intervention_types: decodeStringList(row.intervention_types_json, 'intervention_types_json', id),
    contacts: decodeContacts(row.contacts_json, id),
    location_count: row.location_count,
    start_date: storedDate(row.start_date, row.start_date_parsed, row.start_date_precision),
    primary_completion_date: {
      ...storedDate(
        row.primary_completion_date,
        row.primary_completion_date_parsed,
        row.primary_completion_date_precision
      ),
      type: row.primary_completion_date_type,
    },
    completion_date: {
      ...storedDate(row.completion_date, row.completion_date_parsed, row.completion_date_precision),
      type: row.completion_date_type,
    },
    last_update_post_date: storedDate(
      row.last_update_post_date,
      row.last_update_post_date_parsed,
      row.last_update_post_date_precision
    ),
    results_first_post_date: storedDate(
      row.results_first_post_date,
      row.results_first_post_date_parsed,
      row.results_first_post_date_precision
    ),
    topic_tags: decodeStringList(row.topic_tags_json, 'topic_tags_json', id),
    urgency_score: row.urgency_score,
    major_score: row.major_score,
    interesting_score: row.interesting_score,
    total_score: row.total_score,
    days_to_primary_completion: row.days_to_primary_completion,
    score_reasons: decodeReasons(row.score_reasons_json, id),
    pubmed_count: row.pubmed_count ?? 0,
    pubmed_latest_date: row.pubmed_latest_date,
    last_pubmed_check_utc: row.last_pubmed_check_utc,
    last_synced_utc: row.last_synced_utc,
    raw_json: row.raw_json,
  };
}

/**
 * Convert a sync_runs row to a SyncRun
 */
export function rowToSyncRun(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    started_at: row.started_at,
    finished_at: row.finished_at,
    topics: decodeStringList(row.topics_json, 'topics_json', row.id),
    received_count: row.received_count,
    stored_count: row.stored_count,
    status: row.status,
    error_message: row.error_message,
  };
}
