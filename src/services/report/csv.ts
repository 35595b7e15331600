/**
 * CSV export of digest rows
 *
 * @module report/csv
 */

import type { TrialRow } from '../storage/index.js';
import { decodeStringList } from '../storage/index.js';
import { firstContactEmail, trialUrl } from './format.js';

type CsvValue = string | number | null;

/** Columns written first, in this order */
export const PREFERRED_COLUMNS = [
  'nct_id',
  'brief_title',
  'phase',
  'modality',
  'overall_status',
  'lead_sponsor_name',
  'lead_sponsor_class',
  'primary_completion_date',
  'primary_completion_date_parsed',
  'days_to_primary_completion',
  'has_results',
  'pubmed_count',
  'total_score',
  'major_score',
  'urgency_score',
  'interesting_score',
  'topic_tags',
  'contact_email',
  'trial_url',
] as const;

/**
 * Escape a value for CSV
 * - Wrap in quotes if contains comma, quote, or newline
 * - Escape quotes by doubling them
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function joinList(text: string | null, column: string, id: string): string {
  return decodeStringList(text, column, id).join(', ');
}

/**
 * Stored columns plus the flattened list columns and derived fields
 */
export function flattenRow(row: TrialRow): Record<string, CsvValue> {
  return {
    ...row,
    conditions: joinList(row.conditions_json, 'conditions_json', row.nct_id),
    interventions: joinList(row.interventions_json, 'interventions_json', row.nct_id),
    intervention_types: joinList(row.intervention_types_json, 'intervention_types_json', row.nct_id),
    topic_tags: joinList(row.topic_tags_json, 'topic_tags_json', row.nct_id),
    contact_email: firstContactEmail(row) ?? '',
    trial_url: trialUrl(row.nct_id),
  };
}

/**
 * Render rows as CSV: preferred columns first, then every other column in
 * stored order. Returns null when there are no rows.
 */
export function renderCsv(rows: readonly TrialRow[]): string | null {
  if (rows.length === 0) return null;

  const flat = rows.map(flattenRow);
  const seen = new Set<string>();
  for (const item of flat) {
    for (const key of Object.keys(item)) seen.add(key);
  }
  const preferred: string[] = PREFERRED_COLUMNS.filter((c) => seen.has(c));
  const columns = [...preferred, ...[...seen].filter((c) => !preferred.includes(c))];

  const lines = [columns.map(escapeCSV).join(',')];
  for (const item of flat) {
    lines.push(
      columns
        .map((c) => {
          const value = item[c];
          return value === null || value === undefined ? '' : escapeCSV(String(value));
        })
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}
