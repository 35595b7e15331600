/**
 * Shared helpers for digest and export output
 *
 * @module report/format
 */

import type { TrialRow } from '../storage/index.js';
import { decodeContacts } from '../storage/index.js';

export const TRIAL_URL_BASE = 'https://clinicaltrials.gov/study/';

export function trialUrl(nctId: string): string {
  return `${TRIAL_URL_BASE}${nctId}`;
}

/**
 * First central-contact email of a stored trial
 */
export function firstContactEmail(row: TrialRow): string | null {
  const contacts = decodeContacts(row.contacts_json, row.nct_id);
  return contacts.central_contacts.find((c) => c.email)?.email ?? null;
}

const MISSING_DATE_SORT_KEY = '9999-12-31';

/**
 * Total score descending, then primary completion ascending with missing
 * dates last
 */
export function compareForDigest(a: TrialRow, b: TrialRow): number {
  const byScore = (b.total_score ?? 0) - (a.total_score ?? 0);
  if (byScore !== 0) return byScore;
  const da = a.primary_completion_date_parsed ?? MISSING_DATE_SORT_KEY;
  const db = b.primary_completion_date_parsed ?? MISSING_DATE_SORT_KEY;
  return da < db ? -1 : da > db ? 1 : 0;
}
