/**
 * Markdown digest of actionable trials, grouped by topic tag
 *
 * @module report/markdown
 */

import type { TrialRow } from '../storage/index.js';
import { decodeReasons, decodeStringList } from '../storage/index.js';
import { utcNowIso } from '../../utils/time.js';
import { compareForDigest, firstContactEmail, trialUrl } from './format.js';

export const UNTAGGED = '(untagged)';

/** Trials listed per topic section */
export const MAX_TRIALS_PER_TOPIC = 25;

export interface DigestOptions {
  /** Timestamp printed under the heading */
  generatedAt?: string;
}

/**
 * Rows per tag; a trial appears under each of its tags. Tag names are
 * sorted with the untagged bucket last.
 */
export function groupByTopic(rows: readonly TrialRow[]): Array<[topic: string, rows: TrialRow[]]> {
  const byTopic = new Map<string, TrialRow[]>();
  for (const row of rows) {
    const tags = decodeStringList(row.topic_tags_json, 'topic_tags_json', row.nct_id);
    for (const tag of tags.length > 0 ? tags : [UNTAGGED]) {
      const bucket = byTopic.get(tag);
      if (bucket) bucket.push(row);
      else byTopic.set(tag, [row]);
    }
  }

  const names = [...byTopic.keys()].filter((t) => t !== UNTAGGED).sort();
  if (byTopic.has(UNTAGGED)) names.push(UNTAGGED);
  return names.map((name) => [name, byTopic.get(name) ?? []]);
}

function trialSection(row: TrialRow): string[] {
  const lines: string[] = [];
  const email = firstContactEmail(row);
  const completion = row.primary_completion_date || row.primary_completion_date_parsed || '';
  const days = row.days_to_primary_completion === null ? '' : String(row.days_to_primary_completion);

  lines.push(`### ${row.nct_id}: ${(row.brief_title ?? '').trim()}`);
  lines.push('');
  lines.push(
    `- **Total score:** ${row.total_score ?? 0}  |  **Phase:** ${row.phase ?? ''}  |  **Modality:** ${row.modality ?? ''}`
  );
  lines.push(`- **Sponsor:** ${(row.lead_sponsor_name ?? '').trim()}`);
  lines.push(`- **Status:** ${(row.overall_status ?? '').trim()}`);
  lines.push(`- **Primary completion:** ${completion}  |  **Days to readout:** ${days}`);
  lines.push(
    `- **Results posted:** ${row.has_results ? 'Yes' : 'No'}  |  **Linked papers:** ${row.pubmed_count ?? 0}`
  );
  if (email) {
    lines.push(`- **Central contact email:** ${email}`);
  }
  lines.push(`- **Link:** ${trialUrl(row.nct_id)}`);

  const reasons = decodeReasons(row.score_reasons_json, row.nct_id);
  const why = [...reasons.urgency.slice(0, 2), ...reasons.major.slice(0, 2)].filter((r) => r);
  lines.push(`- **Why flagged:** ${why.join(', ')}`);
  lines.push('');
  return lines;
}

/**
 * Render the digest. Each topic lists at most MAX_TRIALS_PER_TOPIC trials.
 */
export function renderDigestMarkdown(rows: readonly TrialRow[], options: DigestOptions = {}): string {
  const lines: string[] = [
    '# Trial Watch Digest',
    '',
    `_Generated: ${options.generatedAt ?? utcNowIso()}_`,
    '',
    `Total actionable trials: **${rows.length}**`,
    '',
  ];

  for (const [topic, topicRows] of groupByTopic(rows)) {
    lines.push(`## ${topic}`);
    lines.push('');
    const sorted = [...topicRows].sort(compareForDigest).slice(0, MAX_TRIALS_PER_TOPIC);
    for (const row of sorted) {
      lines.push(...trialSection(row));
    }
  }

  return lines.join('\n');
}
