/**
 * Topic selection and keyword matching
 *
 * @module pipeline/topics
 */

import type { TopicConfig } from '../../config/schema.js';
import type { TrialRecord } from '../../models/trial.js';
import { interestText } from '../scoring/index.js';

/**
 * Topics to sync, in configured order. Blank names are dropped and unknown
 * names are ignored; no names selects every topic.
 */
export function selectTopics(
  topics: readonly TopicConfig[],
  names?: readonly string[]
): TopicConfig[] {
  if (!names || names.length === 0) return [...topics];
  const wanted = new Set(names.map((n) => n.trim()).filter((n) => n.length > 0));
  if (wanted.size === 0) return [...topics];
  return topics.filter((t) => wanted.has(t.name));
}

/**
 * Whether any tag keyword occurs in the record's title, condition or
 * intervention text. An empty keyword list matches everything.
 */
export function matchesTagKeywords(record: TrialRecord, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true;
  const haystack = interestText(record).toLowerCase();
  return keywords.some((kw) => haystack.includes(kw.toLowerCase()));
}
