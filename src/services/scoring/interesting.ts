/**
 * Keyword-driven "interesting" scoring
 *
 * Topic keywords and the built-in signal terms are matched independently as
 * case-insensitive substrings and summed.
 *
 * @module scoring/interesting
 */

import type { InterestKeyword } from '../../models/score.js';
import { clampScore } from './urgency.js';

export const DEFAULT_KEYWORD_WEIGHT = 5;

/**
 * Built-in signal terms with weights
 */
export const SIGNAL_TERMS: readonly InterestKeyword[] = [
  { keyword: 'first-in-human', weight: 6 },
  { keyword: 'randomized', weight: 4 },
  { keyword: 'double-blind', weight: 4 },
  { keyword: 'platform', weight: 4 },
  { keyword: 'adaptive', weight: 4 },
  { keyword: 'pragmatic', weight: 3 },
  { keyword: 'mRNA', weight: 8 },
  { keyword: 'CRISPR', weight: 8 },
  { keyword: 'gene therapy', weight: 8 },
  { keyword: 'cell therapy', weight: 7 },
  { keyword: 'CAR-T', weight: 7 },
  { keyword: 'ADC', weight: 7 },
  { keyword: 'bispecific', weight: 6 },
  { keyword: 'AI', weight: 5 },
];

export interface InterestingResult {
  score: number;
  reasons: string[];
}

export function scoreInteresting(
  text: string,
  topicKeywords: readonly InterestKeyword[] = []
): InterestingResult {
  const haystack = text.toLowerCase();
  const reasons: string[] = [];
  let score = 0;

  for (const { keyword, weight } of topicKeywords) {
    const kw = keyword.trim();
    if (!kw) continue;
    const w = Math.trunc(weight);
    if (haystack.includes(kw.toLowerCase())) {
      score += w;
      reasons.push(`Keyword match: ${kw} (+${w})`);
    }
  }

  for (const { keyword, weight } of SIGNAL_TERMS) {
    if (haystack.includes(keyword.toLowerCase())) {
      score += weight;
      reasons.push(`Signal term: ${keyword} (+${weight})`);
    }
  }

  if (reasons.length === 0) reasons.push('No interest keywords matched');
  return { score: clampScore(score), reasons };
}
