/**
 * Urgency scoring
 *
 * Piecewise over the signed day delta between primary completion and today:
 * upcoming readouts within 180 days decay linearly from 100 to 20; readouts
 * in the past 180 days start from 70 and gain weight when nothing has been
 * reported yet. Everything else scores 0.
 *
 * @module scoring/urgency
 */

import { daysBetween } from '../../utils/time.js';

export const URGENCY_WINDOW_DAYS = 180;

export interface UrgencyInput {
  /** ISO calendar date of primary completion, or null */
  primaryCompletionDate: string | null;
  hasResults: boolean;
  /** Citations currently known for the trial */
  citationCount: number;
  /** ISO calendar date */
  today: string;
}

export interface UrgencyResult {
  score: number;
  reasons: string[];
  daysToPrimaryCompletion: number | null;
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value));
}

export function scoreUrgency(input: UrgencyInput): UrgencyResult {
  const delta =
    input.primaryCompletionDate === null
      ? null
      : daysBetween(input.today, input.primaryCompletionDate);

  if (delta === null) {
    return {
      score: 0,
      reasons: ['No primary completion date available'],
      daysToPrimaryCompletion: null,
    };
  }

  if (delta >= 0 && delta <= URGENCY_WINDOW_DAYS) {
    const score = Math.trunc(100 - (delta / URGENCY_WINDOW_DAYS) * 80);
    return {
      score: clampScore(score),
      reasons: [`Primary completion in ${delta} days`],
      daysToPrimaryCompletion: delta,
    };
  }

  if (delta < 0 && delta >= -URGENCY_WINDOW_DAYS) {
    const ago = Math.abs(delta);
    let score = Math.trunc(70 - (ago / URGENCY_WINDOW_DAYS) * 40);
    const reasons = [`Primary completion ${ago} days ago`];
    if (!input.hasResults) {
      score += 15;
      reasons.push('No posted results on the registry');
    }
    if (input.citationCount === 0) {
      score += 15;
      reasons.push('No linked literature citations found (yet)');
    }
    return { score: clampScore(score), reasons, daysToPrimaryCompletion: delta };
  }

  const reason =
    delta > 0
      ? `Primary completion is >${URGENCY_WINDOW_DAYS} days away (${delta} days)`
      : `Primary completion is >${URGENCY_WINDOW_DAYS} days ago (${Math.abs(delta)} days ago)`;
  return { score: 0, reasons: [reason], daysToPrimaryCompletion: delta };
}
