/**
 * Scoring Engine
 *
 * Combines urgency, major and interesting scores into a weighted total with
 * the reasons behind each component.
 *
 * @module scoring
 */

import type { InterestKeyword, ScoreResult } from '../../models/score.js';
import type { TrialRecord } from '../../models/trial.js';
import { todayIso } from '../../utils/time.js';
import { scoreInteresting } from './interesting.js';
import { scoreMajor } from './major.js';
import { scoreUrgency } from './urgency.js';

export { scoreUrgency, clampScore, URGENCY_WINDOW_DAYS } from './urgency.js';
export type { UrgencyInput, UrgencyResult } from './urgency.js';
export { scoreMajor } from './major.js';
export type { MajorInput, MajorResult } from './major.js';
export { scoreInteresting, SIGNAL_TERMS, DEFAULT_KEYWORD_WEIGHT } from './interesting.js';
export type { InterestingResult } from './interesting.js';
export { normalizePhase } from './phase.js';
export type { NormalizedPhase } from './phase.js';

/** Component weights; major and urgency dominate for commissioning */
export const SCORE_WEIGHTS = { major: 0.4, urgency: 0.4, interesting: 0.2 } as const;

export function totalScore(major: number, urgency: number, interesting: number): number {
  return Math.round(
    SCORE_WEIGHTS.major * major +
      SCORE_WEIGHTS.urgency * urgency +
      SCORE_WEIGHTS.interesting * interesting
  );
}

export interface ScoreTrialOptions {
  interestingKeywords?: readonly InterestKeyword[];
  /** Currently stored citation count for the trial */
  citationCount?: number;
  /** ISO calendar date; defaults to the local date */
  today?: string;
}

/**
 * Text the interest keywords are matched against
 */
export function interestText(record: TrialRecord): string {
  return [
    record.brief_title,
    record.official_title,
    record.conditions.join(' '),
    record.interventions.join(' '),
  ].join(' ');
}

export function scoreTrial(record: TrialRecord, options: ScoreTrialOptions = {}): ScoreResult {
  const urgency = scoreUrgency({
    primaryCompletionDate: record.primary_completion_date.value,
    hasResults: record.has_results,
    citationCount: options.citationCount ?? 0,
    today: options.today ?? todayIso(),
  });
  const major = scoreMajor({
    phases: record.phases,
    enrollment: record.enrollment,
    sponsorClass: record.lead_sponsor_class,
    studyType: record.study_type,
    oversightHasDmc: record.oversight_has_dmc,
    isFdaRegulatedDrug: record.is_fda_regulated_drug,
    isFdaRegulatedDevice: record.is_fda_regulated_device,
  });
  const interesting = scoreInteresting(interestText(record), options.interestingKeywords);

  return {
    urgency: urgency.score,
    major: major.score,
    interesting: interesting.score,
    total: totalScore(major.score, urgency.score, interesting.score),
    days_to_primary_completion: urgency.daysToPrimaryCompletion,
    reasons: {
      urgency: urgency.reasons,
      major: major.reasons,
      interesting: interesting.reasons,
    },
  };
}
