/**
 * "Major" scoring: additive points for phase, enrollment size, sponsor
 * class, study type and regulatory oversight, clamped to [0, 100].
 *
 * @module scoring/major
 */

import type { PhaseToken } from '../../models/trial.js';
import { normalizePhase } from './phase.js';
import { clampScore } from './urgency.js';

export interface MajorInput {
  phases: readonly string[];
  enrollment: number | null;
  sponsorClass: string | null;
  studyType: string | null;
  oversightHasDmc: boolean | null;
  isFdaRegulatedDrug: boolean | null;
  isFdaRegulatedDevice: boolean | null;
}

export interface MajorResult {
  score: number;
  reasons: string[];
}

const PHASE_POINTS: Record<PhaseToken, number> = {
  PHASE4: 40,
  PHASE3: 40,
  PHASE2: 25,
  PHASE1: 10,
  EARLY_PHASE1: 5,
};

const OTHER_PHASE_POINTS = 5;

/** Enrollment tiers, largest first */
const ENROLLMENT_TIERS: ReadonlyArray<{ min: number; points: number; label: string }> = [
  { min: 2000, points: 35, label: 'Large enrollment' },
  { min: 1000, points: 30, label: 'Large enrollment' },
  { min: 500, points: 25, label: 'Moderate-large enrollment' },
  { min: 200, points: 18, label: 'Moderate enrollment' },
  { min: 100, points: 12, label: 'Enrollment' },
  { min: Number.NEGATIVE_INFINITY, points: 5, label: 'Small enrollment' },
];

function phasePoints(phases: readonly string[]): { points: number; reason: string } {
  const { phase, label } = normalizePhase(phases);
  switch (phase) {
    case 'PHASE4':
    case 'PHASE3':
    case 'PHASE2':
    case 'PHASE1':
      return { points: PHASE_POINTS[phase], reason: `Phase ${phase.replace('PHASE', '')}` };
    case 'EARLY_PHASE1':
      return { points: PHASE_POINTS[phase], reason: `Phase: ${label}` };
    case null:
      return { points: OTHER_PHASE_POINTS, reason: `Phase: ${label}` };
  }
}

function enrollmentPoints(enrollment: number | null): { points: number; reason: string } {
  if (enrollment === null) return { points: 0, reason: 'Enrollment unknown' };
  const tier = ENROLLMENT_TIERS.find((t) => enrollment >= t.min) ?? ENROLLMENT_TIERS[ENROLLMENT_TIERS.length - 1];
  return { points: tier.points, reason: `${tier.label} (n=${enrollment})` };
}

function sponsorPoints(sponsorClass: string | null): { points: number; reason: string } {
  const sc = (sponsorClass ?? '').trim().toUpperCase();
  if (sc === 'INDUSTRY') return { points: 20, reason: 'Industry-sponsored' };
  if (sc === 'NIH') return { points: 18, reason: 'NIH-sponsored' };
  if (sc) return { points: 10, reason: `Sponsor class: ${sc}` };
  return { points: 5, reason: 'Sponsor class unknown' };
}

export function scoreMajor(input: MajorInput): MajorResult {
  const reasons: string[] = [];
  let score = 0;

  for (const part of [
    phasePoints(input.phases),
    enrollmentPoints(input.enrollment),
    sponsorPoints(input.sponsorClass),
  ]) {
    score += part.points;
    reasons.push(part.reason);
  }

  const st = (input.studyType ?? '').trim().toUpperCase();
  if (st === 'INTERVENTIONAL') {
    score += 8;
    reasons.push('Interventional study');
  } else if (st) {
    score += 3;
    reasons.push(`Study type: ${st}`);
  }

  if (input.oversightHasDmc === true) {
    score += 5;
    reasons.push('Has data monitoring committee');
  }
  if (input.isFdaRegulatedDrug === true) {
    score += 3;
    reasons.push('FDA-regulated drug');
  }
  if (input.isFdaRegulatedDevice === true) {
    score += 3;
    reasons.push('FDA-regulated device');
  }

  return { score: clampScore(score), reasons };
}
