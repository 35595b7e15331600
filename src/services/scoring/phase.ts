/**
 * Phase normalization
 *
 * @module scoring/phase
 */

import { PHASE_PRECEDENCE, type PhaseToken } from '../../models/trial.js';

export interface NormalizedPhase {
  /** Most advanced recognised phase, or null */
  phase: PhaseToken | null;
  /** Display label: the phase token, the first raw token, or UNKNOWN */
  label: string;
}

/**
 * Pick the most advanced phase among the tokens. Exact token matches win;
 * combined strings such as PHASE2/PHASE3 are matched by substring as a
 * fallback.
 */
export function normalizePhase(phases: readonly string[]): NormalizedPhase {
  const tokens = phases.filter((p) => p).map((p) => p.toUpperCase());
  if (tokens.length === 0) return { phase: null, label: 'UNKNOWN' };

  for (const candidate of PHASE_PRECEDENCE) {
    if (tokens.includes(candidate)) return { phase: candidate, label: candidate };
  }

  const joined = tokens.join(',');
  for (const candidate of PHASE_PRECEDENCE) {
    if (joined.includes(candidate)) return { phase: candidate, label: candidate };
  }

  return { phase: null, label: tokens[0] };
}
