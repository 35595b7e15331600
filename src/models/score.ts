/**
 * Score interfaces for editorial prioritisation
 */

/**
 * Human-readable justifications, one ordered list per contributing score
 */
export interface ScoreReasons {
  urgency: string[];
  major: string[];
  interesting: string[];
}

/**
 * Result of scoring one trial. All scores are integers in [0, 100].
 */
export interface ScoreResult {
  urgency: number;
  major: number;
  interesting: number;

  /** round(0.4 * major + 0.4 * urgency + 0.2 * interesting) */
  total: number;

  /** Signed day delta (primary completion - today); null without a date */
  days_to_primary_completion: number | null;

  reasons: ScoreReasons;
}

/**
 * Topic-specific weighted keyword
 */
export interface InterestKeyword {
  keyword: string;
  weight: number;
}
