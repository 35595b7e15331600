/**
 * Calendar and timestamp helpers
 *
 * Calendar dates are ISO strings (YYYY-MM-DD) so they compare and persist
 * without timezone drift.
 *
 * @module utils/time
 */

const MS_PER_DAY = 86_400_000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Today's local calendar date as YYYY-MM-DD
 */
export function todayIso(now: Date = new Date()): string {
  const y = String(now.getFullYear()).padStart(4, '0');
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * UTC timestamp with second precision, e.g. 2025-03-01T12:00:00+00:00
 */
export function utcNowIso(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

function dayNumber(isoDate: string): number | null {
  const match = ISO_DATE.exec(isoDate);
  if (!match) return null;
  const ms = Date.UTC(2000, Number(match[2]) - 1, Number(match[3]));
  const date = new Date(ms);
  date.setUTCFullYear(Number(match[1]));
  return Math.round(date.getTime() / MS_PER_DAY);
}

/**
 * Signed whole-day difference `to - from`, or null if either date is not
 * a YYYY-MM-DD string
 */
export function daysBetween(from: string, to: string): number | null {
  const a = dayNumber(from);
  const b = dayNumber(to);
  if (a === null || b === null) return null;
  return b - a;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
