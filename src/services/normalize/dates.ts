/**
 * Partial-date parsing for registry date fields
 *
 * The registry reports dates as YYYY, YYYY-MM or YYYY-MM-DD, either bare or
 * wrapped in a struct under `date`. Coarse dates are anchored for ordering:
 * year precision to July 1, month precision to the 15th.
 *
 * @module normalize/dates
 */

import { type JsonValue, isJsonObject } from '../../models/study.js';
import type { DatePrecision, ParsedDate } from '../../models/trial.js';

const INTEGER_SEGMENT = /^\s*[+-]?\d+\s*$/;

const NO_DATE: ParsedDate = { raw: '', value: null, precision: 'NONE' };

function toInt(segment: string | undefined): number | null {
  if (segment === undefined || !INTEGER_SEGMENT.test(segment)) return null;
  return parseInt(segment, 10);
}

/**
 * Build an ISO calendar date, or null if the components do not name a real
 * day (month 13, February 30, year 0).
 */
export function isoCalendarDate(year: number, month: number, day: number): string | null {
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) return null;
  const probe = new Date(Date.UTC(2000, month - 1, day));
  probe.setUTCFullYear(year);
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return null;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function resolve(raw: string, precision: Exclude<DatePrecision, 'NONE'>, value: string | null): ParsedDate {
  return value === null ? { raw, value: null, precision: 'NONE' } : { raw, value, precision };
}

/**
 * Parse a registry date value. Never throws; failures yield NONE precision
 * with the original string preserved.
 */
export function parsePartialDate(input: JsonValue | undefined): ParsedDate {
  let source: JsonValue | undefined = input;
  if (isJsonObject(source) && 'date' in source) {
    source = source.date;
  }
  if (source === undefined || source === null) return NO_DATE;

  const raw = (typeof source === 'string' ? source : JSON.stringify(source)).trim();
  if (!raw) return NO_DATE;

  const parts = raw.split('-');
  const year = toInt(parts[0]);
  if (year === null) return { raw, value: null, precision: 'NONE' };

  if (parts.length === 1) {
    return resolve(raw, 'YEAR', isoCalendarDate(year, 7, 1));
  }

  const month = toInt(parts[1]);
  if (month === null) return { raw, value: null, precision: 'NONE' };
  if (parts.length === 2) {
    return resolve(raw, 'MONTH', isoCalendarDate(year, month, 15));
  }

  const day = toInt(parts[2]);
  if (day === null) return { raw, value: null, precision: 'NONE' };
  return resolve(raw, 'DAY', isoCalendarDate(year, month, day));
}
