/**
 * Tolerant path access over raw registry documents
 *
 * Every accessor returns its default when a step is missing or has the wrong
 * shape. Nothing here throws.
 *
 * @module normalize/nested
 */

import { type JsonValue, isJsonObject } from '../../models/study.js';

/**
 * Resolve a dot-delimited path. Returns undefined on any missing or
 * non-object intermediate step.
 */
export function getNested(root: JsonValue | undefined, path: string): JsonValue | undefined {
  let cur: JsonValue | undefined = root;
  let start = 0;
  while (start <= path.length) {
    const dot = path.indexOf('.', start);
    const key = dot === -1 ? path.slice(start) : path.slice(start, dot);
    if (!isJsonObject(cur) || !Object.prototype.hasOwnProperty.call(cur, key)) {
      return undefined;
    }
    cur = cur[key];
    if (dot === -1) break;
    start = dot + 1;
  }
  return cur;
}

/**
 * String leaf, or the default. Numbers are rendered; other shapes are not.
 */
export function readString(root: JsonValue | undefined, path: string, fallback = ''): string {
  return asString(getNested(root, path)) ?? fallback;
}

export function asString(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * List of string leaves. A lone scalar becomes a one-element list; an empty
 * or missing value becomes [].
 */
export function readStringList(root: JsonValue | undefined, path: string): string[] {
  const value = getNested(root, path);
  if (Array.isArray(value)) {
    const out: string[] = [];
    for (const item of value) {
      const s = asString(item);
      if (s !== null) out.push(s);
    }
    return out;
  }
  const scalar = asString(value);
  return scalar ? [scalar] : [];
}

/**
 * Tri-state flag: null when absent, otherwise the value's truthiness
 */
export function readFlag(root: JsonValue | undefined, path: string): boolean | null {
  const value = getNested(root, path);
  if (value === undefined || value === null) return null;
  return Boolean(value);
}

/**
 * Integer leaf. Accepts numbers and numeric strings; truncates fractions.
 */
export function readInteger(root: JsonValue | undefined, path: string): number | null {
  const value = getNested(root, path);
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return parseInt(value, 10);
  return null;
}

/**
 * Array of object elements; non-object items are skipped
 */
export function readObjectList(
  root: JsonValue | undefined,
  path: string
): Array<{ [key: string]: JsonValue }> {
  const value = getNested(root, path);
  if (!Array.isArray(value)) return [];
  return value.filter(isJsonObject);
}
