/**
 * Digest generation
 *
 * @module pipeline/digest
 */

import { existsSync, mkdirSync } from 'fs';
import { writeFile } from 'fs/promises';
import path from 'path';
import type { TrialWatchConfig } from '../../config/schema.js';
import { renderCsv, renderDigestMarkdown } from '../report/index.js';
import { DatabaseService, type TrialRow } from '../storage/index.js';

export interface DigestRunOptions {
  /** Override for pipeline.readoutWindowDays */
  days?: number;
  generatedAt?: string;
}

export interface DigestResult {
  rows: number;
  markdownPath: string;
  /** null when CSV export is off or there were no rows */
  csvPath: string | null;
}

/**
 * Actionable trial rows, ordered by total score then primary completion
 */
export function fetchDigestRows(config: TrialWatchConfig, dbPath: string, days?: number): TrialRow[] {
  const db = DatabaseService.open(dbPath);
  try {
    return db.fetchTrialsForDigest({
      readoutWindowDays: days ?? config.pipeline.readoutWindowDays,
      recentlyCompletedDays: config.pipeline.recentlyCompletedDays,
    });
  } finally {
    db.close();
  }
}

/**
 * Path with its extension replaced (or appended when it has none)
 */
export function withExtension(filePath: string, ext: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${ext}`);
}

/**
 * Write the markdown digest to `outPath` and, when enabled, a CSV beside it
 */
export async function generateDigest(
  config: TrialWatchConfig,
  dbPath: string,
  outPath: string,
  options: DigestRunOptions = {}
): Promise<DigestResult> {
  const rows = fetchDigestRows(config, dbPath, options.days);

  const dir = path.dirname(outPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  await writeFile(outPath, renderDigestMarkdown(rows, { generatedAt: options.generatedAt }), 'utf-8');
  console.error(`[Digest] Wrote ${outPath}`);

  let csvPath: string | null = null;
  if (config.pipeline.exportCsv) {
    const csv = renderCsv(rows);
    if (csv === null) {
      console.error('[Digest] No actionable trials; CSV not written');
    } else {
      csvPath = withExtension(outPath, '.csv');
      await writeFile(csvPath, csv, 'utf-8');
      console.error(`[Digest] Wrote ${csvPath}`);
    }
  }

  return { rows: rows.length, markdownPath: outPath, csvPath };
}
