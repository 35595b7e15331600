/**
 * Literature linking pass
 *
 * Looks up citations for stored trials and writes them back with a summary
 * (count, latest publication date) on the trial row. A failure for one trial
 * is logged and the pass moves on.
 *
 * @module pipeline/literature
 */

import type { TrialWatchConfig } from '../../config/schema.js';
import type { Citation } from '../../models/citation.js';
import { LiteratureClient } from '../literature/client.js';
import { DatabaseService } from '../storage/index.js';

export interface LiteratureOptions {
  /** Override for literature.maxTrialsPerRun */
  maxTrials?: number;
}

export interface LiteratureDeps {
  literature?: LiteratureClient;
}

export interface LiteratureResult {
  checked: number;
  linked: number;
  failed: string[];
}

const PROGRESS_EVERY = 25;

export function createLiteratureClient(config: TrialWatchConfig): LiteratureClient {
  return new LiteratureClient({
    tool: config.literature.tool,
    email: config.literature.email,
    apiKey: config.literature.apiKey,
    sleepSeconds: config.literature.sleepSeconds,
    timeoutSeconds: config.registry.timeoutSeconds,
  });
}

/**
 * Latest publication date by plain string ordering. Dates are free-form, so
 * this is a heuristic ("2024-01-05" sorts after "2024 Dec").
 */
export function latestPublicationDate(citations: readonly Citation[]): string | null {
  let latest: string | null = null;
  for (const citation of citations) {
    const date = citation.pub_date;
    if (!date) continue;
    if (latest === null || date > latest) latest = date;
  }
  return latest;
}

/**
 * Link citations for actionable (or top-scored) trials in the database
 */
export async function linkLiterature(
  config: TrialWatchConfig,
  dbPath: string,
  options: LiteratureOptions = {},
  deps: LiteratureDeps = {}
): Promise<LiteratureResult> {
  const result: LiteratureResult = { checked: 0, linked: 0, failed: [] };
  if (!config.literature.enabled) {
    console.error('[Literature] Disabled in config.');
    return result;
  }

  const db = DatabaseService.open(dbPath);
  try {
    const limit = options.maxTrials ?? config.literature.maxTrialsPerRun;
    const ids = config.literature.actionableOnly
      ? db.fetchActionableIds(
          {
            readoutWindowDays: config.pipeline.readoutWindowDays,
            recentlyCompletedDays: config.pipeline.recentlyCompletedDays,
          },
          limit
        )
      : db.fetchTopIds(limit);

    console.error(`[Literature] Checking ${ids.length} trials (limit=${limit})`);
    const client = deps.literature ?? createLiteratureClient(config);

    for (const [index, nctId] of ids.entries()) {
      result.checked++;
      let citations: Citation[];
      try {
        citations = await client.citationsForTrial(nctId, config.literature.retmax);
      } catch (error) {
        console.error(
          `[Literature] ${nctId}: error: ${error instanceof Error ? error.message : String(error)}`
        );
        result.failed.push(nctId);
        continue;
      }

      db.upsertCitations(nctId, citations);
      db.updateLiteratureSummary(nctId, citations.length, latestPublicationDate(citations));
      if (citations.length > 0) result.linked++;

      if ((index + 1) % PROGRESS_EVERY === 0) {
        console.error(`[Literature] processed ${index + 1}/${ids.length}`);
      }
    }

    console.error('[Literature] Done.');
    return result;
  } finally {
    db.close();
  }
}
