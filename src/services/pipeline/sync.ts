/**
 * Registry sync pass
 *
 * Streams studies for each selected topic, normalizes and scores them, and
 * upserts the rows. Each row commits on its own.
 *
 * @module pipeline/sync
 */

import type { TrialWatchConfig } from '../../config/schema.js';
import { todayIso } from '../../utils/time.js';
import { extractTrialRecord } from '../normalize/normalizer.js';
import { RegistryClient, type QueryParams } from '../registry/client.js';
import { scoreTrial } from '../scoring/index.js';
import { DatabaseService } from '../storage/index.js';
import { matchesTagKeywords, selectTopics } from './topics.js';

export interface SyncOptions {
  /** Subset of configured topic names; unknown names are ignored */
  topicNames?: readonly string[];
  /** Page cap override for every topic */
  maxPages?: number;
}

export interface SyncDeps {
  registry?: RegistryClient;
  /** ISO calendar date used for scoring */
  today?: string;
}

export interface TopicSyncResult {
  topic: string;
  received: number;
  stored: number;
  /** Stored trials whose text hit none of the topic's tag keywords */
  keywordMisses: number;
}

export interface SyncResult {
  runId: string;
  topics: TopicSyncResult[];
}

const PROGRESS_EVERY = 200;

export function createRegistryClient(config: TrialWatchConfig): RegistryClient {
  return new RegistryClient({
    baseUrl: config.registry.baseUrl,
    timeoutSeconds: config.registry.timeoutSeconds,
    userAgent: config.registry.userAgent,
    sleepSeconds: config.pipeline.registrySleepSeconds,
  });
}

function pageSizeFor(params: QueryParams, fallback: number): number {
  const value = Number(params.pageSize);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Sync every selected topic into the database at `dbPath`
 *
 * @throws RegistryAPIError when a page request fails; trials stored before
 *   the failure stay stored and the run is recorded as failed
 */
export async function syncRegistry(
  config: TrialWatchConfig,
  dbPath: string,
  options: SyncOptions = {},
  deps: SyncDeps = {}
): Promise<SyncResult> {
  const topics = selectTopics(config.topics, options.topicNames);
  const registry = deps.registry ?? createRegistryClient(config);
  const today = deps.today ?? todayIso();
  const db = DatabaseService.open(dbPath);
  const runId = db.startSyncRun(topics.map((t) => t.name));
  const results: TopicSyncResult[] = [];

  try {
    for (const topic of topics) {
      const pageSize = pageSizeFor(topic.registryParams, config.pipeline.pageSize);
      const params: QueryParams = { ...topic.registryParams, pageSize };
      const maxPages = options.maxPages ?? config.pipeline.maxPagesPerTopic;
      console.error(`[Sync] Topic: ${topic.name} | pageSize=${pageSize} | max_pages=${maxPages}`);

      const result: TopicSyncResult = { topic: topic.name, received: 0, stored: 0, keywordMisses: 0 };
      results.push(result);

      for await (const study of registry.iterStudies(params, { pageSize, maxPages })) {
        result.received++;
        const record = extractTrialRecord(study);
        if (record === null) continue;

        // Matched by the registry query: kept even when no tag keyword hits.
        if (!matchesTagKeywords(record, topic.tagKeywords)) {
          result.keywordMisses++;
        }

        const scores = scoreTrial(record, {
          interestingKeywords: topic.interestingKeywords,
          citationCount: db.getLiteratureCount(record.nct_id),
          today,
        });
        db.upsertTrial(record, topic.name, scores, {
          raw: config.pipeline.storeRawJson ? study : undefined,
        });
        result.stored++;

        if (result.stored % PROGRESS_EVERY === 0) {
          console.error(`[Sync]   processed ${result.stored} trials (topic=${topic.name})`);
        }
      }

      console.error(
        `[Sync] Topic: ${topic.name} | received=${result.received} | stored=${result.stored}`
      );
    }

    db.finishSyncRun(runId, totals(results));
    console.error(`[Sync] Done. DB: ${db.getPath()}`);
    return { runId, topics: results };
  } catch (error) {
    try {
      db.finishSyncRun(runId, {
        ...totals(results),
        error: error instanceof Error ? error.message : String(error),
      });
    } catch (recordError) {
      console.error(
        `[Sync] Could not record failed run ${runId}: ${recordError instanceof Error ? recordError.message : String(recordError)}`
      );
    }
    throw error;
  } finally {
    db.close();
  }
}

function totals(results: readonly TopicSyncResult[]): { received: number; stored: number } {
  return results.reduce(
    (acc, r) => ({ received: acc.received + r.received, stored: acc.stored + r.stored }),
    { received: 0, stored: 0 }
  );
}
