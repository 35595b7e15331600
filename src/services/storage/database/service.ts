/**
 * DatabaseService class for all trial store operations
 *
 * One instance owns one better-sqlite3 connection. Every write commits
 * immediately so partial progress of a sync survives a later failure.
 */

import Database from 'better-sqlite3';
import type { TrialRecord } from '../../../models/trial.js';
import type { ScoreResult } from '../../../models/score.js';
import type { Citation, CitationRow } from '../../../models/citation.js';
import type { ActionableWindow, StoredTrial, SyncRun, TrialRow } from './types.js';
import { openDatabase, openExistingDatabase, databaseExists } from './static-operations.js';
import * as trialOps from './trial-operations.js';
import type { UpsertTrialOptions } from './trial-operations.js';
import * as citationOps from './citation-operations.js';
import * as syncRunOps from './sync-run-operations.js';

export class DatabaseService {
  private db: Database.Database;
  private readonly path: string;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Open a database file, creating it when missing
   */
  static open(dbPath: string): DatabaseService {
    const result = openDatabase(dbPath);
    return new DatabaseService(result.db, result.path);
  }

  /**
   * Open a database file that must already exist
   */
  static openExisting(dbPath: string): DatabaseService {
    const result = openExistingDatabase(dbPath);
    return new DatabaseService(result.db, result.path);
  }

  static exists(dbPath: string): boolean {
    return databaseExists(dbPath);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== TRIAL OPERATIONS ====================

  upsertTrial(
    record: TrialRecord,
    topicName: string,
    scores: ScoreResult,
    options?: UpsertTrialOptions
  ): string[] {
    return trialOps.upsertTrial(this.db, record, topicName, scores, options);
  }

  getTrial(nctId: string): StoredTrial | null {
    return trialOps.getTrial(this.db, nctId);
  }

  getTrialRow(nctId: string): TrialRow | null {
    return trialOps.getTrialRow(this.db, nctId);
  }

  getTopicTags(nctId: string): string[] {
    return trialOps.getTopicTags(this.db, nctId);
  }

  fetchTrialsForDigest(window: ActionableWindow): TrialRow[] {
    return trialOps.fetchTrialsForDigest(this.db, window);
  }

  fetchActionableIds(window: ActionableWindow, limit: number): string[] {
    return trialOps.fetchActionableIds(this.db, window, limit);
  }

  fetchTopIds(limit: number): string[] {
    return trialOps.fetchTopIds(this.db, limit);
  }

  countTrials(): number {
    return trialOps.countTrials(this.db);
  }

  // ==================== LITERATURE OPERATIONS ====================

  upsertCitations(nctId: string, citations: readonly Citation[]): number {
    return citationOps.upsertCitations(this.db, nctId, citations);
  }

  getCitations(nctId: string): CitationRow[] {
    return citationOps.getCitations(this.db, nctId);
  }

  countCitations(nctId?: string): number {
    return citationOps.countCitations(this.db, nctId);
  }

  getLiteratureCount(nctId: string): number {
    return trialOps.getLiteratureCount(this.db, nctId);
  }

  updateLiteratureSummary(nctId: string, citationCount: number, latestDate: string | null): boolean {
    return trialOps.updateLiteratureSummary(this.db, nctId, citationCount, latestDate);
  }

  // ==================== SYNC RUN OPERATIONS ====================

  startSyncRun(topics: readonly string[]): string {
    return syncRunOps.startSyncRun(this.db, topics);
  }

  finishSyncRun(id: string, outcome: { received: number; stored: number; error?: string }): void {
    syncRunOps.finishSyncRun(this.db, id, outcome);
  }

  getSyncRun(id: string): SyncRun | null {
    return syncRunOps.getSyncRun(this.db, id);
  }

  listSyncRuns(limit?: number): SyncRun[] {
    return syncRunOps.listSyncRuns(this.db, limit);
  }
}
