/**
 * Storage Service Module
 *
 * SQLite persistence for trials, literature citations and sync runs.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
} from './migrations/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  backupPathFor,
  rowToStoredTrial,
  decodeStringList,
  decodeContacts,
  decodeReasons,
  mergeTopicTags,
  type ActionableWindow,
  type StoredTrial,
  type StoredDate,
  type TrialRow,
  type SyncRun,
  type SyncRunStatus,
  type UpsertTrialOptions,
} from './database/index.js';
