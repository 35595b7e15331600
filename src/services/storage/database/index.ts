/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type {
  ActionableWindow,
  StoredTrial,
  StoredDate,
  TrialRow,
  SyncRun,
  SyncRunRow,
  SyncRunStatus,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';
export type { UpsertTrialOptions } from './trial-operations.js';

export { backupPathFor } from './pre-migration-backup.js';

export {
  rowToStoredTrial,
  decodeStringList,
  decodeContacts,
  decodeReasons,
  mergeTopicTags,
} from './converters.js';
