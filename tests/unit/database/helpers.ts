/**
 * Shared test helpers for DatabaseService tests
 */

import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { createTestDbPath } from '../../helpers.js';

export { createTestDir, cleanupTestDir } from '../../helpers.js';
export { DatabaseService };

export const WINDOW = { readoutWindowDays: 180, recentlyCompletedDays: 120 } as const;

export function openTestService(testDir: string): DatabaseService {
  return DatabaseService.open(createTestDbPath(testDir));
}
