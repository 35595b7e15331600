/**
 * Temp-directory helpers shared by storage and pipeline tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

/** Prefix of every temp directory tests create; removed by global teardown */
export const TEMP_DIR_PREFIX = 'trial-watch-test-';

export function createTestDir(name: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${TEMP_DIR_PREFIX}${name}-`));
}

export function cleanupTestDir(testDir: string): void {
  try {
    fs.rmSync(testDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export function createTestDbPath(testDir: string): string {
  return path.join(testDir, `test-${String(Date.now())}-${Math.random().toString(36).slice(2)}.db`);
}
