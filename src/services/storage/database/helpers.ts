/**
 * Helper functions for DatabaseService
 */

import { existsSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Resolve a database path and create its parent directory
 * @throws DatabaseError if the directory cannot be created
 */
export function prepareDatabasePath(dbPath: string): string {
  const fullPath = resolve(dbPath);
  const dir = dirname(fullPath);
  if (!existsSync(dir)) {
    try {
      mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new DatabaseError(
        `Cannot create database directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
        DatabaseErrorCode.PERMISSION_DENIED,
        error
      );
    }
  }
  return fullPath;
}
