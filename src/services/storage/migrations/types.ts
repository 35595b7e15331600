/**
 * Error class for schema initialization and migration failures
 *
 * @module migrations/types
 */

export class MigrationError extends Error {
  constructor(
    message: string,
    /** Failing step, e.g. `pragma`, `create_table`, `alter_table` */
    public readonly operation: string,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}
