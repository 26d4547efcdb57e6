/**
 * backend/src/shared/db/db.errors.ts
 *
 * Raised by every ConnectionManager operation that needs a live pool
 * while the manager is uninitialized.
 */

export class DatabaseNotInitializedError extends Error {
  constructor(public readonly operation: string) {
    super('Database not initialized. Call initialize() first.');
    this.name = 'DatabaseNotInitializedError';
  }
}
