/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central Kysely types for everything that talks to Postgres.
 * - Entity tables are added to `Database` as concrete entities land
 *   (keyed by `larp_manager.<table>`, see shared/entities).
 *
 * HOW TO USE:
 * - Sessions are issued by ConnectionManager.withSession(), never built by hand.
 */

import { Kysely, PostgresDialect } from 'kysely';
import type { LogEvent, Transaction } from 'kysely';

import type { ManagedPool } from './pool';
import type { Logger } from '../logger/logger';

// No concrete entity tables exist yet.
export type Database = Record<string, never>;

export type Db = Kysely<Database>;

/**
 * One unit of work bound to a single pooled connection.
 * Committed when the work resolves, rolled back when it throws.
 */
export type Session = Transaction<Database>;

export function createDb(pool: ManagedPool, opts: { logger: Logger; echo: boolean }): Db {
  const { logger, echo } = opts;

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
    log: echo
      ? (event: LogEvent) => {
          if (event.level === 'query') {
            logger.debug('db.query', {
              sql: event.query.sql,
              durationMs: event.queryDurationMillis,
            });
          } else {
            logger.debug('db.query_failed', {
              sql: event.query.sql,
              durationMs: event.queryDurationMillis,
              message: event.error instanceof Error ? event.error.message : String(event.error),
            });
          }
        }
      : undefined,
  });
}
