/**
 * backend/src/shared/db/connection-manager.ts
 *
 * WHY:
 * - Owns the pooled connection source and the Kysely instance built on it.
 * - One explicit instance per process, created in app/di.ts and passed down
 *   (no module-level singleton).
 *
 * LIFECYCLE:
 * - Uninitialized --initialize()--> Initialized --close()--> Uninitialized
 * - initialize() while initialized and close() while uninitialized are logged no-ops.
 * - Everything else except healthCheck() throws DatabaseNotInitializedError
 *   while uninitialized.
 *
 * CONCURRENCY:
 * - State flips happen synchronously before the first await in both
 *   initialize() and close(), so overlapping lifecycle calls cannot observe a
 *   half-built manager. They are still meant to be called from startup/shutdown only.
 *
 * RULES:
 * - healthCheck() never throws; failures come back as data.
 * - executeRaw() is an admin escape hatch. Never wire it to a request-facing route.
 */

import { sql } from 'kysely';

import type { DatabaseConfig } from '../../app/config';
import type { Logger } from '../logger/logger';
import { createDb } from './db';
import type { Db, Session } from './db';
import { DatabaseNotInitializedError } from './db.errors';
import { createPgPool, readPoolStats } from './pool';
import type { ManagedPool, PoolFactory, PoolStats } from './pool';
import { APP_SCHEMA } from '../entities/schema';

export type DbHealth =
  | {
      status: 'healthy';
      testQuery: boolean;
      schemaExists: boolean;
      poolStats: PoolStats;
      error: null;
    }
  | {
      status: 'unhealthy';
      error: string;
      details: null;
    };

export type RawSqlResult =
  | { success: true; rows: Record<string, unknown>[]; numAffectedRows: number | null }
  | { success: false; error: string };

type Live = {
  pool: ManagedPool;
  db: Db;
  /** 'error' events seen on this pool. */
  invalidConnections: number;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConnectionManager {
  private live: Live | null = null;

  constructor(
    private readonly deps: {
      config: DatabaseConfig;
      logger: Logger;
      /** Log every statement at debug level. */
      echo?: boolean;
      createPool?: PoolFactory;
    },
  ) {}

  get isInitialized(): boolean {
    return this.live !== null;
  }

  async initialize(): Promise<void> {
    if (this.live) {
      this.deps.logger.warn('db.already_initialized');
      return;
    }

    const createPool = this.deps.createPool ?? createPgPool;
    const pool = createPool(this.deps.config);
    const db = createDb(pool, { logger: this.deps.logger, echo: this.deps.echo ?? false });
    const live: Live = { pool, db, invalidConnections: 0 };

    // pg emits 'error' when an idle client dies; unhandled, it would crash the process
    pool.on('error', (err: Error) => {
      live.invalidConnections += 1;
      this.deps.logger.error('db.pool_error', { message: err.message, stack: err.stack });
    });

    this.live = live;

    this.deps.logger.info('db.initialized', {
      poolSize: this.deps.config.poolSize,
      maxOverflow: this.deps.config.maxOverflow,
    });
  }

  async close(): Promise<void> {
    const live = this.live;
    if (!live) {
      this.deps.logger.warn('db.not_initialized', { operation: 'close' });
      return;
    }

    this.live = null;

    // Releases every pooled physical connection.
    await live.db.destroy();

    this.deps.logger.info('db.closed');
  }

  /**
   * Runs `work` inside one session. The session commits when `work` resolves,
   * rolls back when it throws (the error is re-thrown), and its connection
   * always goes back to the pool.
   */
  async withSession<T>(work: (session: Session) => Promise<T>): Promise<T> {
    const { db } = this.requireLive('withSession');
    return db.transaction().execute(work);
  }

  async healthCheck(): Promise<DbHealth> {
    const live = this.live;
    if (!live) {
      return { status: 'unhealthy', error: 'Database not initialized', details: null };
    }

    try {
      const { testQuery, schemaExists } = await live.db.transaction().execute(async (trx) => {
        const probe = await sql<{ value: number }>`select 1 as value`.execute(trx);
        const schema = await sql<{ schema_name: string }>`
          select schema_name from information_schema.schemata where schema_name = ${APP_SCHEMA}
        `.execute(trx);

        return {
          testQuery: probe.rows[0]?.value === 1,
          schemaExists: schema.rows.length > 0,
        };
      });

      return {
        status: 'healthy',
        testQuery,
        schemaExists,
        poolStats: readPoolStats(live.pool, this.deps.config.poolSize, live.invalidConnections),
        error: null,
      };
    } catch (err) {
      const message = errorMessage(err);
      this.deps.logger.error('db.health_check_failed', { message });
      return { status: 'unhealthy', error: message, details: null };
    }
  }

  /**
   * Ensures the app schema and every configured extension exist.
   * Failures are logged and re-thrown: the process cannot serve without them.
   */
  async createSchema(): Promise<void> {
    const { db } = this.requireLive('createSchema');

    try {
      await db.transaction().execute(async (trx) => {
        await sql`create schema if not exists ${sql.id(APP_SCHEMA)}`.execute(trx);

        for (const extension of this.deps.config.extensions) {
          await sql`create extension if not exists ${sql.id(extension)}`.execute(trx);
        }
      });

      this.deps.logger.info('db.schema_ready', {
        schema: APP_SCHEMA,
        extensions: this.deps.config.extensions,
      });
    } catch (err) {
      this.deps.logger.error('db.schema_create_failed', {
        schema: APP_SCHEMA,
        message: errorMessage(err),
      });
      throw err;
    }
  }

  /**
   * Executes one arbitrary statement in its own transaction.
   * Errors are returned, not thrown.
   */
  async executeRaw(statement: string): Promise<RawSqlResult> {
    const { db } = this.requireLive('executeRaw');

    try {
      const result = await db
        .transaction()
        .execute((trx) => sql.raw<Record<string, unknown>>(statement).execute(trx));

      return {
        success: true,
        rows: result.rows,
        numAffectedRows:
          result.numAffectedRows === undefined ? null : Number(result.numAffectedRows),
      };
    } catch (err) {
      const message = errorMessage(err);
      this.deps.logger.error('db.raw_sql_failed', { message });
      return { success: false, error: message };
    }
  }

  /** The Kysely instance, for callers that need schema builders or introspection. */
  getDb(): Db {
    return this.requireLive('getDb').db;
  }

  private requireLive(operation: string): Live {
    if (!this.live) {
      throw new DatabaseNotInitializedError(operation);
    }
    return this.live;
  }
}
