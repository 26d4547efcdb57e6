/**
 * backend/src/shared/db/pool.ts
 *
 * WHY:
 * - The connection manager owns a pool but must not care which one:
 *   production uses pg.Pool, tests plug in an in-process Postgres.
 * - Maps our pool knobs onto pg's (pg has no "overflow": max = size + overflow).
 */

import pg from 'pg';
import type { PostgresPool } from 'kysely';

import type { DatabaseConfig } from '../../app/config';

/**
 * What ConnectionManager needs from a pool: Kysely's contract plus the
 * counters pg.Pool exposes.
 */
export interface ManagedPool extends PostgresPool {
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type PoolFactory = (config: DatabaseConfig) => ManagedPool;

export type PoolStats = {
  size: number;
  checkedIn: number;
  checkedOut: number;
  overflow: number;
  invalid: number;
  waiting: number;
};

export const createPgPool: PoolFactory = (config) =>
  new pg.Pool({
    connectionString: config.url,
    max: config.poolSize + config.maxOverflow,
    connectionTimeoutMillis: config.poolTimeoutSeconds * 1000,
    maxLifetimeSeconds: config.poolRecycleSeconds,
    idleTimeoutMillis: 30_000,
  });

export function readPoolStats(pool: ManagedPool, poolSize: number, invalid: number): PoolStats {
  const size = pool.totalCount;
  return {
    size,
    checkedIn: pool.idleCount,
    checkedOut: size - pool.idleCount,
    overflow: Math.max(0, size - poolSize),
    invalid,
    waiting: pool.waitingCount,
  };
}
