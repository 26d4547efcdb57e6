/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra (logger, connection manager) ONCE and shares it.
 * - Keeps modules testable (tests inject an in-process pool via `createPool`).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Nothing connects here: the connection manager is initialized by build-app.ts.
 */

import type { AppConfig } from './config';
import { ConnectionManager } from '../shared/db/connection-manager';
import type { PoolFactory } from '../shared/db/pool';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createHealthModule } from '../modules/health/health.module';
import type { HealthModule } from '../modules/health/health.module';

export type AppDeps = {
  logger: Logger;
  database: ConnectionManager;

  // modules
  health: HealthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type BuildDepsOptions = {
  createPool?: PoolFactory;
  logger?: Logger;
};

export function buildDeps(config: AppConfig, opts: BuildDepsOptions = {}): AppDeps {
  const logger =
    opts.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      service: config.serviceName,
      env: config.environment,
    });

  const database = new ConnectionManager({
    config: config.database,
    logger,
    echo: config.debug,
    createPool: opts.createPool,
  });

  const health = createHealthModule({
    database,
    service: { serviceName: config.serviceName, serviceVersion: config.serviceVersion },
  });

  return {
    logger,
    database,
    health,
    close: async () => {
      await database.close();
    },
  };
}
