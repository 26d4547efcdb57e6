/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> database (initialize + schema) -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - A failed database bootstrap aborts startup (the error propagates).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { BuildDepsOptions } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(config: AppConfig, opts: BuildDepsOptions = {}) {
  const deps = buildDeps(config, opts);

  deps.logger.info('app.starting', { env: config.environment, debug: config.debug });

  try {
    await deps.database.initialize();
    await deps.database.createSchema();
  } catch (err) {
    deps.logger.error('app.startup_failed', {
      message: err instanceof Error ? err.message : String(err),
    });
    await deps.close();
    throw err;
  }

  const app = buildServer({ config, deps });
  registerRoutes(app, { deps });

  const close = async () => {
    await app.close();
    await deps.close();
    deps.logger.info('app.stopped');
  };

  return { app, deps, close };
}
