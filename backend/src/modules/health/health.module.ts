/**
 * backend/src/modules/health/health.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { ConnectionManager } from '../../shared/db/connection-manager';
import { HealthController } from './health.controller';
import { registerHealthRoutes } from './health.routes';
import type { ServiceInfo } from './health.types';

export type HealthModule = ReturnType<typeof createHealthModule>;

export function createHealthModule(deps: { database: ConnectionManager; service: ServiceInfo }) {
  const controller = new HealthController(deps.database, deps.service);

  return {
    registerRoutes(app: FastifyInstance) {
      registerHealthRoutes(app, controller);
    },
  };
}
