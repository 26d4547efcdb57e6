/**
 * backend/src/modules/health/health.routes.ts
 *
 * RULES:
 * - No logic here. Only wiring.
 */

import type { FastifyInstance } from 'fastify';
import type { HealthController } from './health.controller';

export function registerHealthRoutes(app: FastifyInstance, controller: HealthController) {
  app.get('/health', controller.basic.bind(controller));
  app.get('/health/live', controller.live.bind(controller));
  app.get('/health/db', controller.db.bind(controller));
  app.get('/health/ready', controller.ready.bind(controller));
}
