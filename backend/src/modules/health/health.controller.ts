/**
 * backend/src/modules/health/health.controller.ts
 *
 * WHY:
 * - Probes for platforms and load balancers.
 * - Liveness never touches the database; db/readiness map healthCheck() to 200/503.
 *
 * RULES:
 * - healthCheck() never throws, so no try/catch here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { ConnectionManager } from '../../shared/db/connection-manager';
import type {
  BasicHealthBody,
  DbHealthBody,
  LivenessBody,
  ReadinessBody,
  ServiceInfo,
} from './health.types';

export class HealthController {
  constructor(
    private readonly database: ConnectionManager,
    private readonly service: ServiceInfo,
  ) {}

  basic(req: FastifyRequest): BasicHealthBody {
    return {
      status: 'healthy',
      service: this.service.serviceName,
      version: this.service.serviceVersion,
      requestId: req.requestContext.requestId,
    };
  }

  live(): LivenessBody {
    return { status: 'alive', service: this.service.serviceName };
  }

  async db(_req: FastifyRequest, reply: FastifyReply) {
    const database = await this.database.healthCheck();
    const body: DbHealthBody = { status: database.status, database };

    return reply.status(database.status === 'healthy' ? 200 : 503).send(body);
  }

  async ready(_req: FastifyRequest, reply: FastifyReply) {
    const database = await this.database.healthCheck();

    if (database.status !== 'healthy') {
      const body: ReadinessBody = {
        status: 'not_ready',
        reason: 'Database not healthy',
        database,
      };
      return reply.status(503).send(body);
    }

    const body: ReadinessBody = { status: 'ready', service: this.service.serviceName, database };
    return reply.status(200).send(body);
  }
}
