import type { DbHealth } from '../../shared/db/connection-manager';

export type ServiceInfo = {
  serviceName: string;
  serviceVersion: string;
};

export type BasicHealthBody = {
  status: 'healthy';
  service: string;
  version: string;
  requestId: string;
};

export type LivenessBody = {
  status: 'alive';
  service: string;
};

export type DbHealthBody = {
  status: 'healthy' | 'unhealthy';
  database: DbHealth;
};

export type ReadinessBody =
  | { status: 'ready'; service: string; database: DbHealth }
  | { status: 'not_ready'; reason: string; database: DbHealth };
