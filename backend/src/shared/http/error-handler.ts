/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod / Fastify schema validation errors → 400.
 * - Unexpected errors → 500. Generic message, plus `detail` and `type`
 *   only when the app runs in debug mode.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta in responses.
 * - Log full error details (with REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from '../errors';
import { withRequestContext } from '../logger/with-context';
import type { Logger } from '../logger/logger';

export type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    detail?: string;
    type?: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'password',
  'passwordHash',
  'secret',
  'secretKey',
  'databaseUrl',
]);

export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

export function registerErrorHandler(
  app: FastifyInstance,
  opts: { logger: Logger; debug: boolean },
): void {
  app.setErrorHandler((err: FastifyError | Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req, opts.logger);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Validation errors (safety net if a controller misses one)
    if (err instanceof ZodError || ('validation' in err && err.validation)) {
      log.warn('validation_error', { flow: 'http.error', message: err.message });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Validation error'));
    }

    // 3) Unexpected errors
    log.error('unhandled_error', {
      flow: 'http.error',
      type: err.name,
      message: err.message,
      stack: err.stack,
    });

    const body = buildResponse('INTERNAL', 'Internal server error');
    if (opts.debug) {
      body.error.detail = err.message;
      body.error.type = err.name;
    }

    return reply.status(500).send(body);
  });
}
