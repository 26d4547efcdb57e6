/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger (structured JSON logs by default).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - DI builds the app logger from AppConfig via createLogger() and passes it down.
 * - The module-level `logger` is only for code that runs before config exists
 *   (fatal startup errors in index.ts).
 * - Do not log raw Error objects only—pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

import type { LogFormat, LogLevel } from '../../app/config';

export type Logger = winston.Logger;

const WINSTON_LEVELS: Record<LogLevel, string> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'error',
};

export function toWinstonLevel(level: LogLevel): string {
  return WINSTON_LEVELS[level];
}

const textFormat = winston.format.printf((info) => {
  const { timestamp, level, message, service, env, ...meta } = info;
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} - ${String(service)} - ${level.toUpperCase()} - ${String(message)}${rest}`;
});

export function createLogger(opts: {
  level: LogLevel;
  format: LogFormat;
  service: string;
  env: string;
  silent?: boolean;
}): Logger {
  return winston.createLogger({
    level: toWinstonLevel(opts.level),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      opts.format === 'json' ? winston.format.json() : textFormat,
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    transports: [new winston.transports.Console({ silent: opts.silent ?? false })],
  });
}

export const logger = createLogger({
  level: 'INFO',
  format: 'json',
  service: process.env.SERVICE_NAME ?? 'larp-manager-server',
  env: process.env.ENVIRONMENT ?? 'development',
});
