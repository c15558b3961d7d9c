/**
 * Logger
 *
 * Winston logger creation and caching
 */

import * as winston from 'winston';
import { hostname } from 'os';
import type { LogFormat, Logger, LoggerOptions } from './types.js';
import { jsonFormat, prettyFormat } from './formatting.js';

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

function resolveLogFormat(): LogFormat {
  const configured = process.env.LOG_FORMAT;
  if (configured === 'pretty' || configured === 'json') return configured;
  return process.env.NODE_ENV === 'development' ? 'pretty' : 'json';
}

export function createLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const format = options.format ?? resolveLogFormat();

  return winston.createLogger({
    level: options.level ?? resolveLogLevel(),
    defaultMeta: {
      service: serviceName,
      env: process.env.NODE_ENV || 'development',
      instanceId: process.env.INSTANCE_ID || hostname(),
      ...options.defaultMeta,
    },
    format: format === 'pretty' ? prettyFormat() : jsonFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, Logger>();

/**
 * Get or create a logger
 */
export function getLogger(serviceOrModule: string): Logger {
  const existing = loggers.get(serviceOrModule);
  if (existing) return existing;

  const logger = createLogger(serviceOrModule);
  loggers.set(serviceOrModule, logger);
  return logger;
}
