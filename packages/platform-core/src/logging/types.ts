/**
 * Logging Types
 */

import type { Logger as WinstonLogger } from 'winston';

export type Logger = WinstonLogger;

/** Fields carried through async work and stamped onto each log line */
export interface LogContext {
  correlationId?: string;
  service?: string;
  playlistId?: string;
  [key: string]: unknown;
}

export type LogFormat = 'pretty' | 'json';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  /** Merged into every entry the logger writes */
  defaultMeta?: Record<string, unknown>;
}
