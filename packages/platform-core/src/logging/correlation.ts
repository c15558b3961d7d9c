/**
 * Correlation Context
 *
 * Request-scoped log fields that follow async work started by the request
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { LogContext } from './types.js';

const contextStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return contextStorage.getStore();
}

/** Runs `fn` with `context` layered over the enclosing one */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return contextStorage.run({ ...contextStorage.getStore(), ...context }, fn);
}

/** Adds fields to the active context. No-op outside runWithContext. */
export function extendContext(fields: LogContext): void {
  const store = contextStorage.getStore();
  if (store) Object.assign(store, fields);
}

export function generateCorrelationId(): string {
  return randomUUID();
}
