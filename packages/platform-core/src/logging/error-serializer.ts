/**
 * Error serialization for structured log entries
 */

export interface SerializedError {
  message: string;
  name?: string;
  code?: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  stack?: string;
  cause?: SerializedError;
}

const MAX_CAUSE_DEPTH = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function serializeErrorInstance(error: Error, depth: number): SerializedError {
  const serialized: SerializedError = { message: error.message, name: error.name, stack: error.stack };

  if ('code' in error && typeof error.code === 'string') serialized.code = error.code;
  if ('statusCode' in error && typeof error.statusCode === 'number') serialized.statusCode = error.statusCode;
  if ('details' in error && isRecord(error.details)) serialized.details = error.details;

  if (error.cause !== undefined && error.cause !== null && depth < MAX_CAUSE_DEPTH) {
    serialized.cause = serialize(error.cause, depth + 1);
  }
  return serialized;
}

function serialize(error: unknown, depth: number): SerializedError {
  if (error instanceof Error) return serializeErrorInstance(error, depth);
  if (typeof error === 'string') return { message: error };
  if (isRecord(error)) {
    return {
      message: String(error.message || error.error || JSON.stringify(error)),
      name: typeof error.name === 'string' ? error.name : undefined,
      code: typeof error.code === 'string' ? error.code : undefined,
    };
  }
  return { message: String(error) };
}

export function serializeError(error: unknown): SerializedError {
  return serialize(error, 0);
}
