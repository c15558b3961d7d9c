/**
 * Database Connection Factory
 *
 * Lazily creates one pg Pool and one Drizzle database per service.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@tracklane/platform-core';
 * import * as schema from './schema/playlist-schema';
 *
 * const { getDatabase } = createDatabaseConnectionFactory({
 *   serviceName: 'playlist-service',
 *   envVarName: 'PLAYLIST_DATABASE_URL',
 *   schema,
 * });
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { maskConnectionUrl } from '../logging/formatting.js';
import { getConfig, getRequiredConfig, isProduction } from '../config/environment-config.js';

type SQLConnection = Pool;

export interface DatabaseConfig<TSchema extends Record<string, unknown>> {
  serviceName: string;
  envVarName?: string;
  fallbackEnvVar?: string;
  schema: TSchema;
}

export interface DatabaseConnectionFactoryInstance<TSchema extends Record<string, unknown>> {
  getDatabase: () => NodePgDatabase<TSchema>;
  createDrizzleRepository: <T>(RepositoryClass: new (db: NodePgDatabase<TSchema>) => T) => T;
  close: () => Promise<void>;
}

function getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
  if (process.env.DATABASE_SSL === 'false') {
    return false;
  }
  try {
    const url = new URL(connStr);
    if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') {
      return false;
    }
    if (url.searchParams.get('sslmode') === 'disable') {
      return false;
    }
  } catch {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactoryInstance<TSchema> {
  const logger = createLogger(`${config.serviceName}-database`);
  const envVarName = config.envVarName || 'DATABASE_URL';
  const fallbackEnvVar = config.fallbackEnvVar || 'DATABASE_URL';

  let sqlConnection: SQLConnection | null = null;
  let dbConnection: NodePgDatabase<TSchema> | null = null;

  const getSQLConnection = (): SQLConnection => {
    if (sqlConnection) return sqlConnection;

    try {
      const connStr = getRequiredConfig(envVarName, fallbackEnvVar);
      sqlConnection = new Pool({
        connectionString: connStr,
        max: getConfig('DATABASE_POOL_MAX', isProduction() ? 20 : 5),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
        ssl: getSslConfig(connStr),
      });
      logger.debug('SQL connection pool established', {
        serviceName: config.serviceName,
        url: maskConnectionUrl(connStr),
      });
      return sqlConnection;
    } catch (error) {
      logger.error('SQL connection failed', { serviceName: config.serviceName, error: serializeError(error) });
      throw error;
    }
  };

  const getDatabase = (): NodePgDatabase<TSchema> => {
    if (!dbConnection) {
      dbConnection = drizzle(getSQLConnection(), { schema: config.schema });
      logger.debug('Drizzle database connection established', { serviceName: config.serviceName });
    }
    return dbConnection;
  };

  return {
    getDatabase,
    createDrizzleRepository: <T>(RepositoryClass: new (db: NodePgDatabase<TSchema>) => T) =>
      new RepositoryClass(getDatabase()),
    close: async () => {
      if (!sqlConnection) return;
      const pool = sqlConnection;
      sqlConnection = null;
      dbConnection = null;
      await pool.end();
      logger.info('Database connection pool closed', { serviceName: config.serviceName });
    },
  };
}
