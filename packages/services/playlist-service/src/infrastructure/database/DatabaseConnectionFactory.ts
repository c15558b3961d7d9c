/**
 * Playlist Service Database Connection Factory
 *
 * Uses the DatabaseConnectionFactory from platform-core with playlist-service
 * specific configuration.
 */

import { createDatabaseConnectionFactory } from '@tracklane/platform-core';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../../schema/playlist-schema';
import { SERVICE_NAME, serverConfig } from '../../config/service-config';

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = NodePgDatabase<DatabaseSchema>;

const factory = createDatabaseConnectionFactory({
  serviceName: SERVICE_NAME,
  envVarName: serverConfig.databaseEnvVar,
  fallbackEnvVar: serverConfig.databaseFallbackEnvVar,
  schema,
});

export function createDrizzleRepository<T>(RepositoryClass: new (db: DatabaseConnection) => T): T {
  return factory.createDrizzleRepository(RepositoryClass);
}

export function closeDatabase(): Promise<void> {
  return factory.close();
}
