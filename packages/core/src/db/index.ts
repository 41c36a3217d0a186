/**
 * Store factory.
 * Selects the adapter for the configured database type.
 */

import type { Logger } from 'winston';
import { PostgresDataStore, testConnection as testPostgres } from './adapters/postgres.js';
import { SqliteDataStore, testConnection as testSqlite } from './adapters/sqlite.js';
import type { ConnectionConfig, DataStore } from './types.js';

export function createDataStore(config: ConnectionConfig, logger?: Logger): DataStore {
  switch (config.type) {
    case 'sqlite':
      return new SqliteDataStore({ path: config.path });
    case 'postgres':
      return new PostgresDataStore(config, logger);
  }
}

export async function testDbConnection(
  config: ConnectionConfig,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  switch (config.type) {
    case 'sqlite':
      return testSqlite({ path: config.path });
    case 'postgres':
      return testPostgres(config);
  }
}
