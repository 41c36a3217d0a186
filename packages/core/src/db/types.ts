/**
 * Database abstraction types.
 * Each supported engine implements DataStore.
 */

import type { SafeQuery } from '../sanitize/types.js';

export type DbType = 'sqlite' | 'postgres';

export type Scalar = string | number | null;

export type Row = Record<string, Scalar>;

/** Tabular output of one query. Column order follows the projection. */
export interface ResultSet {
  columns: string[];
  rows: Row[];
}

export interface SqliteConnectionConfig {
  type: 'sqlite';
  /** Path to the database file */
  path: string;
}

export interface PgConnectionConfig {
  type: 'postgres';
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  /** Statement timeout in milliseconds */
  statementTimeoutMs?: number;
}

export type ConnectionConfig = SqliteConnectionConfig | PgConnectionConfig;

/**
 * Read-only query executor.
 *
 * Every execute() call acquires its own connection and releases it before
 * returning or throwing, so concurrent calls share no state.
 */
export interface DataStore {
  readonly type: DbType;
  execute(query: SafeQuery): Promise<ResultSet>;
}
