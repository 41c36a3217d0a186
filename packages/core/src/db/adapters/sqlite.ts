/**
 * SQLite store backed by better-sqlite3.
 * The database file is opened read-only for every query and closed afterwards.
 */

import Database from 'better-sqlite3';
import type { SafeQuery } from '../../sanitize/types.js';
import type { DataStore, ResultSet, SqliteConnectionConfig } from '../types.js';
import { toRow } from '../values.js';

export function openDatabase(path: string, readonly = true): Database.Database {
  if (!path.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(path, { readonly, fileMustExist: readonly });
}

export class SqliteDataStore implements DataStore {
  readonly type = 'sqlite' as const;

  constructor(private readonly config: Omit<SqliteConnectionConfig, 'type'>) {}

  async execute(query: SafeQuery): Promise<ResultSet> {
    const db = openDatabase(this.config.path, true);
    try {
      const stmt = db.prepare<unknown[], Record<string, unknown>>(query.sql);
      if (!stmt.reader) {
        throw new Error('Statement does not return rows.');
      }
      const columns = stmt.columns().map((column) => column.name);
      const raw = stmt.all();
      return {
        columns,
        rows: raw.map((r) => toRow(columns, r)),
      };
    } finally {
      db.close();
    }
  }
}

export async function testConnection(
  cfg: Omit<SqliteConnectionConfig, 'type'>,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  try {
    const db = openDatabase(cfg.path, true);
    try {
      const versionRow = db
        .prepare<unknown[], { version?: string }>('SELECT sqlite_version() as version')
        .get();
      return { ok: true, serverVersion: versionRow?.version ?? 'sqlite' };
    } finally {
      db.close();
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}
