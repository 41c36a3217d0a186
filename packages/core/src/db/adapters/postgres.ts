/**
 * Postgres store.
 * Uses the `pg` driver; each query runs on its own client inside a
 * READ ONLY transaction with a statement timeout.
 */

import pg from 'pg';
import type { Logger } from 'winston';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { SafeQuery } from '../../sanitize/types.js';
import type { DataStore, PgConnectionConfig, ResultSet } from '../types.js';
import { toRow } from '../values.js';
import { silentLogger } from '../../util/logger.js';

const { Client } = pg;

type PgSettings = Omit<PgConnectionConfig, 'type'>;

// pg returns these as strings to avoid precision loss
const PG_INT8_OID = 20;
const PG_NUMERIC_OID = 1700;

/** Columns whose text values must be parsed as numbers. */
export function numericColumns(fields: ReadonlyArray<{ name: string; dataTypeID: number }>): Set<string> {
  return new Set(
    fields.filter((f) => f.dataTypeID === PG_INT8_OID || f.dataTypeID === PG_NUMERIC_OID).map((f) => f.name),
  );
}

function createClient(cfg: PgSettings): pg.Client {
  return new Client({
    host: cfg.host,
    port: cfg.port,
    database: cfg.database,
    user: cfg.user,
    password: cfg.password,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: 10_000,
  });
}

export class PostgresDataStore implements DataStore {
  readonly type = 'postgres' as const;

  constructor(
    private readonly config: PgSettings,
    private readonly logger: Logger = silentLogger(),
  ) {}

  async execute(query: SafeQuery): Promise<ResultSet> {
    const timeoutMs = this.config.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    const client = createClient(this.config);

    try {
      await client.connect();
      await client.query(`SET statement_timeout = ${Math.trunc(timeoutMs)}`);
      await client.query('BEGIN READ ONLY');

      const result = await client.query<Record<string, unknown>>(query.sql);
      await client.query('COMMIT');

      const columns = result.fields.map((f) => f.name);
      const numeric = numericColumns(result.fields);
      return {
        columns,
        rows: result.rows.map((r) => toRow(columns, r, numeric)),
      };
    } catch (err: unknown) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.logger.debug('postgres rollback failed', { error: String(rollbackErr) });
      });
      throw err;
    } finally {
      await client.end().catch((endErr: unknown) => {
        this.logger.warn('postgres disconnect failed', { error: String(endErr) });
      });
    }
  }
}

/**
 * Test a Postgres connection: connect, read the server version, disconnect.
 */
export async function testConnection(
  cfg: PgSettings,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  const client = createClient(cfg);
  try {
    await client.connect();
    const res = await client.query<{ version: string }>('SELECT version() AS version');
    return { ok: true, serverVersion: res.rows[0]?.version };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  } finally {
    await client.end().catch(() => undefined);
  }
}
