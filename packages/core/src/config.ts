/**
 * Environment-driven configuration.
 *
 * Every setting has an environment variable; the CLI overrides individual
 * fields from its flags after loading.
 */

import type { ConnectionConfig } from './db/types.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';
import { DEFAULT_MODEL } from './llm/openai.js';
import { createAjv } from './util/ajv.js';
import { LOG_LEVELS, type LogLevel } from './util/logger.js';

export interface VentasqlConfig {
  db: ConnectionConfig;
  outputDir: string;
  model: string;
  openaiApiKey?: string;
  translationTimeoutMs: number;
  logLevel: LogLevel;
}

interface RawSettings {
  dbType: 'sqlite' | 'postgres';
  dbPath: string;
  pgHost: string;
  pgPort: number;
  pgDatabase: string;
  pgUser: string;
  pgPassword: string;
  pgSsl: boolean;
  statementTimeoutMs: number;
  outputDir: string;
  model: string;
  openaiApiKey?: string;
  translationTimeoutMs: number;
  logLevel: LogLevel;
}

const ENV_KEYS: Record<keyof RawSettings, string> = {
  dbType: 'VENTASQL_DB_TYPE',
  dbPath: 'VENTASQL_DB_PATH',
  pgHost: 'VENTASQL_PG_HOST',
  pgPort: 'VENTASQL_PG_PORT',
  pgDatabase: 'VENTASQL_PG_DATABASE',
  pgUser: 'VENTASQL_PG_USER',
  pgPassword: 'VENTASQL_PG_PASSWORD',
  pgSsl: 'VENTASQL_PG_SSL',
  statementTimeoutMs: 'VENTASQL_STATEMENT_TIMEOUT_MS',
  outputDir: 'VENTASQL_OUTPUT_DIR',
  model: 'VENTASQL_MODEL',
  openaiApiKey: 'OPENAI_API_KEY',
  translationTimeoutMs: 'VENTASQL_TRANSLATION_TIMEOUT_MS',
  logLevel: 'VENTASQL_LOG_LEVEL',
};

const settingsSchema = {
  type: 'object' as const,
  properties: {
    dbType: { type: 'string' as const, enum: ['sqlite', 'postgres'], default: 'sqlite' },
    dbPath: { type: 'string' as const, minLength: 1, default: 'data/ventas.sqlite' },
    pgHost: { type: 'string' as const, minLength: 1, default: 'localhost' },
    pgPort: { type: 'integer' as const, minimum: 1, maximum: 65535, default: 5432 },
    pgDatabase: { type: 'string' as const, default: 'ventas' },
    pgUser: { type: 'string' as const, default: 'postgres' },
    pgPassword: { type: 'string' as const, default: '' },
    pgSsl: { type: 'boolean' as const, default: false },
    statementTimeoutMs: { type: 'integer' as const, minimum: 1, default: SAFE_DEFAULTS.statementTimeoutMs },
    outputDir: { type: 'string' as const, minLength: 1, default: 'output' },
    model: { type: 'string' as const, minLength: 1, default: DEFAULT_MODEL },
    openaiApiKey: { type: 'string' as const, minLength: 1 },
    translationTimeoutMs: { type: 'integer' as const, minimum: 1, default: SAFE_DEFAULTS.translationTimeoutMs },
    logLevel: { type: 'string' as const, enum: [...LOG_LEVELS], default: 'warn' },
  },
  additionalProperties: false,
};

const validateSettings = createAjv({ allErrors: true, coerceTypes: true, useDefaults: true }).compile<RawSettings>(
  settingsSchema,
);

function envKeyFor(field: string): string {
  const entry = Object.entries(ENV_KEYS).find(([key]) => key === field);
  return entry ? entry[1] : field || 'configuration';
}

/**
 * Build the configuration from environment variables.
 * Empty variables count as unset. Throws ConfigError naming each bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VentasqlConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) raw[field] = value;
  }

  if (!validateSettings(raw)) {
    const problems = (validateSettings.errors ?? []).map((e) => {
      const field = e.instancePath.replace(/^\//, '');
      return `${envKeyFor(field)} ${e.message ?? 'is invalid'}`;
    });
    throw new ConfigError(problems);
  }

  const settings = raw;
  const db: ConnectionConfig =
    settings.dbType === 'postgres'
      ? {
          type: 'postgres',
          host: settings.pgHost,
          port: settings.pgPort,
          database: settings.pgDatabase,
          user: settings.pgUser,
          password: settings.pgPassword,
          ssl: settings.pgSsl,
          statementTimeoutMs: settings.statementTimeoutMs,
        }
      : { type: 'sqlite', path: settings.dbPath };

  return {
    db,
    outputDir: settings.outputDir,
    model: settings.model,
    openaiApiKey: settings.openaiApiKey,
    translationTimeoutMs: settings.translationTimeoutMs,
    logLevel: settings.logLevel,
  };
}
