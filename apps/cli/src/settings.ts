/**
 * Resolves configuration for a command: `.env` and the process environment
 * first, then command-line flags on top.
 */

import { ConfigError, loadConfig, type ValidatorName, type VentasqlConfig } from '@ventasql/core';
import { usageError } from './errors.js';

export type ConnectionFlags = {
  db?: string;
  dbType?: string;
  outputDir?: string;
  model?: string;
};

/** Flags are applied as environment overrides so they go through the same validation. */
export function envWithFlags(flags: ConnectionFlags, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const overrides: Array<[string, string | undefined]> = [
    ['VENTASQL_DB_PATH', flags.db],
    ['VENTASQL_DB_TYPE', flags.dbType],
    ['VENTASQL_OUTPUT_DIR', flags.outputDir],
    ['VENTASQL_MODEL', flags.model],
  ];
  const merged: NodeJS.ProcessEnv = { ...env };
  for (const [envKey, value] of overrides) {
    if (value?.trim()) merged[envKey] = value;
  }
  return merged;
}

export function resolveConfig(flags: ConnectionFlags, env: NodeJS.ProcessEnv = process.env): VentasqlConfig {
  try {
    return loadConfig(envWithFlags(flags, env));
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      throw usageError(err.message, 'CONFIG_INVALID', { problems: err.problems });
    }
    throw err;
  }
}

export function parseValidatorName(value: string | undefined): ValidatorName {
  if (value === undefined || value === 'denylist') return 'denylist';
  if (value === 'ast') return 'ast';
  throw usageError(`Unknown validator "${value}". Use "denylist" or "ast".`);
}
