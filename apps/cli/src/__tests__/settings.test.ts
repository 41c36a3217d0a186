import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CliError } from '../errors.js';
import { logLevelFor } from '../output.js';
import { envWithFlags, parseValidatorName, resolveConfig } from '../settings.js';

const quiet = { json: false, quiet: false, verbose: false, debug: false };

describe('resolveConfig', () => {
  it('lets flags override the environment', () => {
    const config = resolveConfig(
      { db: '/tmp/flag.sqlite', outputDir: 'exports' },
      { VENTASQL_DB_PATH: '/tmp/env.sqlite', VENTASQL_OUTPUT_DIR: 'env-out' },
    );
    assert.deepEqual(config.db, { type: 'sqlite', path: '/tmp/flag.sqlite' });
    assert.equal(config.outputDir, 'exports');
  });

  it('ignores unset and blank flags', () => {
    const env = envWithFlags({ db: '  ' }, { VENTASQL_DB_PATH: '/tmp/env.sqlite' });
    assert.equal(env.VENTASQL_DB_PATH, '/tmp/env.sqlite');
    assert.equal(env.VENTASQL_MODEL, undefined);
  });

  it('turns invalid settings into a usage error', () => {
    assert.throws(
      () => resolveConfig({ dbType: 'oracle' }, {}),
      (err: unknown) => err instanceof CliError && err.kind === 'usage' && err.code === 'CONFIG_INVALID',
    );
  });
});

describe('parseValidatorName', () => {
  it('accepts known validators', () => {
    assert.equal(parseValidatorName(undefined), 'denylist');
    assert.equal(parseValidatorName('denylist'), 'denylist');
    assert.equal(parseValidatorName('ast'), 'ast');
  });

  it('rejects anything else', () => {
    assert.throws(() => parseValidatorName('regex'), { message: 'Unknown validator "regex". Use "denylist" or "ast".' });
  });
});

describe('logLevelFor', () => {
  it('prefers --debug, then --verbose, then the configured level', () => {
    assert.equal(logLevelFor({ ...quiet, debug: true, verbose: true }, 'warn'), 'debug');
    assert.equal(logLevelFor({ ...quiet, verbose: true }, 'warn'), 'info');
    assert.equal(logLevelFor(quiet, 'error'), 'error');
  });
});
