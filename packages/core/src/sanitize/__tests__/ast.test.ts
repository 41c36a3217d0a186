/**
 * Parser-backed validator tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AstValidator } from '../ast.js';
import { createValidator } from '../index.js';
import { DenylistValidator } from '../denylist.js';
import { UnsafeQueryError } from '../types.js';

const validator = new AstValidator();

describe('AstValidator', () => {
  it('appends a LIMIT to a plain SELECT', () => {
    assert.equal(validator.sanitize('SELECT id FROM ventas').sql, 'SELECT id FROM ventas LIMIT 100');
  });

  it('strips trailing semicolons before appending', () => {
    assert.equal(validator.sanitize('SELECT id FROM ventas;').sql, 'SELECT id FROM ventas LIMIT 100');
  });

  it('leaves an existing LIMIT alone', () => {
    assert.equal(validator.sanitize('SELECT id FROM ventas LIMIT 5').sql, 'SELECT id FROM ventas LIMIT 5');
  });

  it('accepts identifiers that the denylist would reject', () => {
    const sql = 'SELECT producto, update_count FROM ventas LIMIT 10';
    assert.equal(validator.sanitize(sql).sql, sql);
  });

  it('rejects non-SELECT statements', () => {
    assert.throws(
      () => validator.sanitize('DROP TABLE ventas'),
      (err: unknown) => err instanceof UnsafeQueryError && err.reason.code === 'not_a_select',
    );
    assert.throws(
      () => validator.sanitize('DELETE FROM ventas WHERE id = 1'),
      (err: unknown) => err instanceof UnsafeQueryError && err.reason.code === 'not_a_select',
    );
  });

  it('rejects multiple statements', () => {
    assert.throws(
      () => validator.sanitize('SELECT 1; SELECT 2'),
      (err: unknown) =>
        err instanceof UnsafeQueryError && err.reason.code === 'multiple_statements' && err.reason.count === 2,
    );
  });

  it('rejects text that does not parse', () => {
    assert.throws(
      () => validator.sanitize('esto no es SQL'),
      (err: unknown) => err instanceof UnsafeQueryError && err.reason.code === 'parse_error',
    );
  });

  it('rejects empty input', () => {
    assert.throws(
      () => validator.sanitize('  ;  '),
      (err: unknown) => err instanceof UnsafeQueryError && err.reason.code === 'not_a_select',
    );
  });
});

describe('createValidator', () => {
  it('defaults to the denylist strategy', () => {
    assert.ok(createValidator() instanceof DenylistValidator);
    assert.ok(createValidator('ast') instanceof AstValidator);
  });

  it('passes the hard limit through', () => {
    assert.equal(createValidator('ast', 7).sanitize('SELECT 1').sql, 'SELECT 1 LIMIT 7');
  });
});
