/**
 * Denylist validator tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DenylistValidator } from '../denylist.js';
import { UnsafeQueryError, type UnsafeQueryReason } from '../types.js';

const validator = new DenylistValidator();

function rejectionOf(sql: string): UnsafeQueryReason {
  try {
    validator.sanitize(sql);
  } catch (err: unknown) {
    assert.ok(err instanceof UnsafeQueryError);
    return err.reason;
  }
  throw new Error(`expected "${sql}" to be rejected`);
}

// ── Leading keyword ─────────────────────────────────────────────────

describe('DenylistValidator: SELECT only', () => {
  it('rejects statements that do not start with SELECT', () => {
    for (const sql of ['WITH t AS (SELECT 1) SELECT * FROM t', 'SHOW TABLES', 'EXPLAIN SELECT 1', 'pragma table_info(ventas)']) {
      assert.deepEqual(rejectionOf(sql), { code: 'not_a_select' });
    }
  });

  it('rejects the empty string and whitespace', () => {
    assert.deepEqual(rejectionOf(''), { code: 'not_a_select' });
    assert.deepEqual(rejectionOf('   \n\t'), { code: 'not_a_select' });
  });

  it('accepts SELECT in any case after leading whitespace', () => {
    assert.equal(validator.sanitize('  SeLeCt 1').sql, '  SeLeCt 1 LIMIT 100');
  });

  it('reports a readable message', () => {
    assert.throws(() => validator.sanitize('SHOW TABLES'), /Only SELECT statements are allowed/);
  });
});

// ── Forbidden keywords ──────────────────────────────────────────────

describe('DenylistValidator: forbidden keywords', () => {
  it('rejects each keyword even after SELECT', () => {
    const cases: Array<[string, string]> = [
      ['select 1; drop table ventas', 'DROP'],
      ['SELECT * FROM ventas; DELETE FROM ventas', 'DELETE'],
      ['select * from ventas where 1=1; Update ventas set total = 0', 'UPDATE'],
      ['SELECT 1; INSERT INTO ventas VALUES (1)', 'INSERT'],
      ['SELECT 1; ALTER TABLE ventas ADD x INT', 'ALTER'],
    ];
    for (const [sql, keyword] of cases) {
      assert.deepEqual(rejectionOf(sql), { code: 'forbidden_keyword', keyword });
    }
  });

  it('matches keywords inside identifiers (known limitation)', () => {
    assert.deepEqual(rejectionOf('SELECT update_count FROM ventas'), { code: 'forbidden_keyword', keyword: 'UPDATE' });
    assert.deepEqual(rejectionOf("SELECT * FROM ventas WHERE producto = 'raindrop'"), {
      code: 'forbidden_keyword',
      keyword: 'DROP',
    });
  });

  it('reports the first keyword in list order', () => {
    assert.deepEqual(rejectionOf('select 1; insert into x values (1); drop table x'), {
      code: 'forbidden_keyword',
      keyword: 'DROP',
    });
  });

  it('checks the leading keyword before the denylist', () => {
    assert.deepEqual(rejectionOf('DROP TABLE ventas'), { code: 'not_a_select' });
  });
});

// ── LIMIT cap ───────────────────────────────────────────────────────

describe('DenylistValidator: LIMIT cap', () => {
  it('appends exactly " LIMIT 100" when no LIMIT is present', () => {
    assert.equal(validator.sanitize('select * from ventas').sql, 'select * from ventas LIMIT 100');
    assert.equal(
      validator.sanitize('SELECT ciudad, SUM(total) FROM ventas GROUP BY ciudad').sql,
      'SELECT ciudad, SUM(total) FROM ventas GROUP BY ciudad LIMIT 100',
    );
  });

  it('returns statements that already contain LIMIT unchanged', () => {
    for (const sql of ['SELECT * FROM ventas LIMIT 5', 'select * from ventas limit 5', 'SELECT * FROM ventas Limit 5 OFFSET 10']) {
      assert.equal(validator.sanitize(sql).sql, sql);
    }
  });

  it('is idempotent once LIMIT is present', () => {
    const inputs = ['select * from ventas', 'SELECT producto FROM ventas ORDER BY total DESC', 'SELECT 1 LIMIT 3'];
    for (const sql of inputs) {
      const once = validator.sanitize(sql).sql;
      assert.equal(validator.sanitize(once).sql, once);
    }
  });

  it('preserves the original casing of the statement', () => {
    assert.equal(validator.sanitize('Select Producto From Ventas').sql, 'Select Producto From Ventas LIMIT 100');
  });

  it('honours a custom hard limit', () => {
    const strict = new DenylistValidator({ hardLimit: 5 });
    assert.equal(strict.sanitize('SELECT 1').sql, 'SELECT 1 LIMIT 5');
  });

  it('records which validator accepted the statement', () => {
    assert.equal(validator.sanitize('SELECT 1').validatedBy, 'denylist');
  });

  it('returns a frozen safe query', () => {
    const safe = validator.sanitize('SELECT 1');
    assert.deepEqual(safe, { sql: 'SELECT 1 LIMIT 100', validatedBy: 'denylist' });
    assert.equal(Object.isFrozen(safe), true);
  });
});
