/**
 * Parser-backed validator.
 *
 * Stricter than the denylist: the statement must parse (PostgreSQL dialect),
 * contain exactly one statement, and that statement must be a SELECT (a CTE
 * ending in SELECT qualifies). Keywords inside identifiers or literals do not
 * cause rejections here.
 */

import pkg from 'node-sql-parser';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { UnsafeQueryError, markSafe, type QueryValidator, type SafeQuery } from './types.js';

const { Parser } = pkg;

const PG_OPT = { database: 'PostgresQL' } as const;

export interface AstValidatorOptions {
  hardLimit?: number;
}

export class AstValidator implements QueryValidator {
  readonly name = 'ast';
  private readonly parser = new Parser();
  private readonly hardLimit: number;

  constructor(options: AstValidatorOptions = {}) {
    this.hardLimit = options.hardLimit ?? SAFE_DEFAULTS.hardLimit;
  }

  sanitize(candidate: string): SafeQuery {
    const normalized = candidate.trim().replace(/;+\s*$/, '');
    if (!normalized) {
      throw new UnsafeQueryError({ code: 'not_a_select' });
    }

    let statements: object[];
    try {
      const ast = this.parser.astify(normalized, PG_OPT);
      statements = Array.isArray(ast) ? ast : [ast];
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UnsafeQueryError({ code: 'parse_error', message });
    }

    if (statements.length > 1) {
      throw new UnsafeQueryError({ code: 'multiple_statements', count: statements.length });
    }

    const stmt = statements[0];
    if (stmt === undefined || statementType(stmt) !== 'select') {
      throw new UnsafeQueryError({ code: 'not_a_select' });
    }

    if (hasLimit(stmt)) {
      return markSafe(normalized, this.name);
    }
    return markSafe(`${normalized} LIMIT ${this.hardLimit}`, this.name);
  }
}

function statementType(stmt: object): string {
  if ('type' in stmt && typeof stmt.type === 'string') {
    return stmt.type.toLowerCase();
  }
  return '';
}

// node-sql-parser: limit is { seperator, value: [...] }; value is empty when absent
function hasLimit(stmt: object): boolean {
  if (!('limit' in stmt)) return false;
  const limit = stmt.limit;
  if (!limit || typeof limit !== 'object') return false;
  return 'value' in limit && Array.isArray(limit.value) && limit.value.length > 0;
}
