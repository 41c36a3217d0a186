/**
 * Keyword denylist validator.
 *
 * Known limitation: this is a substring filter, not a parser. A column named
 * `update_count` or a string literal containing "drop" is rejected, and
 * nothing here escapes or parameterises the statement. Use AstValidator when
 * stricter structural checks are needed.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import { UnsafeQueryError, markSafe, type QueryValidator, type SafeQuery } from './types.js';

export const FORBIDDEN_KEYWORDS: readonly string[] = Object.freeze([
  'drop',
  'delete',
  'update',
  'insert',
  'alter',
]);

export interface DenylistValidatorOptions {
  /** LIMIT appended to statements without one. Default: 100 */
  hardLimit?: number;
  /** Case-insensitive substrings that reject a statement */
  forbiddenKeywords?: readonly string[];
}

export class DenylistValidator implements QueryValidator {
  readonly name = 'denylist';
  private readonly hardLimit: number;
  private readonly forbidden: readonly string[];

  constructor(options: DenylistValidatorOptions = {}) {
    this.hardLimit = options.hardLimit ?? SAFE_DEFAULTS.hardLimit;
    this.forbidden = (options.forbiddenKeywords ?? FORBIDDEN_KEYWORDS).map((kw) => kw.toLowerCase());
  }

  sanitize(candidate: string): SafeQuery {
    const lower = candidate.trim().toLowerCase();

    if (!lower.startsWith('select')) {
      throw new UnsafeQueryError({ code: 'not_a_select' });
    }

    const hit = this.forbidden.find((kw) => lower.includes(kw));
    if (hit !== undefined) {
      throw new UnsafeQueryError({ code: 'forbidden_keyword', keyword: hit.toUpperCase() });
    }

    if (lower.includes('limit')) {
      return markSafe(candidate, this.name);
    }
    return markSafe(`${candidate} LIMIT ${this.hardLimit}`, this.name);
  }
}
