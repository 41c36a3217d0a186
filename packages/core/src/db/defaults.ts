/**
 * Safe session defaults.
 * These are the limits the sanitizer, stores and renderers fall back to.
 */

export const SAFE_DEFAULTS = {
  /** LIMIT appended to statements missing one */
  hardLimit: 100,
  /** Rows shown for the table route */
  tableDisplayRows: 10,
  /** Postgres statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Upper bound for a translation request in milliseconds */
  translationTimeoutMs: 30_000,
} as const;
