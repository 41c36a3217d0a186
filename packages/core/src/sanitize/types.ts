/**
 * Query validation types.
 *
 * A validator turns an untrusted candidate statement (usually model output)
 * into a SafeQuery or rejects it with an UnsafeQueryError. DataStore
 * implementations only accept SafeQuery values, so every statement that
 * reaches the database has passed through exactly one validator.
 */

/** Why a candidate statement was rejected */
export type UnsafeQueryReason =
  | { code: 'not_a_select' }
  | { code: 'forbidden_keyword'; keyword: string }
  | { code: 'multiple_statements'; count: number }
  | { code: 'parse_error'; message: string };

/** A statement that passed validation. Only minted by markSafe(). */
export interface SafeQuery {
  readonly sql: string;
  /** Name of the validator that accepted the statement */
  readonly validatedBy: string;
}

/** Pluggable validation strategy */
export interface QueryValidator {
  readonly name: string;
  /** Returns the bounded statement, or throws UnsafeQueryError */
  sanitize(candidate: string): SafeQuery;
}

export class UnsafeQueryError extends Error {
  readonly kind = 'unsafe_query' as const;
  readonly reason: UnsafeQueryReason;

  constructor(reason: UnsafeQueryReason) {
    super(describeReason(reason));
    this.name = 'UnsafeQueryError';
    this.reason = reason;
  }
}

export function describeReason(reason: UnsafeQueryReason): string {
  switch (reason.code) {
    case 'not_a_select':
      return 'Only SELECT statements are allowed.';
    case 'forbidden_keyword':
      return `Statement contains forbidden keyword: ${reason.keyword}`;
    case 'multiple_statements':
      return `Multiple statements detected (${reason.count}). Only single statements are allowed.`;
    case 'parse_error':
      return `SQL parse error: ${reason.message}`;
  }
}

export function markSafe(sql: string, validatedBy: string): SafeQuery {
  return Object.freeze({ sql, validatedBy });
}
