/**
 * CLI error model. Every pipeline failure kind has one error code and one
 * exit code; argument and configuration problems are usage errors.
 */

import type { AskOutcome, ErrorKind, ErrorResult } from '@ventasql/core';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export const EXIT_CODES: Readonly<Record<CliErrorKind | 'success', number>> = Object.freeze({
  success: 0,
  usage: 1,
  runtime: 2,
  policy: 3,
});

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'TRANSLATION_FAILED'
  | 'UNSAFE_QUERY'
  | 'DB_QUERY_FAILED'
  | 'NOT_PLOTTABLE'
  | 'INTERNAL_ERROR';

const PIPELINE_ERRORS: Readonly<Record<ErrorKind, { kind: CliErrorKind; code: CliErrorCode }>> = Object.freeze({
  translation_failed: { kind: 'runtime', code: 'TRANSLATION_FAILED' },
  unsafe_query: { kind: 'policy', code: 'UNSAFE_QUERY' },
  execution_failed: { kind: 'runtime', code: 'DB_QUERY_FAILED' },
  not_plottable: { kind: 'runtime', code: 'NOT_PLOTTABLE' },
  unknown: { kind: 'runtime', code: 'INTERNAL_ERROR' },
});

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  /** Pipeline failure this error reports, when it came from `ask` or `check` */
  readonly pipeline?: ErrorResult;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, options: { pipeline?: ErrorResult; details?: unknown } = {}) {
    super(message);
    this.name = 'CliError';
    this.kind = kind;
    this.code = code;
    this.pipeline = options.pipeline;
    this.details = options.details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, { details });
}

/** Wrap a classified pipeline failure, keeping the statement and route it reached. */
export function pipelineError(error: ErrorResult, context: { route?: string; sql?: string } = {}): CliError {
  const { kind, code } = PIPELINE_ERRORS[error.kind];
  const details = error.kind === 'unsafe_query' ? { reason: error.reason, ...context } : context;
  return new CliError(kind, code, error.message, { pipeline: error, details });
}

export function fromAskFailure(failure: Extract<AskOutcome, { ok: false }>): CliError {
  const context: { route?: string; sql?: string } = {};
  if (failure.route !== undefined) context.route = failure.route;
  if (failure.sql !== undefined) context.sql = failure.sql;
  return pipelineError(failure.error, context);
}

export function toExitCode(error: unknown): number {
  return error instanceof CliError ? EXIT_CODES[error.kind] : EXIT_CODES.runtime;
}
