/**
 * Error taxonomy for the question pipeline.
 *
 * Each stage throws its own Error subclass; the orchestrator converts
 * whatever reaches it into exactly one ErrorResult.
 */

import { UnsafeQueryError, type UnsafeQueryReason } from './sanitize/types.js';

export type ErrorKind = 'translation_failed' | 'unsafe_query' | 'execution_failed' | 'not_plottable' | 'unknown';

export type ErrorResult =
  | { kind: 'translation_failed'; message: string }
  | { kind: 'unsafe_query'; message: string; reason: UnsafeQueryReason }
  | { kind: 'execution_failed'; message: string }
  | { kind: 'not_plottable'; message: string }
  | { kind: 'unknown'; message: string };

export class TranslationError extends Error {
  readonly kind = 'translation_failed' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

export class ExecutionError extends Error {
  readonly kind = 'execution_failed' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExecutionError';
  }
}

export class NotPlottableError extends Error {
  readonly kind = 'not_plottable' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotPlottableError';
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toErrorResult(err: unknown): ErrorResult {
  if (err instanceof UnsafeQueryError) {
    return { kind: 'unsafe_query', message: err.message, reason: err.reason };
  }
  if (err instanceof TranslationError || err instanceof ExecutionError || err instanceof NotPlottableError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: 'unknown', message: errorMessage(err) };
}
