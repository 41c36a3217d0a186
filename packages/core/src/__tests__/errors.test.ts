import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ExecutionError, NotPlottableError, TranslationError, errorMessage, toErrorResult } from '../errors.js';
import { UnsafeQueryError } from '../sanitize/types.js';

describe('toErrorResult', () => {
  it('keeps the rejection reason for unsafe queries', () => {
    const err = new UnsafeQueryError({ code: 'forbidden_keyword', keyword: 'DROP' });
    assert.deepEqual(toErrorResult(err), {
      kind: 'unsafe_query',
      message: 'Statement contains forbidden keyword: DROP',
      reason: { code: 'forbidden_keyword', keyword: 'DROP' },
    });
  });

  it('maps each stage error to its kind', () => {
    assert.deepEqual(toErrorResult(new TranslationError('sin respuesta')), {
      kind: 'translation_failed',
      message: 'sin respuesta',
    });
    assert.deepEqual(toErrorResult(new ExecutionError('no such table')), {
      kind: 'execution_failed',
      message: 'no such table',
    });
    assert.deepEqual(toErrorResult(new NotPlottableError('nothing to plot')), {
      kind: 'not_plottable',
      message: 'nothing to plot',
    });
  });

  it('falls back to unknown', () => {
    assert.deepEqual(toErrorResult(new RangeError('boom')), { kind: 'unknown', message: 'boom' });
    assert.deepEqual(toErrorResult('plain string'), { kind: 'unknown', message: 'plain string' });
  });

  it('keeps the cause on wrapped errors', () => {
    const cause = new Error('socket hang up');
    const err = new ExecutionError('Query execution failed: socket hang up', { cause });
    assert.equal(err.cause, cause);
    assert.equal(errorMessage(err), 'Query execution failed: socket hang up');
  });
});
