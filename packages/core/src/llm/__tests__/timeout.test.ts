import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { withTimeout } from '../timeout.js';
import { TranslationError } from '../../errors.js';
import type { TranslationClient } from '../types.js';

describe('withTimeout', () => {
  it('returns the inner result when it arrives in time', async () => {
    const client: TranslationClient = { translate: async (q) => `SELECT '${q}'` };
    assert.equal(await withTimeout(client, 1000).translate('hola'), "SELECT 'hola'");
  });

  it('rejects with TranslationError and aborts the inner call when time runs out', async () => {
    let aborted = false;
    const slow: TranslationClient = {
      translate: (_q, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        }),
    };
    await assert.rejects(withTimeout(slow, 20).translate('x'), (err: unknown) => {
      return err instanceof TranslationError && /timed out after 20ms/.test(err.message);
    });
    assert.equal(aborted, true);
  });

  it('passes inner failures through', async () => {
    const failing: TranslationClient = {
      translate: async () => {
        throw new TranslationError('boom');
      },
    };
    await assert.rejects(withTimeout(failing, 1000).translate('x'), /boom/);
  });
});
