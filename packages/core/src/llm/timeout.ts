import { TranslationError } from '../errors.js';
import type { TranslationClient } from './types.js';

/**
 * Bound a translation client in time. When the limit passes, the inner call
 * is aborted and the returned promise rejects with TranslationError.
 */
export function withTimeout(client: TranslationClient, timeoutMs: number): TranslationClient {
  return {
    async translate(question: string, signal?: AbortSignal): Promise<string> {
      const controller = new AbortController();
      const forwardAbort = (): void => controller.abort(signal?.reason);
      signal?.addEventListener('abort', forwardAbort, { once: true });

      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new TranslationError(`Translation timed out after ${timeoutMs}ms.`));
          controller.abort();
        }, timeoutMs);
      });

      try {
        return await Promise.race([client.translate(question, controller.signal), expired]);
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
      }
    },
  };
}
