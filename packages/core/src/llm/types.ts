/**
 * Translation boundary: question text in, candidate SQL text out.
 * The output is untrusted and always goes through a QueryValidator.
 */

export interface TranslationClient {
  /** Rejects with TranslationError on any failure */
  translate(question: string, signal?: AbortSignal): Promise<string>;
}

/** JSON object the model is asked to answer with */
export interface TranslationPayload {
  sql: string;
  notes?: string;
}
