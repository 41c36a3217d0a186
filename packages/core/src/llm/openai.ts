/**
 * OpenAI-backed translation client.
 * Asks for a JSON answer and falls back to plain SQL text; no retries.
 */

import OpenAI from 'openai';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { TranslationError, errorMessage } from '../errors.js';
import { extractSql } from './extract.js';
import { buildMessages, type PromptOptions } from './prompt.js';
import type { TranslationClient } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAITranslationOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  prompt?: PromptOptions;
  /** Preconfigured SDK client, mainly for tests */
  client?: OpenAI;
}

export class OpenAITranslationClient implements TranslationClient {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly prompt: PromptOptions;

  constructor(options: OpenAITranslationOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.prompt = options.prompt ?? {};

    if (options.client) {
      this.client = options.client;
      return;
    }
    if (!options.apiKey) {
      throw new TranslationError('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell or .env file.');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? SAFE_DEFAULTS.translationTimeoutMs,
      maxRetries: 0,
    });
  }

  async translate(question: string, signal?: AbortSignal): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: buildMessages(question, this.prompt),
          temperature: 0,
          max_tokens: 512,
        },
        { signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err: unknown) {
      throw new TranslationError(`OpenAI request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content) {
      throw new TranslationError('OpenAI returned an empty response.');
    }
    return extractSql(content);
  }
}
