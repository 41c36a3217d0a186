/**
 * Translation module barrel export.
 */

export type { TranslationClient, TranslationPayload } from './types.js';
export { OpenAITranslationClient, DEFAULT_MODEL } from './openai.js';
export type { OpenAITranslationOptions } from './openai.js';
export { buildMessages, DEFAULT_VENTAS_COLUMNS } from './prompt.js';
export type { PromptOptions } from './prompt.js';
export { extractSql } from './extract.js';
export { withTimeout } from './timeout.js';
export { translationPayloadSchema } from './schema_json.js';
