/**
 * Pulls the candidate SQL out of a raw model answer.
 *
 * Accepted shapes, in order: a JSON object {"sql": ...} (optionally inside a
 * markdown fence), a fenced code block, or bare SQL text.
 */

import { TranslationError } from '../errors.js';
import { createAjv } from '../util/ajv.js';
import { translationPayloadSchema } from './schema_json.js';
import type { TranslationPayload } from './types.js';

const validatePayload = createAjv({ allErrors: true }).compile<TranslationPayload>(translationPayloadSchema);

function unfence(text: string): string {
  const fenceMatch = text.match(/```(?:json|sql)?\s*\n?([\s\S]*?)```/i);
  return fenceMatch ? fenceMatch[1].trim() : text.trim();
}

function parsePayload(body: string): TranslationPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new TranslationError(`Model returned invalid JSON: ${body.slice(0, 100)}`);
  }
  if (!validatePayload(parsed)) {
    const errors = validatePayload.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new TranslationError(`Model response failed schema validation: ${errors ?? 'unknown error'}`);
  }
  return parsed;
}

export function extractSql(raw: string): string {
  const body = unfence(raw);
  const text = body.startsWith('{') ? parsePayload(body).sql : body;
  const sql = text
    .replace(/^sql:\s*/i, '')
    .trim()
    .replace(/;+\s*$/, '')
    .trim();

  if (!sql) {
    throw new TranslationError('Model returned an empty response.');
  }
  return sql;
}
